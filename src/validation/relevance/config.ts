import { z } from 'zod';
import { ActionRelevanceConfig } from '../../core/types';

export const DEFAULT_RELEVANCE_CONFIG: ActionRelevanceConfig = {
  enableLlmValidation: true,
  maxContextAgeMinutes: 5,
  llmTimeoutMs: 30000,
  defaultActionOnUncertainty: 'suppress',
  enableAuditLogging: true,
  maxAuditEntries: 10000,
  batchConcurrency: 5,
  negativeSentimentThreshold: -0.5,
  recentInteractionDays: 30,
  closedContactStatuses: ['closed', 'lost', 'inactive', 'do_not_contact', 'unsubscribed'],
  scopes: {
    inner_world: { maxTier: 2, minConfidence: 0.5, runAllTiers: false },
    hybrid: { maxTier: 3, minConfidence: 0.7, runAllTiers: false },
    real_world: { maxTier: 3, minConfidence: 0.8, runAllTiers: true },
  },
  approval: {
    overrideMode: 'risk_based',
    userApprovalThreshold: 0.8,
    userApprovalTimeoutMinutes: 60,
    alwaysRequireApprovalActions: [],
    neverRequireApprovalActions: [],
    enableBulkApproval: true,
  },
};

const scopeSchema = z.object({
  maxTier: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  minConfidence: z.number().min(0).max(1),
  runAllTiers: z.boolean(),
});

const approvalSchema = z.object({
  overrideMode: z.enum(['always_ask', 'never_ask', 'risk_based', 'llm_decision']),
  userApprovalThreshold: z.number().min(0).max(1),
  userApprovalTimeoutMinutes: z.number().positive(),
  alwaysRequireApprovalActions: z.array(z.string()),
  neverRequireApprovalActions: z.array(z.string()),
  enableBulkApproval: z.boolean(),
});

export const relevanceConfigSchema = z.object({
  enableLlmValidation: z.boolean(),
  maxContextAgeMinutes: z.number().nonnegative(),
  llmTimeoutMs: z.number().int().positive(),
  defaultActionOnUncertainty: z.enum(['suppress', 'allow']),
  enableAuditLogging: z.boolean(),
  maxAuditEntries: z.number().int().positive(),
  batchConcurrency: z.number().int().positive(),
  negativeSentimentThreshold: z.number().min(-1).max(1),
  recentInteractionDays: z.number().nonnegative(),
  closedContactStatuses: z.array(z.string()),
  scopes: z.object({
    inner_world: scopeSchema,
    hybrid: scopeSchema,
    real_world: scopeSchema,
  }),
  approval: approvalSchema,
});

/** Top-level fields replace; `scopes` and `approval` merge one level down. */
export const relevanceConfigPatchSchema = relevanceConfigSchema
  .omit({ scopes: true, approval: true })
  .partial()
  .extend({
    scopes: z
      .object({
        inner_world: scopeSchema.partial(),
        hybrid: scopeSchema.partial(),
        real_world: scopeSchema.partial(),
      })
      .partial()
      .optional(),
    approval: approvalSchema.partial().optional(),
  })
  .strict();

export type RelevanceConfigPatch = z.infer<typeof relevanceConfigPatchSchema>;

export function mergeRelevanceConfig(current: ActionRelevanceConfig, patch: RelevanceConfigPatch): ActionRelevanceConfig {
  const { scopes, approval, ...topLevel } = patch;
  return relevanceConfigSchema.parse({
    ...current,
    ...topLevel,
    scopes: {
      inner_world: { ...current.scopes.inner_world, ...scopes?.inner_world },
      hybrid: { ...current.scopes.hybrid, ...scopes?.hybrid },
      real_world: { ...current.scopes.real_world, ...scopes?.real_world },
    },
    approval: { ...current.approval, ...approval },
    closedContactStatuses: (topLevel.closedContactStatuses ?? current.closedContactStatuses).map((s) => s.toLowerCase()),
  });
}

export function freezeRelevanceConfig(config: ActionRelevanceConfig): ActionRelevanceConfig {
  Object.freeze(config.closedContactStatuses);
  Object.freeze(config.scopes.inner_world);
  Object.freeze(config.scopes.hybrid);
  Object.freeze(config.scopes.real_world);
  Object.freeze(config.scopes);
  Object.freeze(config.approval.alwaysRequireApprovalActions);
  Object.freeze(config.approval.neverRequireApprovalActions);
  Object.freeze(config.approval);
  return Object.freeze(config);
}
