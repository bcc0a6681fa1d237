import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  ActionRelevanceConfig,
  ActionRelevanceRequest,
  ActionRelevanceResult,
  AuditLogQuery,
  AuditSink,
  ContactContext,
  ContactContextLookup,
  LlmRelevanceVerdict,
  ScheduledAction,
  ScopeValidationSettings,
  TextCompletion,
  TierOutcome,
  ValidationMethod,
} from '../../core/types';
import { errorMessage } from '../../core/errors';
import { mapWithConcurrency } from '../../core/concurrency/Semaphore';
import { withTimeout } from '../../core/concurrency/timeout';
import { LogAggregator, MetricsCollector } from '../../monitoring/core/Monitoring';
import {
  DEFAULT_RELEVANCE_CONFIG,
  RelevanceConfigPatch,
  freezeRelevanceConfig,
  mergeRelevanceConfig,
  relevanceConfigPatchSchema,
} from './config';
import { evaluateContextualFreshness, evaluateRelevanceCriteria } from './rules';
import { RELEVANCE_SYSTEM_PROMPT, buildRelevancePrompt, parseLlmVerdict } from './llmVerdict';

const HOUR_MS = 3600000;

const ALTERNATIVES: Record<string, { actionType: string; description: string }[]> = {
  congrats_email: [{ actionType: 'follow_up_email', description: 'Follow up on recent activity' }],
  appointment_reminder: [{ actionType: 'reschedule_request', description: 'Request to reschedule appointment' }],
  property_recommendation: [{ actionType: 'market_update', description: 'Send market update instead' }],
};

const TIER_METHOD: Record<TierOutcome['tier'], ValidationMethod> = {
  1: 'rule_based',
  2: 'contextual',
  3: 'llm',
};

export interface ActionRelevanceValidatorDeps {
  completion?: TextCompletion;
  contacts?: ContactContextLookup;
  auditSink?: AuditSink;
  logs?: LogAggregator;
  metrics?: MetricsCollector;
  config?: RelevanceConfigPatch;
  now?: () => Date;
}

type Decision = Pick<
  ActionRelevanceResult,
  'isRelevant' | 'confidenceScore' | 'reasoning' | 'validationMethod' | 'tiersRun' | 'failedCriteria' | 'recommendedAction'
>;

/**
 * Decides whether a scheduled action is still worth executing. Cheap rule
 * checks run first; the language model is consulted only when the scope
 * allows it and the deterministic tiers could not decide.
 */
export class ActionRelevanceValidator extends EventEmitter {
  private config: ActionRelevanceConfig;
  private auditLog: ActionRelevanceResult[] = [];
  private readonly completion?: TextCompletion;
  private readonly contacts?: ContactContextLookup;
  private readonly auditSink?: AuditSink;
  private readonly logs?: LogAggregator;
  private readonly metrics?: MetricsCollector;
  private readonly now: () => Date;

  constructor(deps: ActionRelevanceValidatorDeps = {}) {
    super();
    this.completion = deps.completion;
    this.contacts = deps.contacts;
    this.auditSink = deps.auditSink;
    this.logs = deps.logs;
    this.metrics = deps.metrics;
    this.now = deps.now ?? (() => new Date());
    this.config = freezeRelevanceConfig(mergeRelevanceConfig(DEFAULT_RELEVANCE_CONFIG, deps.config ?? {}));
  }

  async validateActionRelevance(request: ActionRelevanceRequest, signal?: AbortSignal): Promise<ActionRelevanceResult> {
    const config = this.config;
    const traceId = request.traceId ?? request.action?.traceId;
    let result: ActionRelevanceResult;

    try {
      const action = request.action;
      const context = await this.resolveContext(
        action.contactId,
        action.organizationId,
        request.currentContext,
        config,
        signal,
      );
      const decision = await this.runTiers(request, context, config, traceId, signal);
      result = this.buildResult(action.id, action.actionType, action.contactId, traceId, decision);
      if (!result.isRelevant) {
        result.alternatives = this.suggestAlternativeActions(action, context, traceId);
      }
    } catch (error) {
      this.logs?.error('Action relevance validation failed', {
        traceId,
        actionId: request.action?.id,
        error: errorMessage(error),
      });
      result = this.buildResult(
        request.action?.id ?? 'unknown',
        request.action?.actionType ?? 'unknown',
        request.action?.contactId ?? 'unknown',
        traceId,
        {
          isRelevant: false,
          confidenceScore: 0,
          reasoning: `validation error: ${errorMessage(error)}`,
          validationMethod: 'error',
          tiersRun: [],
          failedCriteria: [],
        },
      );
    }

    Object.freeze(result);
    await this.audit(result, config);
    this.metrics?.incrementCounter('action_validations_total', {
      method: result.validationMethod,
      outcome: result.isRelevant ? 'relevant' : 'not_relevant',
    });
    this.emit('validation:completed', result);
    return result;
  }

  /** Same order as the input; one failing item never fails the batch. */
  async validateBatchActionRelevance(requests: ActionRelevanceRequest[], signal?: AbortSignal): Promise<ActionRelevanceResult[]> {
    return mapWithConcurrency(requests, this.config.batchConcurrency, (request) =>
      this.validateActionRelevance(request, signal),
    );
  }

  evaluateRelevanceCriteria(
    criteria: Record<string, unknown>,
    context: ContactContext,
    action?: ScheduledAction,
  ): TierOutcome {
    return evaluateRelevanceCriteria(criteria, context, action, this.now());
  }

  /** Tier 3. Any failure, including unparsable output, comes back as "not relevant". */
  async validateWithLLM(
    action: ScheduledAction,
    context: ContactContext,
    userOverrides: Record<string, unknown> = {},
    traceId?: string,
    signal?: AbortSignal,
  ): Promise<LlmRelevanceVerdict> {
    const completion = this.completion;
    if (!completion) {
      return failClosed('No language model is configured');
    }

    const config = this.config;
    try {
      const raw = await withTimeout(
        (llmSignal) =>
          completion.complete(RELEVANCE_SYSTEM_PROMPT, buildRelevancePrompt(action, context, userOverrides), traceId, llmSignal),
        config.llmTimeoutMs,
        'Relevance check',
        signal,
      );
      return parseLlmVerdict(raw);
    } catch (error) {
      this.logs?.warn('LLM relevance check failed', { traceId, actionId: action.id, error: errorMessage(error) });
      return failClosed(`LLM validation failed: ${errorMessage(error)}`);
    }
  }

  /** Tier 1 and Tier 2 only; undecided actions follow `defaultActionOnUncertainty`. */
  async isActionStillRelevant(
    action: ScheduledAction,
    contactId: string,
    organizationId: string,
    traceId?: string,
  ): Promise<boolean> {
    const config = this.config;
    try {
      const context = await this.resolveContext(contactId, organizationId, undefined, config);
      const settings = config.scopes[action.actionScope];
      const now = this.now();

      const tier1 = evaluateRelevanceCriteria(action.relevanceCriteria, context, action, now);
      if (isConclusive(tier1, settings)) return tier1.verdict === 'relevant';

      const tier2 = evaluateContextualFreshness(action, context, config, now);
      if (isConclusive(tier2, settings)) return tier2.verdict === 'relevant';

      return config.defaultActionOnUncertainty === 'allow';
    } catch (error) {
      this.logs?.error('Quick relevance check failed', { traceId, actionId: action.id, error: errorMessage(error) });
      return false;
    }
  }

  /** Unvalidated suggestions; callers run them through validation themselves. */
  suggestAlternativeActions(originalAction: ScheduledAction, context: ContactContext, traceId?: string): ScheduledAction[] {
    const status = context.contactStatus?.toLowerCase();
    if (status && this.config.closedContactStatuses.includes(status)) {
      return [];
    }

    const now = this.now();
    return (ALTERNATIVES[originalAction.actionType] ?? []).map((alternative) => ({
      ...originalAction,
      id: uuidv4(),
      actionType: alternative.actionType,
      description: alternative.description,
      scheduledAt: now,
      executeAt: new Date(now.getTime() + HOUR_MS),
      expiresAt: undefined,
      parameters: { ...originalAction.parameters },
      relevanceCriteria: { ...originalAction.relevanceCriteria },
      status: 'pending',
      traceId: traceId ?? originalAction.traceId,
    }));
  }

  getValidationConfig(): ActionRelevanceConfig {
    return this.config;
  }

  /** Validated swap; validations already running keep the snapshot they started with. */
  updateValidationConfig(patch: unknown): boolean {
    const parsed = relevanceConfigPatchSchema.safeParse(patch);
    if (!parsed.success) {
      this.logs?.warn('Rejected validation config update', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return false;
    }

    try {
      this.config = freezeRelevanceConfig(mergeRelevanceConfig(this.config, parsed.data));
    } catch (error) {
      this.logs?.warn('Rejected validation config update', { error: errorMessage(error) });
      return false;
    }
    this.logs?.info('Validation config updated', { fields: Object.keys(parsed.data) });
    this.emit('config:updated', this.config);
    return true;
  }

  getValidationAuditLog(query: AuditLogQuery = {}): ActionRelevanceResult[] {
    return this.auditLog
      .filter((r) => {
        if (query.contactId && r.contactId !== query.contactId) return false;
        if (query.actionType && r.actionType !== query.actionType) return false;
        if (query.startDate && r.evaluatedAt < query.startDate) return false;
        if (query.endDate && r.evaluatedAt > query.endDate) return false;
        return true;
      })
      .reverse()
      .sort((a, b) => b.evaluatedAt.getTime() - a.evaluatedAt.getTime());
  }

  private async runTiers(
    request: ActionRelevanceRequest,
    context: ContactContext,
    config: ActionRelevanceConfig,
    traceId: string | undefined,
    signal?: AbortSignal,
  ): Promise<Decision> {
    const action = request.action;
    const settings = config.scopes[action.actionScope];
    const now = this.now();
    const outcomes: TierOutcome[] = [];

    const tier1 = evaluateRelevanceCriteria(action.relevanceCriteria, context, action, now);
    outcomes.push(tier1);
    if (!settings.runAllTiers && isConclusive(tier1, settings)) {
      return fromTier(tier1, outcomes, tier1.failedCriteria);
    }

    if (settings.maxTier >= 2) {
      const tier2 = evaluateContextualFreshness(action, context, config, now);
      outcomes.push(tier2);
      if (!settings.runAllTiers && isConclusive(tier2, settings)) {
        return fromTier(tier2, outcomes, tier1.failedCriteria);
      }
    }

    const llmAllowed =
      settings.maxTier >= 3 &&
      config.enableLlmValidation &&
      request.useLlmValidation !== false &&
      this.completion !== undefined;
    const llm = llmAllowed
      ? await this.validateWithLLM(action, context, request.userOverrides, traceId, signal)
      : undefined;
    const tiersRun: number[] = outcomes.map((o) => o.tier);
    if (llm) tiersRun.push(3);

    if (settings.runAllTiers) {
      const stale = outcomes.find((o) => o.verdict === 'stale');
      if (stale) {
        return { ...fromTier(stale, outcomes, tier1.failedCriteria), tiersRun };
      }
    }

    if (llm) {
      if (llm.isRelevant && llm.confidence < settings.minConfidence) {
        return uncertain(
          config,
          tiersRun,
          tier1.failedCriteria,
          `Language model judged the action relevant with low confidence (${llm.confidence}): ${llm.reasoning}`,
        );
      }
      return {
        isRelevant: llm.isRelevant,
        confidenceScore: llm.confidence,
        reasoning: llm.reasoning,
        validationMethod: 'llm',
        tiersRun,
        failedCriteria: tier1.failedCriteria,
        recommendedAction: llm.recommendedAction,
      };
    }

    if (settings.runAllTiers) {
      const decided = outcomes.find((o) => isConclusive(o, settings));
      if (decided) {
        return { ...fromTier(decided, outcomes, tier1.failedCriteria), tiersRun };
      }
    }

    return uncertain(
      config,
      tiersRun,
      tier1.failedCriteria,
      `No tier reached a confident verdict (${outcomes.map((o) => o.reasoning).join('; ')})`,
    );
  }

  private async resolveContext(
    contactId: string,
    organizationId: string,
    provided: ContactContext | undefined,
    config: ActionRelevanceConfig,
    signal?: AbortSignal,
  ): Promise<ContactContext> {
    const now = this.now();
    const maxAgeMs = config.maxContextAgeMinutes * 60000;
    if (provided && now.getTime() - provided.retrievedAt.getTime() <= maxAgeMs) {
      return provided;
    }
    if (this.contacts) {
      const fetched = await this.contacts.getContactContext(contactId, organizationId, signal);
      if (fetched) return fetched;
    }
    return provided ?? { contactId, organizationId, customProperties: {}, retrievedAt: now };
  }

  private buildResult(
    actionId: string,
    actionType: string,
    contactId: string,
    traceId: string | undefined,
    decision: Decision,
  ): ActionRelevanceResult {
    return {
      actionId,
      actionType,
      contactId,
      ...decision,
      alternatives: [],
      traceId,
      evaluatedAt: this.now(),
    };
  }

  private async audit(result: ActionRelevanceResult, config: ActionRelevanceConfig): Promise<void> {
    if (!config.enableAuditLogging) return;

    this.auditLog.push(result);
    if (this.auditLog.length > config.maxAuditEntries) {
      this.auditLog.splice(0, this.auditLog.length - config.maxAuditEntries);
    }

    if (!this.auditSink) return;
    try {
      await this.auditSink.record({
        kind: 'action_validation',
        traceId: result.traceId,
        result,
        recordedAt: new Date(),
      });
    } catch (error) {
      this.logs?.warn('Failed to write validation audit entry', { traceId: result.traceId, error: errorMessage(error) });
    }
  }
}

function isConclusive(outcome: TierOutcome, settings: ScopeValidationSettings): boolean {
  return outcome.verdict !== 'inconclusive' && outcome.confidence >= settings.minConfidence;
}

function fromTier(outcome: TierOutcome, outcomes: TierOutcome[], failedCriteria: string[]): Decision {
  return {
    isRelevant: outcome.verdict === 'relevant',
    confidenceScore: outcome.confidence,
    reasoning: outcome.reasoning,
    validationMethod: TIER_METHOD[outcome.tier],
    tiersRun: outcomes.map((o) => o.tier),
    failedCriteria,
  };
}

function uncertain(
  config: ActionRelevanceConfig,
  tiersRun: number[],
  failedCriteria: string[],
  reasoning: string,
): Decision {
  return {
    isRelevant: config.defaultActionOnUncertainty === 'allow',
    confidenceScore: 0.5,
    reasoning: `${reasoning}; applied default '${config.defaultActionOnUncertainty}'`,
    validationMethod: 'default',
    tiersRun,
    failedCriteria,
  };
}

function failClosed(reasoning: string): LlmRelevanceVerdict {
  return { isRelevant: false, confidence: 0, reasoning, alternativeActions: [] };
}
