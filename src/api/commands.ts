import { z } from 'zod';
import {
  ACTION_SCOPES,
  AGENT_INTENTS,
  ActionRelevanceRequest,
  AgentRequest,
  AuditLogQuery,
  ORCHESTRATION_METHODS,
  OrchestrationMethod,
  URGENCY_LEVELS,
  UserApprovalResponse,
} from '../core/types';
import { NotFoundError, UnsupportedCommandError } from '../core/errors';
import { AgentCommunicationBus } from '../messages/bus/AgentCommunicationBus';
import { createAgentRequest } from '../messages/bus/requests';
import { ActionRelevanceValidator } from '../validation/relevance/ActionRelevanceValidator';
import { ApprovalService } from '../validation/approval/ApprovalService';

export type OrchestrationCommand =
  | { type: 'route'; request: AgentRequest }
  | { type: 'execute_workflow'; workflowId: string; request: AgentRequest }
  | { type: 'get_workflow_state'; workflowId: string }
  | { type: 'get_capabilities' }
  | { type: 'get_health' }
  | { type: 'set_orchestration_method'; method: OrchestrationMethod }
  | { type: 'validate_action'; request: ActionRelevanceRequest }
  | { type: 'validate_actions'; requests: ActionRelevanceRequest[] }
  | { type: 'get_audit_log'; query: AuditLogQuery }
  | { type: 'get_validation_config' }
  | { type: 'update_validation_config'; patch?: unknown }
  | { type: 'get_pending_approvals'; userId: string; includeExpired: boolean }
  | { type: 'respond_to_approval'; response: UserApprovalResponse };

export type CommandType = OrchestrationCommand['type'];

const requestSchema = z
  .object({
    intent: z.enum(AGENT_INTENTS),
    originalUserInput: z.string(),
    traceId: z.string().min(1).optional(),
    conversationId: z.string().optional(),
    interactionId: z.string().optional(),
    context: z.record(z.unknown()).optional(),
    urgency: z.enum(URGENCY_LEVELS).optional(),
    orchestrationMethod: z.enum(ORCHESTRATION_METHODS).optional(),
    sourceAgentId: z.string().optional(),
    userId: z.string().optional(),
    industry: z.string().optional(),
  })
  .transform((input) => createAgentRequest(input));

const scheduledActionSchema = z.object({
  id: z.string().min(1),
  actionType: z.string().min(1),
  description: z.string().default(''),
  contactId: z.string().min(1),
  organizationId: z.string().min(1),
  scheduledByAgentId: z.string().default('unknown'),
  scheduledAt: z.coerce.date(),
  executeAt: z.coerce.date(),
  expiresAt: z.coerce.date().optional(),
  parameters: z.record(z.unknown()).default({}),
  relevanceCriteria: z.record(z.unknown()).default({}),
  status: z.enum(['pending', 'approved', 'rejected', 'deferred', 'suppressed', 'executed', 'expired']).default('pending'),
  priority: z.number().default(0),
  traceId: z.string().optional(),
  actionScope: z.enum(ACTION_SCOPES).default('real_world'),
});

const contactContextSchema = z.object({
  contactId: z.string().min(1),
  organizationId: z.string().min(1),
  contactName: z.string().optional(),
  contactStatus: z.string().optional(),
  relationshipStage: z.string().optional(),
  dealStatus: z.string().optional(),
  engagementLevel: z.string().optional(),
  sentimentScore: z.number().min(-1).max(1).optional(),
  lastInteractionAt: z.coerce.date().optional(),
  interactionSummary: z.string().optional(),
  customProperties: z.record(z.unknown()).default({}),
  retrievedAt: z.coerce.date().default(() => new Date()),
});

const relevanceRequestSchema = z.object({
  action: scheduledActionSchema,
  currentContext: contactContextSchema.optional(),
  useLlmValidation: z.boolean().optional(),
  userOverrides: z.record(z.unknown()).optional(),
  traceId: z.string().optional(),
});

const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('route'), request: requestSchema }),
  z.object({ type: z.literal('execute_workflow'), workflowId: z.string().min(1), request: requestSchema }),
  z.object({ type: z.literal('get_workflow_state'), workflowId: z.string().min(1) }),
  z.object({ type: z.literal('get_capabilities') }),
  z.object({ type: z.literal('get_health') }),
  z.object({ type: z.literal('set_orchestration_method'), method: z.enum(ORCHESTRATION_METHODS) }),
  z.object({ type: z.literal('validate_action'), request: relevanceRequestSchema }),
  z.object({ type: z.literal('validate_actions'), requests: z.array(relevanceRequestSchema) }),
  z.object({
    type: z.literal('get_audit_log'),
    query: z
      .object({
        contactId: z.string().optional(),
        actionType: z.string().optional(),
        startDate: z.coerce.date().optional(),
        endDate: z.coerce.date().optional(),
      })
      .default({}),
  }),
  z.object({ type: z.literal('get_validation_config') }),
  z.object({ type: z.literal('update_validation_config'), patch: z.unknown() }),
  z.object({
    type: z.literal('get_pending_approvals'),
    userId: z.string().min(1),
    includeExpired: z.boolean().default(false),
  }),
  z.object({
    type: z.literal('respond_to_approval'),
    response: z.object({
      approvalRequestId: z.string().min(1),
      userId: z.string().min(1),
      decision: z.enum(['approve', 'reject', 'modify', 'defer']),
      modifications: z
        .object({
          description: z.string().optional(),
          executeAt: z.coerce.date().optional(),
          priority: z.number().optional(),
          parameters: z.record(z.unknown()).optional(),
        })
        .optional(),
      applyToSimilar: z.boolean().optional(),
      comment: z.string().optional(),
    }),
  }),
]);

/** Throws UnsupportedCommandError for unknown types and malformed payloads. */
export function parseCommand(input: unknown): OrchestrationCommand {
  const parsed = commandSchema.safeParse(input);
  if (parsed.success) return parsed.data;

  const type = typeof input === 'object' && input !== null && 'type' in input ? String(input.type) : undefined;
  const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'command'}: ${i.message}`).join('; ');
  throw new UnsupportedCommandError(
    type ? `Unsupported or malformed command '${type}': ${issues}` : `Unsupported command: ${issues}`,
    type,
  );
}

export interface CommandServices {
  bus: AgentCommunicationBus;
  relevanceValidator: ActionRelevanceValidator;
  approvals: ApprovalService;
}

export class CommandDispatcher {
  constructor(private readonly services: CommandServices) {}

  async dispatch(input: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.execute(parseCommand(input), signal);
  }

  async execute(command: OrchestrationCommand, signal?: AbortSignal): Promise<unknown> {
    const { bus, relevanceValidator, approvals } = this.services;

    switch (command.type) {
      case 'route':
        return bus.routeRequest(command.request, { signal });
      case 'execute_workflow':
        return bus.executeWorkflow(command.workflowId, command.request, { signal });
      case 'get_workflow_state': {
        const state = await bus.getWorkflowState(command.workflowId);
        if (!state) throw new NotFoundError('Workflow', command.workflowId);
        return state;
      }
      case 'get_capabilities':
        return bus.getAgentCapabilities();
      case 'get_health':
        return bus.getAgentHealth();
      case 'set_orchestration_method':
        bus.setOrchestrationMethod(command.method);
        return { orchestrationMethod: bus.getOrchestrationMethod() };
      case 'validate_action':
        return relevanceValidator.validateActionRelevance(command.request, signal);
      case 'validate_actions':
        return relevanceValidator.validateBatchActionRelevance(command.requests, signal);
      case 'get_audit_log':
        return relevanceValidator.getValidationAuditLog(command.query);
      case 'get_validation_config':
        return relevanceValidator.getValidationConfig();
      case 'update_validation_config': {
        const updated = relevanceValidator.updateValidationConfig(command.patch);
        if (!updated) throw new UnsupportedCommandError('Validation config update was rejected', command.type);
        return relevanceValidator.getValidationConfig();
      }
      case 'get_pending_approvals':
        return approvals.getPendingApprovals(command.userId, command.includeExpired);
      case 'respond_to_approval': {
        const action = approvals.processApprovalResponse(command.response);
        return { approvalRequestId: command.response.approvalRequestId, action: action ?? null };
      }
      default:
        return assertNever(command);
    }
  }
}

function assertNever(command: never): never {
  throw new UnsupportedCommandError(`Unsupported command: ${JSON.stringify(command)}`);
}
