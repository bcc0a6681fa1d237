import {
  ActionRelevanceResult,
  ActionScope,
  AgentAction,
  ContactContext,
  ScheduledAction,
  isRecord,
} from '../../core/types';
import { errorMessage } from '../../core/errors';
import { mapWithConcurrency } from '../../core/concurrency/Semaphore';
import { ActionRelevanceValidator } from '../relevance/ActionRelevanceValidator';
import { ApprovalService } from '../approval/ApprovalService';
import { LogAggregator } from '../../monitoring/core/Monitoring';

const HOUR_MS = 3600000;

export const VALIDATION_ERROR_REASON = 'Validation error - requires manual review';

/** Action types that always go to a person in the hybrid scope. */
export const HIGH_RISK_ACTION_TYPES: ReadonlySet<string> = new Set([
  'risk_assessment',
  'compliance_check',
  'orchestration_decision',
  'intent_classification',
]);

const SCOPE_LABELS: Record<ActionScope, string> = {
  inner_world: 'Inner world',
  hybrid: 'Hybrid',
  real_world: 'Real world',
};

export interface ActionValidationContext {
  contactId: string;
  organizationId: string;
  userId: string;
  agentId: string;
  contactContext?: ContactContext;
}

export interface AgentActionValidatorDeps {
  relevanceValidator: ActionRelevanceValidator;
  approvals: ApprovalService;
  logs?: LogAggregator;
  now?: () => Date;
}

/**
 * Runs agent-proposed actions through relevance validation and stamps the
 * metadata the compliance checker looks for. Irrelevant actions are dropped.
 */
export class AgentActionValidator {
  private readonly relevanceValidator: ActionRelevanceValidator;
  private readonly approvals: ApprovalService;
  private readonly logs?: LogAggregator;
  private readonly now: () => Date;

  constructor(deps: AgentActionValidatorDeps) {
    this.relevanceValidator = deps.relevanceValidator;
    this.approvals = deps.approvals;
    this.logs = deps.logs;
    this.now = deps.now ?? (() => new Date());
  }

  async validateAgentActions(
    actions: AgentAction[],
    context: ActionValidationContext,
    userOverrides: Record<string, unknown>,
    traceId: string,
  ): Promise<AgentAction[]> {
    const concurrency = this.relevanceValidator.getValidationConfig().batchConcurrency;
    const validated = await mapWithConcurrency(actions, concurrency, async (action) => {
      try {
        return await this.validateOne(action, context, userOverrides, traceId);
      } catch (error) {
        this.logs?.error('Action validation failed, holding for manual review', {
          traceId,
          actionId: action.id,
          error: errorMessage(error),
        });
        return {
          ...action,
          confidenceScore: 0,
          validationReason: VALIDATION_ERROR_REASON,
          requiresApproval: true,
          approvalRequestId: '',
        };
      }
    });

    const kept = validated.filter((a): a is AgentAction => a !== undefined);
    this.logs?.info('Agent actions validated', {
      traceId,
      agentId: context.agentId,
      proposed: actions.length,
      kept: kept.length,
    });
    return kept;
  }

  convertToScheduledAction(action: AgentAction, context: ActionValidationContext): ScheduledAction {
    const now = this.now();
    const criteria = action.parameters.relevanceCriteria;
    return {
      id: action.id,
      actionType: action.actionType,
      description: action.description,
      contactId: context.contactId,
      organizationId: context.organizationId,
      scheduledByAgentId: context.agentId,
      scheduledAt: now,
      executeAt: action.suggestedTiming ?? defaultExecuteAt(action, now),
      parameters: { ...action.parameters, payload: action.payload, agentType: action.agentType },
      relevanceCriteria: isRecord(criteria) ? { ...criteria } : {},
      status: 'pending',
      priority: action.priority,
      traceId: action.traceId,
      actionScope: action.actionScope,
    };
  }

  private async validateOne(
    action: AgentAction,
    context: ActionValidationContext,
    userOverrides: Record<string, unknown>,
    traceId: string,
  ): Promise<AgentAction | undefined> {
    const scheduled = this.convertToScheduledAction(action, context);
    const result = await this.relevanceValidator.validateActionRelevance({
      action: scheduled,
      currentContext: context.contactContext,
      useLlmValidation: action.actionScope !== 'inner_world',
      userOverrides,
      traceId,
    });

    const threshold = this.relevanceValidator.getValidationConfig().scopes[action.actionScope].minConfidence;
    if (!result.isRelevant || result.confidenceScore < threshold) {
      this.logs?.info('Dropped irrelevant action', {
        traceId,
        actionId: action.id,
        actionType: action.actionType,
        confidence: result.confidenceScore,
        reasoning: result.reasoning,
      });
      return undefined;
    }

    const reason = `${SCOPE_LABELS[action.actionScope]}: ${result.reasoning}`;
    const requiresApproval = await this.needsApproval(action, scheduled, result, context.userId, traceId);
    const approvalRequestId = requiresApproval
      ? this.approvals.createApprovalRequest(scheduled, result, context.userId, reason, userOverrides, traceId).id
      : '';

    return {
      ...action,
      confidenceScore: result.confidenceScore,
      validationReason: reason,
      requiresApproval,
      approvalRequestId,
    };
  }

  private async needsApproval(
    action: AgentAction,
    scheduled: ScheduledAction,
    result: ActionRelevanceResult,
    userId: string,
    traceId: string,
  ): Promise<boolean> {
    switch (action.actionScope) {
      case 'inner_world':
        return false;
      case 'real_world':
        return true;
      case 'hybrid':
        if (HIGH_RISK_ACTION_TYPES.has(action.actionType)) return true;
        if (result.confidenceScore >= 0.9) return false;
        if (result.confidenceScore < 0.8) return true;
        return this.approvals.requiresUserApproval(scheduled, result, userId, traceId);
    }
  }
}

function defaultExecuteAt(action: AgentAction, now: Date): Date {
  if (action.payload.kind === 'scheduled_follow_up') {
    return action.payload.dueAt;
  }
  return new Date(now.getTime() + HOUR_MS);
}
