import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  ActionRelevanceResult,
  ApprovalConfig,
  ScheduledAction,
  TextCompletion,
  UserApprovalRequest,
  UserApprovalResponse,
} from '../../core/types';
import { NotFoundError, ValidationError, errorMessage } from '../../core/errors';
import { withTimeout } from '../../core/concurrency/timeout';
import { extractJsonObject } from '../../integrations/llm/json';
import { LogAggregator } from '../../monitoring/core/Monitoring';

const MINUTE_MS = 60000;
const HOUR_MS = 60 * MINUTE_MS;
const SIMILAR_WINDOW_MS = 24 * HOUR_MS;
const DEFAULT_RETENTION_MS = 24 * HOUR_MS;

const approvalDecisionSchema = z.object({
  requiresApproval: z.boolean(),
  reason: z.string().optional(),
});

const APPROVAL_SYSTEM_PROMPT = [
  'You decide whether a person must approve an automated customer action before it runs.',
  'Answer with a single JSON object: {"requiresApproval": boolean, "reason": string}.',
].join('\n');

export interface ApprovalServiceDeps {
  /** Read on every call so config updates apply to the next decision. */
  getConfig: () => ApprovalConfig;
  completion?: TextCompletion;
  logs?: LogAggregator;
  llmTimeoutMs?: number;
  /** How long an answered or expired request stays readable before cleanup drops it. */
  retentionMs?: number;
  now?: () => Date;
}

export class ApprovalService extends EventEmitter {
  private requests: Map<string, UserApprovalRequest> = new Map();
  private readonly getConfig: () => ApprovalConfig;
  private readonly completion?: TextCompletion;
  private readonly logs?: LogAggregator;
  private readonly llmTimeoutMs: number;
  private readonly retentionMs: number;
  private readonly now: () => Date;

  constructor(deps: ApprovalServiceDeps) {
    super();
    this.getConfig = deps.getConfig;
    this.completion = deps.completion;
    this.logs = deps.logs;
    this.llmTimeoutMs = deps.llmTimeoutMs ?? 30000;
    this.retentionMs = deps.retentionMs ?? DEFAULT_RETENTION_MS;
    this.now = deps.now ?? (() => new Date());
  }

  async requiresUserApproval(
    action: ScheduledAction,
    result: ActionRelevanceResult,
    userId: string,
    traceId?: string,
  ): Promise<boolean> {
    const config = this.getConfig();
    switch (config.overrideMode) {
      case 'always_ask':
        return true;
      case 'never_ask':
        return false;
      case 'risk_based':
        if (config.alwaysRequireApprovalActions.includes(action.actionType)) return true;
        if (config.neverRequireApprovalActions.includes(action.actionType)) return false;
        return result.confidenceScore < config.userApprovalThreshold;
      case 'llm_decision':
        return this.askModel(action, result, userId, traceId);
    }
  }

  createApprovalRequest(
    action: ScheduledAction,
    result: ActionRelevanceResult,
    userId: string,
    reason: string,
    userOverrides: Record<string, unknown> = {},
    traceId?: string,
  ): UserApprovalRequest {
    const now = this.now();
    const request: UserApprovalRequest = {
      id: uuidv4(),
      actionId: action.id,
      action: { ...action },
      userId,
      reason,
      relevance: result,
      alternatives: result.alternatives,
      userOverrides: { ...userOverrides },
      status: 'pending',
      traceId: traceId ?? action.traceId,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.getConfig().userApprovalTimeoutMinutes * MINUTE_MS),
    };
    this.requests.set(request.id, request);
    this.logs?.info('Approval requested', { traceId: request.traceId, approvalRequestId: request.id, actionType: action.actionType, userId });
    this.emit('approval:requested', request);
    return request;
  }

  /**
   * Applies a user's decision and returns the action as it should now run,
   * or undefined when it was rejected.
   */
  processApprovalResponse(response: UserApprovalResponse): ScheduledAction | undefined {
    const request = this.requests.get(response.approvalRequestId);
    if (!request) {
      throw new NotFoundError('Approval request', response.approvalRequestId);
    }
    if (request.userId !== response.userId) {
      throw new ValidationError('Approval response came from a different user', 'userId');
    }
    if (request.status !== 'pending') {
      throw new ValidationError(`Approval request is already ${request.status}`, 'status');
    }

    const now = this.now();
    if (request.expiresAt <= now) {
      this.requests.set(request.id, { ...request, status: 'expired' });
      throw new ValidationError('Approval request has expired', 'expiresAt');
    }

    let action: ScheduledAction | undefined;
    let status: UserApprovalRequest['status'];
    switch (response.decision) {
      case 'approve':
        action = { ...request.action, status: 'approved' };
        status = 'approved';
        break;
      case 'reject':
        action = undefined;
        status = 'rejected';
        break;
      case 'modify': {
        const changes = response.modifications ?? {};
        action = {
          ...request.action,
          description: changes.description ?? request.action.description,
          executeAt: changes.executeAt ?? request.action.executeAt,
          priority: changes.priority ?? request.action.priority,
          parameters: { ...request.action.parameters, ...changes.parameters },
          status: 'approved',
        };
        status = 'modified';
        break;
      }
      case 'defer':
        action = {
          ...request.action,
          executeAt: new Date(request.action.executeAt.getTime() + HOUR_MS),
          status: 'deferred',
        };
        status = 'deferred';
        break;
    }

    this.requests.set(request.id, { ...request, status, respondedAt: now });
    this.logs?.info('Approval answered', {
      traceId: request.traceId,
      approvalRequestId: request.id,
      decision: response.decision,
    });
    this.emit('approval:answered', { request: this.requests.get(request.id), decision: response.decision });

    if (response.decision === 'approve' && response.applyToSimilar && this.getConfig().enableBulkApproval) {
      this.applyBulkApproval(request, response.userId);
    }
    return action;
  }

  /**
   * Approves other pending requests for the same user, action type and
   * contact whose execution falls within a day of `source`.
   */
  applyBulkApproval(source: UserApprovalRequest, userId: string): string[] {
    const now = this.now();
    const approved: string[] = [];
    for (const request of this.requests.values()) {
      if (request.id === source.id || request.status !== 'pending' || request.userId !== userId) continue;
      if (request.expiresAt <= now) continue;
      if (request.action.actionType !== source.action.actionType) continue;
      if (request.action.contactId !== source.action.contactId) continue;
      const gap = Math.abs(request.action.executeAt.getTime() - source.action.executeAt.getTime());
      if (gap > SIMILAR_WINDOW_MS) continue;

      this.requests.set(request.id, { ...request, status: 'approved', respondedAt: now });
      approved.push(request.id);
    }
    if (approved.length > 0) {
      this.logs?.info('Bulk approval applied', { traceId: source.traceId, approvalRequestIds: approved });
    }
    return approved;
  }

  getApprovalRequest(approvalRequestId: string): UserApprovalRequest | undefined {
    return this.requests.get(approvalRequestId);
  }

  getPendingApprovals(userId: string, includeExpired: boolean = false): UserApprovalRequest[] {
    const now = this.now();
    return Array.from(this.requests.values())
      .filter((r) => r.userId === userId)
      .filter((r) => r.status === 'pending' || (includeExpired && r.status === 'expired'))
      .filter((r) => includeExpired || r.expiresAt > now)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  /**
   * Marks pending requests past their deadline as expired and drops settled
   * requests older than the retention window. Returns how many expired.
   */
  cleanupExpired(now: Date = this.now()): number {
    let expired = 0;
    let evicted = 0;
    const cutoff = now.getTime() - this.retentionMs;
    for (const request of this.requests.values()) {
      if (request.status === 'pending') {
        if (request.expiresAt <= now) {
          this.requests.set(request.id, { ...request, status: 'expired' });
          expired++;
        }
        continue;
      }
      const settledAt = request.respondedAt ?? request.expiresAt;
      if (settledAt.getTime() < cutoff) {
        this.requests.delete(request.id);
        evicted++;
      }
    }
    if (expired > 0) {
      this.logs?.info('Expired approval requests', { count: expired });
    }
    if (evicted > 0) {
      this.logs?.debug('Evicted settled approval requests', { count: evicted });
    }
    return expired;
  }

  private async askModel(
    action: ScheduledAction,
    result: ActionRelevanceResult,
    userId: string,
    traceId?: string,
  ): Promise<boolean> {
    const completion = this.completion;
    if (!completion) return true;

    const prompt = [
      `Action type: ${action.actionType}`,
      `Description: ${action.description}`,
      `Relevance confidence: ${result.confidenceScore}`,
      `Relevance reasoning: ${result.reasoning}`,
      `User: ${userId}`,
    ].join('\n');

    try {
      const raw = await withTimeout(
        (signal) => completion.complete(APPROVAL_SYSTEM_PROMPT, prompt, traceId, signal),
        this.llmTimeoutMs,
        'Approval decision',
      );
      const parsed = approvalDecisionSchema.safeParse(extractJsonObject(raw));
      if (!parsed.success) {
        this.logs?.warn('Unusable approval decision from language model', { traceId, actionId: action.id });
        return true;
      }
      return parsed.data.requiresApproval;
    } catch (error) {
      this.logs?.warn('Approval decision failed', { traceId, actionId: action.id, error: errorMessage(error) });
      return true;
    }
  }
}
