import { describe, it, expect, vi } from 'vitest';
import { ComplianceChecker } from './ComplianceChecker';
import { AgentAction, AgentResponse, AuditSink } from '../core/types';
import { ComplianceViolationError } from '../core/errors';
import { LogAggregator, MetricsCollector } from '../monitoring/core/Monitoring';

const ALL_TIME = { start: new Date(0), end: new Date('2100-01-01T00:00:00.000Z') };

function action(overrides: Partial<AgentAction> = {}): AgentAction {
  return {
    id: 'act-1',
    actionType: 'send_resource',
    description: 'Share the pricing guide',
    priority: 1,
    confidenceScore: 0.9,
    validationReason: 'Hybrid: checked',
    requiresApproval: false,
    approvalRequestId: '',
    parameters: {},
    traceId: 'trace-1',
    actionScope: 'hybrid',
    agentType: 'next_best_action',
    payload: { kind: 'recommendation', title: 'Pricing guide' },
    ...overrides,
  };
}

function response(actions: AgentAction[]): AgentResponse {
  return {
    id: 'resp-1',
    requestId: 'req-1',
    traceId: 'trace-1',
    success: true,
    content: 'done',
    retryable: false,
    confidence: 0.9,
    processingTimeMs: 12,
    agentId: 'nba',
    agentType: 'next_best_action',
    requiresFollowUp: false,
    data: {},
    actions,
    orchestrationMethod: 'custom',
    createdAt: new Date('2024-06-15T12:00:00.000Z'),
  };
}

function checker(auditSink?: AuditSink) {
  return new ComplianceChecker({ auditSink, logs: new LogAggregator({ silent: true }), metrics: new MetricsCollector() });
}

describe('ComplianceChecker', () => {
  describe('isActionValidated', () => {
    it('should accept fully stamped actions', () => {
      expect(checker().isActionValidated(action())).toBe(true);
      expect(checker().isActionValidated(action({ requiresApproval: true, approvalRequestId: 'apr-1' }))).toBe(true);
      expect(checker().isActionValidated(action({ confidenceScore: 0 }))).toBe(true);
      expect(checker().isActionValidated(action({ confidenceScore: 1 }))).toBe(true);
    });

    it('should reject missing reasons, bad confidence and missing approval ids', () => {
      expect(checker().isActionValidated(action({ validationReason: '  ' }))).toBe(false);
      expect(checker().isActionValidated(action({ confidenceScore: 1.2 }))).toBe(false);
      expect(checker().isActionValidated(action({ confidenceScore: Number.NaN }))).toBe(false);
      expect(checker().isActionValidated(action({ requiresApproval: true }))).toBe(false);
    });
  });

  describe('validateAgentResponse', () => {
    it('should count validated and unvalidated actions', async () => {
      const compliance = checker();
      const listener = vi.fn();
      compliance.on('compliance:violation', listener);
      const actions = [action(), action({ id: 'act-2', actionType: 'book_meeting', validationReason: '' })];

      const result = await compliance.validateAgentResponse(response(actions), actions, 'trace-1');

      expect(result).toMatchObject({
        traceId: 'trace-1',
        totalActions: 2,
        validatedActions: 1,
        unvalidatedActions: 1,
        violations: ["Action 'book_meeting' lacks validation metadata"],
        isCompliant: false,
      });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toMatchObject({
        violationType: 'unvalidated_action',
        agentType: 'next_best_action',
        actionType: 'book_meeting',
        description: 'AI-generated action bypassed mandatory validation: missing validation reason',
        severity: 'critical',
      });
    });

    it('should be compliant with no actions', async () => {
      const result = await checker().validateAgentResponse(response([]), [], 'trace-1');
      expect(result).toMatchObject({ totalActions: 0, isCompliant: true, violations: [] });
    });

    it('should forward violations to the audit sink and survive its failures', async () => {
      const record = vi.fn().mockRejectedValue(new Error('audit down'));
      const actions = [action({ requiresApproval: true })];

      const result = await checker({ record }).validateAgentResponse(response(actions), actions, 'trace-9');

      expect(result.isCompliant).toBe(false);
      expect(record).toHaveBeenCalledWith(expect.objectContaining({ kind: 'compliance_violation', traceId: 'trace-9' }));
    });
  });

  describe('ensureCompliance', () => {
    it('should pass compliant responses through', async () => {
      const actions = [action()];
      const original = response(actions);
      expect(await checker().ensureCompliance(original, actions, 'trace-1')).toBe(original);
    });

    it('should throw with the validation result attached', async () => {
      const actions = [action({ confidenceScore: -0.1 })];
      const failing = checker().ensureCompliance(response(actions), actions, 'trace-1');

      await expect(failing).rejects.toThrow(ComplianceViolationError);
      await expect(failing).rejects.toMatchObject({
        message: "Agent response failed compliance validation: Action 'send_resource' lacks validation metadata",
        result: { unvalidatedActions: 1 },
      });
    });
  });

  describe('auditCompliance', () => {
    it('should summarise checks in range', async () => {
      const compliance = checker();
      const good = [action(), action({ id: 'act-2' })];
      const bad = [action({ id: 'act-3', agentType: 'general_inquiry', validationReason: '' }), action({ id: 'act-4' })];
      await compliance.validateAgentResponse(response(good), good, 't1');
      await compliance.validateAgentResponse(response(bad), bad, 't2');

      expect(compliance.auditCompliance(ALL_TIME)).toEqual({
        ...ALL_TIME,
        totalChecks: 2,
        compliantChecks: 1,
        totalActions: 4,
        unvalidatedActions: 1,
        complianceRate: 0.75,
        violationsByAgentType: { general_inquiry: 1 },
        violationsByType: { unvalidated_action: 1 },
      });
    });

    it('should report full compliance for an empty range', () => {
      const report = checker().auditCompliance(ALL_TIME);
      expect(report.totalChecks).toBe(0);
      expect(report.complianceRate).toBe(1);
    });
  });
});
