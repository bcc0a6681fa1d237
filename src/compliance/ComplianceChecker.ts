import { EventEmitter } from 'events';
import {
  AgentAction,
  AgentResponse,
  AuditSink,
  ComplianceAuditReport,
  ComplianceValidationResult,
  ComplianceViolation,
} from '../core/types';
import { ComplianceViolationError, errorMessage } from '../core/errors';
import { LogAggregator, MetricsCollector } from '../monitoring/core/Monitoring';

export interface ComplianceCheckerOptions {
  auditSink?: AuditSink;
  logs?: LogAggregator;
  metrics?: MetricsCollector;
  maxHistory?: number;
}

interface ComplianceCheckRecord {
  result: ComplianceValidationResult;
  violations: ComplianceViolation[];
}

/**
 * Last gate before agent actions leave the system: every action must carry
 * the metadata the relevance validator stamps on it.
 */
export class ComplianceChecker extends EventEmitter {
  private history: ComplianceCheckRecord[] = [];
  private readonly auditSink?: AuditSink;
  private readonly logs?: LogAggregator;
  private readonly metrics?: MetricsCollector;
  private readonly maxHistory: number;

  constructor(options: ComplianceCheckerOptions = {}) {
    super();
    this.auditSink = options.auditSink;
    this.logs = options.logs;
    this.metrics = options.metrics;
    this.maxHistory = options.maxHistory ?? 10000;
  }

  isActionValidated(action: AgentAction): boolean {
    return validationGaps(action).length === 0;
  }

  async validateAgentResponse(
    response: AgentResponse,
    actions: AgentAction[],
    traceId: string,
  ): Promise<ComplianceValidationResult> {
    const violations: string[] = [];
    const reported: ComplianceViolation[] = [];
    let validatedActions = 0;

    for (const action of actions) {
      const gaps = validationGaps(action);
      if (gaps.length === 0) {
        validatedActions++;
        continue;
      }

      violations.push(`Action '${action.actionType}' lacks validation metadata`);
      const violation: ComplianceViolation = {
        violationType: 'unvalidated_action',
        agentType: action.agentType || response.agentType || 'unknown',
        actionType: action.actionType,
        description: `AI-generated action bypassed mandatory validation: ${gaps.join(', ')}`,
        traceId,
        severity: 'critical',
        occurredAt: new Date(),
      };
      reported.push(violation);
      await this.reportComplianceViolation(violation, traceId);
    }

    const result: ComplianceValidationResult = {
      traceId,
      totalActions: actions.length,
      validatedActions,
      unvalidatedActions: actions.length - validatedActions,
      violations,
      isCompliant: violations.length === 0,
      checkedAt: new Date(),
    };

    this.history.push({ result, violations: reported });
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }
    this.metrics?.incrementCounter('compliance_checks_total', { outcome: result.isCompliant ? 'compliant' : 'violation' });
    return result;
  }

  /** Always logs locally; a failing audit sink is logged, never rethrown. */
  async reportComplianceViolation(violation: ComplianceViolation, traceId: string): Promise<void> {
    this.logs?.error('Compliance violation: ' + violation.description, {
      traceId,
      agentType: violation.agentType,
      actionType: violation.actionType,
      severity: violation.severity,
    });
    this.metrics?.incrementCounter('compliance_violations_total', { agentType: violation.agentType });
    this.emit('compliance:violation', violation);

    if (!this.auditSink) return;
    try {
      await this.auditSink.record({ kind: 'compliance_violation', traceId, violation, recordedAt: new Date() });
    } catch (error) {
      this.logs?.warn('Failed to forward compliance violation to audit sink', { traceId, error: errorMessage(error) });
    }
  }

  async ensureCompliance(response: AgentResponse, actions: AgentAction[], traceId: string): Promise<AgentResponse> {
    const result = await this.validateAgentResponse(response, actions, traceId);
    if (!result.isCompliant) {
      throw new ComplianceViolationError(
        `Agent response failed compliance validation: ${result.violations.join('; ')}`,
        result,
      );
    }
    return response;
  }

  auditCompliance(range: { start: Date; end: Date }): ComplianceAuditReport {
    const inRange = this.history.filter(
      (r) => r.result.checkedAt >= range.start && r.result.checkedAt <= range.end,
    );

    const violationsByAgentType: Record<string, number> = {};
    const violationsByType: Record<string, number> = {};
    let totalActions = 0;
    let unvalidatedActions = 0;
    let compliantChecks = 0;

    for (const record of inRange) {
      totalActions += record.result.totalActions;
      unvalidatedActions += record.result.unvalidatedActions;
      if (record.result.isCompliant) compliantChecks++;
      for (const violation of record.violations) {
        violationsByAgentType[violation.agentType] = (violationsByAgentType[violation.agentType] ?? 0) + 1;
        violationsByType[violation.violationType] = (violationsByType[violation.violationType] ?? 0) + 1;
      }
    }

    return {
      start: range.start,
      end: range.end,
      totalChecks: inRange.length,
      compliantChecks,
      totalActions,
      unvalidatedActions,
      complianceRate: totalActions === 0 ? 1 : (totalActions - unvalidatedActions) / totalActions,
      violationsByAgentType,
      violationsByType,
    };
  }
}

function validationGaps(action: AgentAction): string[] {
  const gaps: string[] = [];
  if (!action.validationReason || action.validationReason.trim() === '') {
    gaps.push('missing validation reason');
  }
  if (!Number.isFinite(action.confidenceScore) || action.confidenceScore < 0 || action.confidenceScore > 1) {
    gaps.push('confidence score outside [0, 1]');
  }
  if (action.requiresApproval && (!action.approvalRequestId || action.approvalRequestId.trim() === '')) {
    gaps.push('approval required but no approval request');
  }
  return gaps;
}
