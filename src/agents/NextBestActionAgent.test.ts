import { describe, it, expect, vi } from 'vitest';
import { NextBestActionAgent } from './NextBestActionAgent';
import { AgentActionValidator } from '../validation/actions/AgentActionValidator';
import { ActionRelevanceValidator } from '../validation/relevance/ActionRelevanceValidator';
import { ApprovalService } from '../validation/approval/ApprovalService';
import { AgentTask } from '../core/types';

const NOW = new Date('2024-06-15T12:00:00.000Z');

function task(overrides: Partial<AgentTask> = {}): AgentTask {
  return {
    id: 'task-1',
    traceId: 'trace-1',
    type: 'contact_management',
    description: 'What should I do next with this contact?',
    context: { contactId: 'c1', organizationId: 'org-1' },
    urgency: 'medium',
    userId: 'u1',
    createdAt: NOW,
    ...overrides,
  };
}

function setup(confidenceScore: number = 0.95) {
  const relevanceValidator = new ActionRelevanceValidator({ now: () => NOW });
  vi.spyOn(relevanceValidator, 'validateActionRelevance').mockImplementation(async (request) => ({
    actionId: request.action.id,
    actionType: request.action.actionType,
    contactId: request.action.contactId,
    isRelevant: true,
    confidenceScore,
    reasoning: 'still relevant',
    validationMethod: 'contextual',
    tiersRun: [1, 2],
    failedCriteria: [],
    alternatives: [],
    evaluatedAt: NOW,
  }));
  const approvals = new ApprovalService({ getConfig: () => relevanceValidator.getValidationConfig().approval, now: () => NOW });
  const actionValidator = new AgentActionValidator({ relevanceValidator, approvals, now: () => NOW });
  return new NextBestActionAgent('next-best-action', 'next_best_action', actionValidator, () => NOW);
}

describe('NextBestActionAgent', () => {
  it('should propose a follow-up email due in a day', () => {
    const [email] = setup().propose(task());
    expect(email).toMatchObject({
      actionType: 'follow_up_email',
      actionScope: 'hybrid',
      agentType: 'next_best_action',
      traceId: 'trace-1',
      parameters: { relevanceCriteria: { contactStatus: ['active', 'lead', 'prospect'] } },
      payload: { kind: 'scheduled_follow_up', channel: 'email', dueAt: new Date('2024-06-16T12:00:00.000Z') },
    });
  });

  it('should add industry and assignment proposals', () => {
    const proposals = setup().propose(task({ industry: 'Real_Estate', context: { contactId: 'c1', organizationId: 'org-1', assigneeId: 'rep-7' } }));
    expect(proposals.map((p) => [p.actionType, p.actionScope])).toEqual([
      ['follow_up_email', 'hybrid'],
      ['property_recommendation', 'real_world'],
      ['assign_owner', 'inner_world'],
    ]);
    expect(proposals[2].payload).toEqual({ kind: 'resource_assignment', resourceId: 'c1', assigneeId: 'rep-7' });
  });

  it('should return only validated actions', async () => {
    const result = await setup().executeTask(task({ industry: 'real_estate' }));

    expect(result).toMatchObject({
      success: true,
      content: 'Proposed 2 action(s); 2 passed validation.',
      confidence: 0.95,
      data: { contactId: 'c1', organizationId: 'org-1', proposed: 2, kept: 2 },
    });
    expect(result.actions?.map((a) => [a.actionType, a.requiresApproval, a.validationReason])).toEqual([
      ['follow_up_email', false, 'Hybrid: still relevant'],
      ['property_recommendation', true, 'Real world: still relevant'],
    ]);
    expect(result.actions?.[1].approvalRequestId).not.toBe('');
  });

  it('should report neutral confidence when nothing survives', async () => {
    const result = await setup(0.2).executeTask(task());
    expect(result).toMatchObject({ content: 'Proposed 1 action(s); 0 passed validation.', confidence: 0.5, actions: [] });
  });

  it('should fail without a contact', async () => {
    expect(await setup().executeTask(task({ context: { contactId: 'c1' } }))).toEqual({
      success: false,
      content: '',
      confidence: 0,
      errorMessage: 'contactId and organizationId are required in the request context',
    });
  });
});
