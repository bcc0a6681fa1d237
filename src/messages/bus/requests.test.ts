import { describe, it, expect } from 'vitest';
import { createAgentRequest, createFollowUpRequest, selectBestAgent, toAgentTask } from './requests';
import { AgentCapability, AgentResponse } from '../../core/types';

function candidate(agentId: string, successRate: number, averageResponseTimeMs: number, isActive = true): AgentCapability {
  return {
    agentId,
    agentName: agentId,
    version: '1',
    agentType: 'contact',
    supportedIntents: ['contact_management'],
    supportedTasks: [],
    supportedIndustries: [],
    requiredPermissions: [],
    isActive,
    performanceMetrics: {
      successRate,
      averageResponseTimeMs,
      averageConfidence: 0.5,
      totalRequests: 10,
      successfulRequests: 5,
      lastUpdated: new Date(0),
    },
  };
}

describe('createAgentRequest', () => {
  it('should fill in defaults', () => {
    const request = createAgentRequest({ intent: 'communication', originalUserInput: 'email Sam' });
    expect(request.urgency).toBe('medium');
    expect(request.context).toEqual({});
    expect(request.traceId).toMatch(/^[0-9a-f-]{36}$/);
    expect(request.id).not.toBe(request.traceId);
  });

  it('should keep a caller trace id', () => {
    expect(createAgentRequest({ intent: 'communication', originalUserInput: 'x', traceId: 't-1' }).traceId).toBe('t-1');
  });
});

describe('createFollowUpRequest', () => {
  it('should carry the trace and hand the previous output on', () => {
    const previous = createAgentRequest({
      intent: 'intent_classification',
      originalUserInput: 'book a viewing',
      traceId: 'trace-1',
      userId: 'u1',
      industry: 'real_estate',
      urgency: 'high',
    });
    const response: AgentResponse = {
      id: 'r1',
      requestId: previous.id,
      traceId: 'trace-1',
      success: true,
      content: 'book a viewing',
      retryable: false,
      confidence: 0.6,
      processingTimeMs: 3,
      agentId: 'classifier',
      requiresFollowUp: true,
      nextIntent: 'scheduling_and_tasks',
      data: { contactId: 'c1' },
      actions: [],
      orchestrationMethod: 'custom',
      createdAt: new Date(),
    };

    const next = createFollowUpRequest(previous, response, 'scheduling_and_tasks');
    expect(next).toMatchObject({
      traceId: 'trace-1',
      intent: 'scheduling_and_tasks',
      originalUserInput: 'book a viewing',
      context: { contactId: 'c1' },
      sourceAgentId: 'classifier',
      userId: 'u1',
      industry: 'real_estate',
      urgency: 'high',
    });
    expect(next.id).not.toBe(previous.id);
    expect(next.context).not.toBe(response.data);
  });
});

describe('toAgentTask', () => {
  it('should type the task with the intent actually served', () => {
    const request = createAgentRequest({ intent: 'report_generation', originalUserInput: 'weekly report', context: { a: 1 } });
    const task = toAgentTask(request, 'general_inquiry');
    expect(task.type).toBe('general_inquiry');
    expect(task.description).toBe('weekly report');
    expect(task.context).toEqual({ a: 1 });
    expect(task.context).not.toBe(request.context);
  });
});

describe('selectBestAgent', () => {
  it('should prefer the higher success rate over lower latency', () => {
    const a = candidate('A', 0.9, 2000);
    const b = candidate('B', 0.95, 5000);
    expect(selectBestAgent([a, b])?.agentId).toBe('B');
  });

  it('should break ties on latency then agent id', () => {
    expect(selectBestAgent([candidate('x', 0.8, 300), candidate('y', 0.8, 100)])?.agentId).toBe('y');
    expect(selectBestAgent([candidate('m', 0.8, 100), candidate('k', 0.8, 100)])?.agentId).toBe('k');
  });

  it('should skip inactive candidates', () => {
    expect(selectBestAgent([candidate('off', 1, 1, false)])).toBeUndefined();
    expect(selectBestAgent([])).toBeUndefined();
  });
});
