import { describe, it, expect, vi } from 'vitest';
import { IntentClassificationAgent, classifyByKeywords } from './IntentClassificationAgent';
import { AgentTask, TextCompletion } from '../core/types';
import { LogAggregator } from '../monitoring/core/Monitoring';

function task(description: string): AgentTask {
  return {
    id: 'task-1',
    traceId: 'trace-1',
    type: 'intent_classification',
    description,
    conversationId: 'conv-1',
    context: { contactId: 'c1' },
    urgency: 'medium',
    createdAt: new Date('2024-06-15T12:00:00.000Z'),
  };
}

describe('classifyByKeywords', () => {
  it('should take the first matching keyword group', () => {
    expect(classifyByKeywords('Schedule a call with the client')).toEqual({
      intent: 'scheduling_and_tasks',
      confidence: 0.6,
      method: 'keywords',
    });
    expect(classifyByKeywords('What are competitors charging?').intent).toBe('market_intelligence');
    expect(classifyByKeywords('Add a new lead').intent).toBe('contact_management');
  });

  it('should fall back to a general inquiry', () => {
    expect(classifyByKeywords('hello there')).toEqual({ intent: 'general_inquiry', confidence: 0.3, method: 'keywords' });
  });
});

describe('IntentClassificationAgent', () => {
  it('should hand the input on to the classified intent', async () => {
    const complete = vi.fn().mockResolvedValue('```json\n{"intent": "report_generation", "confidence": 0.92}\n```');
    const agent = new IntentClassificationAgent({ complete });

    const result = await agent.executeTask(task('How did Q2 go?'));

    expect(result).toEqual({
      success: true,
      content: 'How did Q2 go?',
      confidence: 0.92,
      requiresFollowUp: true,
      nextIntent: 'report_generation',
      data: {
        contactId: 'c1',
        classifiedIntent: 'report_generation',
        classificationConfidence: 0.92,
        classificationMethod: 'llm',
      },
    });
    expect(complete).toHaveBeenCalledWith(expect.stringContaining('Classify the user message'), 'How did Q2 go?', 'conv-1', undefined);
  });

  it('should not route back to itself', async () => {
    const completion: TextCompletion = { complete: async () => '{"intent": "intent_classification", "confidence": 0.8}' };
    const result = await new IntentClassificationAgent(completion).executeTask(task('hmm'));
    expect(result.nextIntent).toBe('general_inquiry');
    expect(result.data?.classifiedIntent).toBe('intent_classification');
  });

  it('should use keywords without a model or when the model answers badly', async () => {
    const logs = new LogAggregator({ silent: true });
    const garbled: TextCompletion = { complete: async () => '{"intent": "astrology", "confidence": 2}' };

    const offline = await new IntentClassificationAgent().executeTask(task('Email the team'));
    const fallback = await new IntentClassificationAgent(garbled, logs).executeTask(task('Email the team'));

    expect(offline.nextIntent).toBe('communication');
    expect(fallback).toMatchObject({ nextIntent: 'communication', confidence: 0.6 });
    expect(logs.query({ level: 'warn' }).map((l) => l.message)).toEqual(['Intent classification fell back to keywords']);
  });
});
