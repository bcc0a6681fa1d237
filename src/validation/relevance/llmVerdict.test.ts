import { describe, it, expect } from 'vitest';
import { buildRelevancePrompt, parseLlmVerdict } from './llmVerdict';
import { extractJsonObject } from '../../integrations/llm/json';
import { LlmResponseError } from '../../core/errors';
import { ContactContext, ScheduledAction } from '../../core/types';

describe('extractJsonObject', () => {
  it('should read fenced and bare objects', () => {
    expect(extractJsonObject('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    expect(extractJsonObject('Sure! {"a": {"b": 2}} hope that helps')).toEqual({ a: { b: 2 } });
  });

  it('should reject output without an object', () => {
    expect(() => extractJsonObject('I cannot help with that')).toThrow(
      new LlmResponseError('Failed to parse LLM response: no JSON object found'),
    );
  });

  it('should reject malformed JSON', () => {
    expect(() => extractJsonObject('{"a": }')).toThrow(LlmResponseError);
  });
});

describe('parseLlmVerdict', () => {
  it('should accept the documented shape', () => {
    expect(
      parseLlmVerdict('{"isRelevant": true, "confidence": 0.85, "reasoning": " Contact asked for this ", "alternativeActions": ["call"]}'),
    ).toEqual({
      isRelevant: true,
      confidence: 0.85,
      reasoning: 'Contact asked for this',
      recommendedAction: undefined,
      alternativeActions: ['call'],
    });
  });

  it('should accept confidenceScore and reason aliases', () => {
    expect(parseLlmVerdict('{"isRelevant": false, "confidenceScore": 0.4, "reason": "Deal closed"}')).toMatchObject({
      isRelevant: false,
      confidence: 0.4,
      reasoning: 'Deal closed',
      alternativeActions: [],
    });
  });

  it('should fill in missing reasoning', () => {
    expect(parseLlmVerdict('{"isRelevant": true, "confidence": 1}').reasoning).toBe('No reasoning given by the language model');
  });

  it('should reject a verdict without confidence', () => {
    expect(() => parseLlmVerdict('{"isRelevant": true}')).toThrow('Failed to parse LLM response: response: confidence is required');
  });

  it('should reject out-of-range confidence', () => {
    expect(() => parseLlmVerdict('{"isRelevant": true, "confidence": 3}')).toThrow(LlmResponseError);
  });
});

describe('buildRelevancePrompt', () => {
  const action: ScheduledAction = {
    id: 'act-1',
    actionType: 'congrats_email',
    description: 'Congratulate on closing',
    contactId: 'c1',
    organizationId: 'org-1',
    scheduledByAgentId: 'nba',
    scheduledAt: new Date('2024-06-12T12:00:00.000Z'),
    executeAt: new Date('2024-06-16T12:00:00.000Z'),
    parameters: { template: 'congrats' },
    relevanceCriteria: {},
    status: 'pending',
    priority: 2,
    actionScope: 'hybrid',
  };
  const context: ContactContext = {
    contactId: 'c1',
    organizationId: 'org-1',
    contactStatus: 'active',
    customProperties: {},
    retrievedAt: new Date('2024-06-15T12:00:00.000Z'),
  };

  it('should describe the action and the contact', () => {
    const lines = buildRelevancePrompt(action, context).split('\n');
    expect(lines).toContain('Type: congrats_email');
    expect(lines).toContain('Parameters: {"template":"congrats"}');
    expect(lines).toContain('Status: active');
    expect(lines).toContain('Last interaction: none recorded');
    expect(lines).not.toContain('## User preferences');
  });

  it('should add user preferences when given', () => {
    const prompt = buildRelevancePrompt(action, context, { tone: 'formal' });
    expect(prompt.endsWith('## User preferences\n{"tone":"formal"}')).toBe(true);
  });
});
