import { describe, it, expect } from 'vitest';
import { evaluateContextualFreshness, evaluateCriterion, evaluateRelevanceCriteria } from './rules';
import { DEFAULT_RELEVANCE_CONFIG } from './config';
import { ContactContext, ScheduledAction } from '../../core/types';

const NOW = new Date('2024-06-15T12:00:00.000Z');

function context(overrides: Partial<ContactContext> = {}): ContactContext {
  return {
    contactId: 'c1',
    organizationId: 'org-1',
    contactStatus: 'Active',
    sentimentScore: 0.2,
    lastInteractionAt: new Date('2024-06-10T12:00:00.000Z'),
    customProperties: {},
    retrievedAt: NOW,
    ...overrides,
  };
}

function action(overrides: Partial<ScheduledAction> = {}): ScheduledAction {
  return {
    id: 'act-1',
    actionType: 'follow_up_email',
    description: 'Follow up',
    contactId: 'c1',
    organizationId: 'org-1',
    scheduledByAgentId: 'nba',
    scheduledAt: new Date('2024-06-12T12:00:00.000Z'),
    executeAt: new Date('2024-06-16T12:00:00.000Z'),
    parameters: {},
    relevanceCriteria: {},
    status: 'pending',
    priority: 1,
    actionScope: 'hybrid',
    ...overrides,
  };
}

describe('evaluateCriterion', () => {
  it('should match text criteria case-insensitively against one or many values', () => {
    expect(evaluateCriterion('contactStatus', 'active', context())).toBe('pass');
    expect(evaluateCriterion('contactStatus', ['lead', 'ACTIVE'], context())).toBe('pass');
    expect(evaluateCriterion('contactStatus', ['lead'], context())).toBe('fail');
  });

  it('should be unknown without data or with a malformed expectation', () => {
    expect(evaluateCriterion('dealStatus', 'open', context())).toBe('unknown');
    expect(evaluateCriterion('contactStatus', ['active', 3], context())).toBe('unknown');
    expect(evaluateCriterion('favoriteColor', 'blue', context())).toBe('unknown');
  });

  it('should compare interaction age in days and sentiment floors', () => {
    expect(evaluateCriterion('lastInteractionAge', 5, context(), NOW)).toBe('pass');
    expect(evaluateCriterion('lastInteractionAge', 3, context(), NOW)).toBe('fail');
    expect(evaluateCriterion('minSentiment', 0.2, context())).toBe('pass');
    expect(evaluateCriterion('minSentiment', 0.5, context())).toBe('fail');
  });
});

describe('evaluateRelevanceCriteria', () => {
  it('should pass when every criterion passes', () => {
    expect(evaluateRelevanceCriteria({ contactStatus: ['active', 'lead'], minSentiment: 0 }, context(), undefined, NOW)).toEqual({
      tier: 1,
      verdict: 'relevant',
      confidence: 1,
      reasoning: 'All relevance criteria passed',
      failedCriteria: [],
    });
  });

  it('should go stale with confidence growing with the share of failures', () => {
    const outcome = evaluateRelevanceCriteria(
      { contactStatus: 'closed', lastInteractionAge: 30, minSentiment: 0 },
      context(),
      undefined,
      NOW,
    );
    expect(outcome.verdict).toBe('stale');
    expect(outcome.confidence).toBeCloseTo(0.5 + 0.5 / 3);
    expect(outcome.reasoning).toBe('Failed criteria: contactStatus');
    expect(outcome.failedCriteria).toEqual(['contactStatus']);
  });

  it('should be inconclusive when a criterion cannot be judged', () => {
    const outcome = evaluateRelevanceCriteria({ contactStatus: 'active', favoriteColor: 'blue' }, context(), undefined, NOW);
    expect(outcome).toMatchObject({ verdict: 'inconclusive', confidence: 0.5, reasoning: 'Could not evaluate criteria: favoriteColor' });
  });

  it('should be inconclusive with no criteria', () => {
    expect(evaluateRelevanceCriteria({}, context(), undefined, NOW).reasoning).toBe('No relevance criteria to evaluate');
  });

  it('should treat an expired action as stale regardless of criteria', () => {
    const expired = action({ expiresAt: new Date('2024-06-15T00:00:00.000Z') });
    expect(evaluateRelevanceCriteria({ contactStatus: 'active' }, context(), expired, NOW)).toEqual({
      tier: 1,
      verdict: 'stale',
      confidence: 1,
      reasoning: 'Action expired at 2024-06-15T00:00:00.000Z',
      failedCriteria: ['expiresAt'],
    });
  });
});

describe('evaluateContextualFreshness', () => {
  const config = DEFAULT_RELEVANCE_CONFIG;

  it('should mark closed contacts stale', () => {
    expect(evaluateContextualFreshness(action(), context({ contactStatus: 'Do_Not_Contact' }), config, NOW)).toMatchObject({
      tier: 2,
      verdict: 'stale',
      confidence: 0.9,
      reasoning: "Contact status is 'Do_Not_Contact'",
    });
  });

  it('should mark strongly negative sentiment stale', () => {
    expect(evaluateContextualFreshness(action(), context({ sentimentScore: -0.7 }), config, NOW)).toMatchObject({
      verdict: 'stale',
      confidence: 0.8,
      reasoning: 'Contact sentiment -0.7 is below -0.5',
    });
  });

  it('should call recent activity before scheduling relevant', () => {
    expect(evaluateContextualFreshness(action(), context(), config, NOW)).toMatchObject({
      verdict: 'relevant',
      confidence: 0.8,
      reasoning: 'Contact interacted 5 day(s) ago',
    });
  });

  it('should be inconclusive when the contact moved on after scheduling', () => {
    const later = context({ lastInteractionAt: new Date('2024-06-14T12:00:00.000Z') });
    expect(evaluateContextualFreshness(action(), later, config, NOW)).toMatchObject({
      verdict: 'inconclusive',
      reasoning: 'Contact interacted after the action was scheduled',
    });
  });

  it('should be inconclusive without recent activity', () => {
    const quiet = context({ lastInteractionAt: new Date('2024-05-01T12:00:00.000Z') });
    expect(evaluateContextualFreshness(action({ scheduledAt: NOW }), quiet, config, NOW).reasoning).toBe(
      'Not enough recent activity to judge freshness',
    );
  });
});
