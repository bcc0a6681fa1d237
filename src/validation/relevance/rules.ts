import { ActionRelevanceConfig, ContactContext, ScheduledAction, TierOutcome } from '../../core/types';

const DAY_MS = 86400000;

export type CriterionOutcome = 'pass' | 'fail' | 'unknown';

type CriterionHandler = (expected: unknown, context: ContactContext, now: Date) => CriterionOutcome;

function matchText(read: (context: ContactContext) => string | undefined): CriterionHandler {
  return (expected, context) => {
    const actual = read(context);
    if (actual === undefined) return 'unknown';
    const candidates: unknown[] = Array.isArray(expected) ? expected : [expected];
    const allowed = candidates.filter((v): v is string => typeof v === 'string');
    if (allowed.length === 0 || allowed.length !== candidates.length) return 'unknown';
    const normalized = actual.toLowerCase();
    return allowed.some((v) => v.toLowerCase() === normalized) ? 'pass' : 'fail';
  };
}

const CRITERIA: Record<string, CriterionHandler> = {
  contactStatus: matchText((c) => c.contactStatus),
  relationshipStage: matchText((c) => c.relationshipStage),
  dealStatus: matchText((c) => c.dealStatus),
  engagementLevel: matchText((c) => c.engagementLevel),
  lastInteractionAge: (expected, context, now) => {
    if (typeof expected !== 'number' || !context.lastInteractionAt) return 'unknown';
    const ageDays = (now.getTime() - context.lastInteractionAt.getTime()) / DAY_MS;
    return ageDays <= expected ? 'pass' : 'fail';
  },
  minSentiment: (expected, context) => {
    if (typeof expected !== 'number' || context.sentimentScore === undefined) return 'unknown';
    return context.sentimentScore >= expected ? 'pass' : 'fail';
  },
};

export function evaluateCriterion(name: string, expected: unknown, context: ContactContext, now: Date = new Date()): CriterionOutcome {
  const handler = CRITERIA[name];
  return handler ? handler(expected, context, now) : 'unknown';
}

/**
 * Tier 1. Expired actions are stale outright; otherwise each criterion is
 * checked against the contact. Criteria the table does not know, or cannot
 * judge for lack of data, leave the verdict inconclusive.
 */
export function evaluateRelevanceCriteria(
  criteria: Record<string, unknown>,
  context: ContactContext,
  action?: ScheduledAction,
  now: Date = new Date(),
): TierOutcome {
  if (action?.expiresAt && action.expiresAt.getTime() <= now.getTime()) {
    return {
      tier: 1,
      verdict: 'stale',
      confidence: 1,
      reasoning: `Action expired at ${action.expiresAt.toISOString()}`,
      failedCriteria: ['expiresAt'],
    };
  }

  const failed: string[] = [];
  const unknown: string[] = [];
  let passed = 0;
  for (const [name, expected] of Object.entries(criteria)) {
    const outcome = evaluateCriterion(name, expected, context, now);
    if (outcome === 'pass') passed++;
    else if (outcome === 'fail') failed.push(name);
    else unknown.push(name);
  }

  if (failed.length > 0) {
    return {
      tier: 1,
      verdict: 'stale',
      confidence: 0.5 + (0.5 * failed.length) / (passed + failed.length),
      reasoning: `Failed criteria: ${failed.join(', ')}`,
      failedCriteria: failed,
    };
  }
  if (passed > 0 && unknown.length === 0) {
    return { tier: 1, verdict: 'relevant', confidence: 1, reasoning: 'All relevance criteria passed', failedCriteria: [] };
  }
  return {
    tier: 1,
    verdict: 'inconclusive',
    confidence: 0.5,
    reasoning: unknown.length > 0 ? `Could not evaluate criteria: ${unknown.join(', ')}` : 'No relevance criteria to evaluate',
    failedCriteria: [],
  };
}

/** Tier 2. Judges freshness from what has happened to the contact since scheduling. */
export function evaluateContextualFreshness(
  action: ScheduledAction,
  context: ContactContext,
  config: ActionRelevanceConfig,
  now: Date = new Date(),
): TierOutcome {
  const status = context.contactStatus?.toLowerCase();
  if (status && config.closedContactStatuses.includes(status)) {
    return {
      tier: 2,
      verdict: 'stale',
      confidence: 0.9,
      reasoning: `Contact status is '${context.contactStatus}'`,
      failedCriteria: [],
    };
  }

  if (context.sentimentScore !== undefined && context.sentimentScore < config.negativeSentimentThreshold) {
    return {
      tier: 2,
      verdict: 'stale',
      confidence: 0.8,
      reasoning: `Contact sentiment ${context.sentimentScore} is below ${config.negativeSentimentThreshold}`,
      failedCriteria: [],
    };
  }

  if (context.lastInteractionAt) {
    if (context.lastInteractionAt.getTime() > action.scheduledAt.getTime()) {
      return {
        tier: 2,
        verdict: 'inconclusive',
        confidence: 0.5,
        reasoning: 'Contact interacted after the action was scheduled',
        failedCriteria: [],
      };
    }
    const ageDays = Math.floor((now.getTime() - context.lastInteractionAt.getTime()) / DAY_MS);
    if (ageDays <= config.recentInteractionDays) {
      return {
        tier: 2,
        verdict: 'relevant',
        confidence: 0.8,
        reasoning: `Contact interacted ${ageDays} day(s) ago`,
        failedCriteria: [],
      };
    }
  }

  return {
    tier: 2,
    verdict: 'inconclusive',
    confidence: 0.5,
    reasoning: 'Not enough recent activity to judge freshness',
    failedCriteria: [],
  };
}
