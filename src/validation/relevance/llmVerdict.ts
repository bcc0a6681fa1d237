import { z } from 'zod';
import { ContactContext, LlmRelevanceVerdict, ScheduledAction } from '../../core/types';
import { LlmResponseError } from '../../core/errors';
import { extractJsonObject } from '../../integrations/llm/json';

export const RELEVANCE_SYSTEM_PROMPT = [
  'You review actions that an assistant scheduled for a customer relationship.',
  'Decide whether the action is still relevant given the current contact context.',
  'Answer with a single JSON object and nothing else:',
  '{"isRelevant": boolean, "confidence": number between 0 and 1, "reasoning": string,',
  ' "recommendedAction": string (optional), "alternativeActions": string[] (optional)}',
].join('\n');

const verdictSchema = z
  .object({
    isRelevant: z.boolean(),
    confidence: z.number().min(0).max(1).optional(),
    confidenceScore: z.number().min(0).max(1).optional(),
    reasoning: z.string().optional(),
    reason: z.string().optional(),
    recommendedAction: z.string().optional(),
    alternativeActions: z.array(z.string()).optional(),
  })
  .refine((v) => v.confidence !== undefined || v.confidenceScore !== undefined, {
    message: 'confidence is required',
  });

export function buildRelevancePrompt(
  action: ScheduledAction,
  context: ContactContext,
  userOverrides: Record<string, unknown> = {},
): string {
  const lines = [
    '## Scheduled action',
    `Type: ${action.actionType}`,
    `Description: ${action.description}`,
    `Scheduled at: ${action.scheduledAt.toISOString()}`,
    `Execute at: ${action.executeAt.toISOString()}`,
    `Priority: ${action.priority}`,
    `Parameters: ${JSON.stringify(action.parameters)}`,
    '',
    '## Contact context',
    `Status: ${context.contactStatus ?? 'unknown'}`,
    `Relationship stage: ${context.relationshipStage ?? 'unknown'}`,
    `Deal status: ${context.dealStatus ?? 'unknown'}`,
    `Engagement: ${context.engagementLevel ?? 'unknown'}`,
    `Sentiment: ${context.sentimentScore ?? 'unknown'}`,
    `Last interaction: ${context.lastInteractionAt ? context.lastInteractionAt.toISOString() : 'none recorded'}`,
  ];
  if (context.interactionSummary) {
    lines.push(`Recent interactions: ${context.interactionSummary}`);
  }
  if (Object.keys(userOverrides).length > 0) {
    lines.push('', '## User preferences', JSON.stringify(userOverrides));
  }
  return lines.join('\n');
}

/** Throws LlmResponseError when the output is not a well-formed verdict. */
export function parseLlmVerdict(raw: string): LlmRelevanceVerdict {
  const parsed = verdictSchema.safeParse(extractJsonObject(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'response'}: ${i.message}`).join('; ');
    throw new LlmResponseError(`Failed to parse LLM response: ${issues}`, raw);
  }

  const verdict = parsed.data;
  const reasoning = (verdict.reasoning ?? verdict.reason ?? '').trim();
  return {
    isRelevant: verdict.isRelevant,
    confidence: verdict.confidence ?? verdict.confidenceScore ?? 0,
    reasoning: reasoning || 'No reasoning given by the language model',
    recommendedAction: verdict.recommendedAction,
    alternativeActions: verdict.alternativeActions ?? [],
  };
}
