import { z } from 'zod';
import { AGENT_INTENTS, AgentHandle, AgentIntent, AgentTask, AgentTaskResult, TextCompletion } from '../core/types';
import { errorMessage } from '../core/errors';
import { extractJsonObject } from '../integrations/llm/json';
import { LogAggregator } from '../monitoring/core/Monitoring';

const SYSTEM_PROMPT = [
  'Classify the user message into exactly one of these intents:',
  AGENT_INTENTS.join(', '),
  'Answer with a single JSON object: {"intent": string, "confidence": number between 0 and 1}.',
].join('\n');

const classificationSchema = z.object({
  intent: z.enum(AGENT_INTENTS),
  confidence: z.number().min(0).max(1),
});

const KEYWORDS: [RegExp, AgentIntent][] = [
  [/\b(schedule|meeting|appointment|remind|task)s?\b/i, 'scheduling_and_tasks'],
  [/\b(report|summary|dashboard)s?\b/i, 'report_generation'],
  [/\b(market|pricing|competitor)s?\b/i, 'market_intelligence'],
  [/\b(email|call|message|text)s?\b/i, 'communication'],
  [/\b(contact|client|lead)s?\b/i, 'contact_management'],
];

export interface Classification {
  intent: AgentIntent;
  confidence: number;
  method: 'llm' | 'keywords';
}

export function classifyByKeywords(text: string): Classification {
  for (const [pattern, intent] of KEYWORDS) {
    if (pattern.test(text)) {
      return { intent, confidence: 0.6, method: 'keywords' };
    }
  }
  return { intent: 'general_inquiry', confidence: 0.3, method: 'keywords' };
}

/**
 * Works out what the user wants and hands the original input on to the
 * agent serving that intent as a workflow follow-up.
 */
export class IntentClassificationAgent implements AgentHandle {
  constructor(
    private readonly completion?: TextCompletion,
    private readonly logs?: LogAggregator,
  ) {}

  async executeTask(task: AgentTask, signal?: AbortSignal): Promise<AgentTaskResult> {
    const classification = await this.classify(task, signal);
    const nextIntent = routable(classification.intent);

    return {
      success: true,
      content: task.description,
      confidence: classification.confidence,
      requiresFollowUp: true,
      nextIntent,
      data: {
        ...task.context,
        classifiedIntent: classification.intent,
        classificationConfidence: classification.confidence,
        classificationMethod: classification.method,
      },
    };
  }

  private async classify(task: AgentTask, signal?: AbortSignal): Promise<Classification> {
    if (!this.completion) {
      return classifyByKeywords(task.description);
    }
    try {
      const raw = await this.completion.complete(SYSTEM_PROMPT, task.description, task.conversationId, signal);
      const parsed = classificationSchema.parse(extractJsonObject(raw));
      return { ...parsed, method: 'llm' };
    } catch (error) {
      this.logs?.warn('Intent classification fell back to keywords', { traceId: task.traceId, error: errorMessage(error) });
      return classifyByKeywords(task.description);
    }
  }
}

/** Classifying into a classifier intent would loop; send those to the fallback. */
function routable(intent: AgentIntent): AgentIntent {
  return intent === 'intent_classification' || intent === 'unknown' ? 'general_inquiry' : intent;
}
