import { AgentHandle, AgentTask, AgentTaskResult, TextCompletion } from '../core/types';

const SYSTEM_PROMPT =
  'You are a helpful assistant for a customer relationship team. Answer briefly and say so when you are unsure.';

/** Fallback agent: answers anything, with low confidence when no model is wired. */
export class GeneralInquiryAgent implements AgentHandle {
  constructor(private readonly completion?: TextCompletion) {}

  async executeTask(task: AgentTask, signal?: AbortSignal): Promise<AgentTaskResult> {
    if (!this.completion) {
      return {
        success: true,
        content: `Received: "${task.description}". No assistant model is configured, so this was queued for a person.`,
        confidence: 0.3,
        data: { queuedForReview: true },
      };
    }

    const answer = await this.completion.complete(SYSTEM_PROMPT, task.description, task.conversationId, signal);
    return {
      success: true,
      content: answer.trim(),
      confidence: 0.7,
    };
  }
}
