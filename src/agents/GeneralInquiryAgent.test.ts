import { describe, it, expect } from 'vitest';
import { GeneralInquiryAgent } from './GeneralInquiryAgent';
import { AgentTask } from '../core/types';

const task: AgentTask = {
  id: 'task-1',
  traceId: 'trace-1',
  type: 'general_inquiry',
  description: 'What are your opening hours?',
  context: {},
  urgency: 'low',
  createdAt: new Date('2024-06-15T12:00:00.000Z'),
};

describe('GeneralInquiryAgent', () => {
  it('should answer with the model', async () => {
    const agent = new GeneralInquiryAgent({ complete: async () => '  Nine to five.\n' });
    expect(await agent.executeTask(task)).toEqual({ success: true, content: 'Nine to five.', confidence: 0.7 });
  });

  it('should queue the question for a person without a model', async () => {
    expect(await new GeneralInquiryAgent().executeTask(task)).toEqual({
      success: true,
      content: 'Received: "What are your opening hours?". No assistant model is configured, so this was queued for a person.',
      confidence: 0.3,
      data: { queuedForReview: true },
    });
  });
});
