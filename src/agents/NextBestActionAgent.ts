import { v4 as uuidv4 } from 'uuid';
import { AgentAction, AgentHandle, AgentTask, AgentTaskResult, isRecord } from '../core/types';
import { AgentActionValidator } from '../validation/actions/AgentActionValidator';

const DAY_MS = 86400000;
const ACTIVE_STATUSES = ['active', 'lead', 'prospect'];

/**
 * Proposes follow-ups for the contact named in the request context and only
 * returns the ones that survive validation.
 */
export class NextBestActionAgent implements AgentHandle {
  constructor(
    private readonly agentId: string,
    private readonly agentType: string,
    private readonly actionValidator: AgentActionValidator,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async executeTask(task: AgentTask): Promise<AgentTaskResult> {
    const contactId = readString(task.context, 'contactId');
    const organizationId = readString(task.context, 'organizationId');
    if (!contactId || !organizationId) {
      return {
        success: false,
        content: '',
        confidence: 0,
        errorMessage: 'contactId and organizationId are required in the request context',
      };
    }

    const proposals = this.propose(task);
    const userOverrides = isRecord(task.context.userOverrides) ? task.context.userOverrides : {};
    const validated = await this.actionValidator.validateAgentActions(
      proposals,
      { contactId, organizationId, userId: task.userId ?? 'system', agentId: this.agentId },
      userOverrides,
      task.traceId,
    );

    const confidence =
      validated.length === 0 ? 0.5 : validated.reduce((sum, a) => sum + a.confidenceScore, 0) / validated.length;
    return {
      success: true,
      content: `Proposed ${proposals.length} action(s); ${validated.length} passed validation.`,
      confidence,
      data: { contactId, organizationId, proposed: proposals.length, kept: validated.length },
      actions: validated,
    };
  }

  propose(task: AgentTask): AgentAction[] {
    const now = this.now();
    const proposals: AgentAction[] = [
      this.action(task, {
        actionType: 'follow_up_email',
        description: 'Send a follow-up email about the latest conversation',
        priority: 2,
        actionScope: 'hybrid',
        parameters: { relevanceCriteria: { contactStatus: ACTIVE_STATUSES } },
        payload: { kind: 'scheduled_follow_up', channel: 'email', dueAt: new Date(now.getTime() + DAY_MS) },
      }),
    ];

    if (task.industry?.toLowerCase() === 'real_estate') {
      proposals.push(
        this.action(task, {
          actionType: 'property_recommendation',
          description: 'Recommend listings matching the saved search',
          priority: 3,
          actionScope: 'real_world',
          parameters: { relevanceCriteria: { contactStatus: ACTIVE_STATUSES, lastInteractionAge: 30 } },
          payload: { kind: 'recommendation', title: 'New listings for you' },
        }),
      );
    }

    const assigneeId = readString(task.context, 'assigneeId');
    if (assigneeId) {
      proposals.push(
        this.action(task, {
          actionType: 'assign_owner',
          description: `Assign the contact to ${assigneeId}`,
          priority: 1,
          actionScope: 'inner_world',
          parameters: {},
          payload: { kind: 'resource_assignment', resourceId: readString(task.context, 'contactId') ?? '', assigneeId },
        }),
      );
    }
    return proposals;
  }

  private action(
    task: AgentTask,
    fields: Pick<AgentAction, 'actionType' | 'description' | 'priority' | 'actionScope' | 'parameters' | 'payload'>,
  ): AgentAction {
    return {
      id: uuidv4(),
      ...fields,
      confidenceScore: 0,
      validationReason: '',
      requiresApproval: false,
      approvalRequestId: '',
      traceId: task.traceId,
      agentType: this.agentType,
    };
  }
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}
