import { WorkflowState } from '../../core/types';
import { WorkflowStateStore } from './WorkflowStateStore';

/** The subset of an ioredis client this store talks to. */
export interface WorkflowRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
}

const DATE_FIELDS = new Set(['createdAt', 'startedAt', 'completedAt', 'lastUpdated', 'dueAt', 'suggestedTiming']);
const ISO_DATE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

export class RedisWorkflowStateStore implements WorkflowStateStore {
  constructor(
    private readonly redis: WorkflowRedisClient,
    private readonly ttlSeconds: number = 86400,
    private readonly keyPrefix: string = 'workflow:',
  ) {}

  async get(workflowId: string): Promise<WorkflowState | undefined> {
    const raw = await this.redis.get(this.keyPrefix + workflowId);
    if (raw === null) return undefined;
    return parseWorkflowState(raw);
  }

  async save(state: WorkflowState): Promise<void> {
    await this.redis.set(this.keyPrefix + state.workflowId, JSON.stringify(state), 'EX', this.ttlSeconds);
  }

  /** Entries expire through their key TTL, so there is nothing to sweep. */
  async prune(_olderThan: Date): Promise<number> {
    return 0;
  }
}

export function parseWorkflowState(raw: string): WorkflowState {
  return JSON.parse(raw, (key: string, value: unknown) => {
    if (DATE_FIELDS.has(key) && typeof value === 'string' && ISO_DATE.test(value)) {
      return new Date(value);
    }
    return value;
  });
}
