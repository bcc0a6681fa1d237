import { WorkflowState } from '../../core/types';

/**
 * Persistence for workflow state, keyed by workflow id. Reads return
 * snapshots: mutating a returned state never changes what is stored.
 */
export interface WorkflowStateStore {
  get(workflowId: string): Promise<WorkflowState | undefined>;
  save(state: WorkflowState): Promise<void>;
  /** Removes terminal workflows completed before `olderThan`; returns how many went. */
  prune(olderThan: Date): Promise<number>;
}

export class InMemoryWorkflowStateStore implements WorkflowStateStore {
  private states: Map<string, WorkflowState> = new Map();

  async get(workflowId: string): Promise<WorkflowState | undefined> {
    const state = this.states.get(workflowId);
    return state ? structuredClone(state) : undefined;
  }

  async save(state: WorkflowState): Promise<void> {
    this.states.set(state.workflowId, structuredClone(state));
  }

  async prune(olderThan: Date): Promise<number> {
    let removed = 0;
    for (const [workflowId, state] of this.states.entries()) {
      if (state.isCompleted || state.currentState === 'error') {
        const finishedAt = state.completedAt ?? state.startedAt;
        if (finishedAt < olderThan) {
          this.states.delete(workflowId);
          removed++;
        }
      }
    }
    return removed;
  }

  size(): number {
    return this.states.size;
  }
}
