import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  AgentCapability,
  AgentCapabilityInput,
  AgentHandle,
  AgentHealthStatus,
  AgentRequest,
  AgentResponse,
  AgentTaskResult,
  FALLBACK_INTENT,
  OrchestrationMethod,
  ResponseErrorKind,
  WorkflowState,
  isOrchestrationMethod,
} from '../../core/types';
import { CancelledError, TimeoutError, ValidationError, errorMessage } from '../../core/errors';
import { AgentRegistry } from '../../core/registry/AgentRegistry';
import { KeyedLock, SemaphorePool } from '../../core/concurrency/Semaphore';
import { withTimeout } from '../../core/concurrency/timeout';
import { InMemoryWorkflowStateStore, WorkflowStateStore } from '../../workflows/state/WorkflowStateStore';
import { ComplianceChecker } from '../../compliance/ComplianceChecker';
import { LogAggregator, MetricsCollector } from '../../monitoring/core/Monitoring';
import { createFollowUpRequest, selectBestAgent, toAgentTask } from './requests';

export interface BusSettings {
  defaultOrchestrationMethod: OrchestrationMethod;
  agentTimeoutMs: number;
  maxConcurrentPerAgentType: number;
  semaphoreWaitTimeoutMs: number;
  maxWorkflowHops: number;
  healthCheckIntervalMs: number;
  healthCheckTimeoutMs: number;
  housekeepingIntervalMs: number;
  idleSemaphoreMs: number;
  workflowRetentionMs: number;
}

export const DEFAULT_BUS_SETTINGS: BusSettings = {
  defaultOrchestrationMethod: 'custom',
  agentTimeoutMs: 30000,
  maxConcurrentPerAgentType: 5,
  semaphoreWaitTimeoutMs: 30000,
  maxWorkflowHops: 10,
  healthCheckIntervalMs: 60000,
  healthCheckTimeoutMs: 5000,
  housekeepingIntervalMs: 300000,
  idleSemaphoreMs: 600000,
  workflowRetentionMs: 86400000,
};

/** Periodic work that runs alongside the bus while it is started. */
export interface HousekeepingTask {
  name: string;
  run(now: Date, signal: AbortSignal): Promise<void> | void;
}

export interface AgentCommunicationBusDeps {
  registry: AgentRegistry;
  stateStore?: WorkflowStateStore;
  complianceChecker?: ComplianceChecker;
  housekeeping?: HousekeepingTask[];
  logs?: LogAggregator;
  metrics?: MetricsCollector;
  settings?: Partial<BusSettings>;
}

export interface RouteOptions {
  signal?: AbortSignal;
}

export class AgentCommunicationBus extends EventEmitter {
  private readonly registry: AgentRegistry;
  private readonly stateStore: WorkflowStateStore;
  private readonly complianceChecker?: ComplianceChecker;
  private readonly housekeepingTasks: HousekeepingTask[];
  private readonly logs?: LogAggregator;
  private readonly metrics?: MetricsCollector;
  private readonly settings: BusSettings;
  private readonly semaphores: SemaphorePool;
  private readonly workflowLocks = new KeyedLock();
  private orchestrationMethod: OrchestrationMethod;
  private lifetime: AbortController | null = null;
  private healthTimer: NodeJS.Timeout | null = null;
  private housekeepingTimer: NodeJS.Timeout | null = null;

  constructor(deps: AgentCommunicationBusDeps) {
    super();
    this.registry = deps.registry;
    this.stateStore = deps.stateStore ?? new InMemoryWorkflowStateStore();
    this.complianceChecker = deps.complianceChecker;
    this.housekeepingTasks = deps.housekeeping ?? [];
    this.logs = deps.logs;
    this.metrics = deps.metrics;
    this.settings = { ...DEFAULT_BUS_SETTINGS, ...deps.settings };
    this.semaphores = new SemaphorePool(this.settings.maxConcurrentPerAgentType);
    this.orchestrationMethod = this.settings.defaultOrchestrationMethod;
  }

  async routeRequest(request: AgentRequest, options: RouteOptions = {}): Promise<AgentResponse> {
    const startedAt = Date.now();
    const method = request.orchestrationMethod ?? this.orchestrationMethod;
    const dispatched: AgentRequest = Object.freeze({
      ...request,
      context: { ...request.context },
      orchestrationMethod: method,
    });

    this.logs?.info('Routing request', {
      traceId: dispatched.traceId,
      requestId: dispatched.id,
      intent: dispatched.intent,
      orchestrationMethod: method,
    });

    if (options.signal?.aborted) {
      return this.reject(dispatched, method, startedAt, 'cancelled', 'Request cancelled before dispatch');
    }

    let servedIntent = dispatched.intent;
    let candidates = this.registry.findAgentsForIntent(servedIntent, dispatched.industry);
    if (candidates.length === 0 && servedIntent !== FALLBACK_INTENT) {
      this.logs?.info('No agents for intent, falling back', { traceId: dispatched.traceId, intent: servedIntent });
      servedIntent = FALLBACK_INTENT;
      candidates = this.registry.findAgentsForIntent(servedIntent, dispatched.industry);
    }

    const selected = selectBestAgent(candidates);
    const registration = selected ? this.registry.getRegistration(selected.agentId) : undefined;
    if (!selected || !registration) {
      return this.reject(dispatched, method, startedAt, 'not_found', 'No suitable agents available');
    }

    const capability = registration.capability;
    let response: AgentResponse;
    try {
      const result = await this.invoke(registration.handle, capability, dispatched, servedIntent, options.signal);
      response = this.fromResult(dispatched, capability, method, startedAt, result);
    } catch (error) {
      response = this.fromError(dispatched, capability, method, startedAt, error);
    }

    this.registry.updateAgentMetrics(capability.agentId, response.processingTimeMs, response.success, response.confidence);
    this.metrics?.incrementCounter('requests_routed_total', {
      agentType: capability.agentType,
      outcome: response.success ? 'success' : 'failure',
    });
    this.metrics?.recordHistogram('agent_request_duration_ms', response.processingTimeMs, { agentType: capability.agentType });

    if (response.success) {
      this.emit('request:routed', response);
    } else {
      this.logs?.warn('Agent request failed', {
        traceId: response.traceId,
        agentId: capability.agentId,
        error: response.errorMessage,
        errorKind: response.errorKind,
      });
      this.emit('request:failed', response);
    }

    if (this.complianceChecker && response.actions.length > 0) {
      await this.complianceChecker.ensureCompliance(response, response.actions, response.traceId);
    }
    return response;
  }

  /**
   * Runs a request and every follow-up it asks for until the chain ends, a
   * step fails, the hop limit is hit, or the signal aborts. Runs for the same
   * workflow id are serialized.
   */
  async executeWorkflow(workflowId: string, initialRequest: AgentRequest, options: RouteOptions = {}): Promise<WorkflowState> {
    if (!workflowId) {
      throw new ValidationError('Workflow id is required', 'workflowId');
    }
    return this.workflowLocks.runExclusive(workflowId, () => this.runWorkflow(workflowId, initialRequest, options.signal));
  }

  async getWorkflowState(workflowId: string): Promise<WorkflowState | undefined> {
    return this.stateStore.get(workflowId);
  }

  setOrchestrationMethod(method: OrchestrationMethod): void {
    if (!isOrchestrationMethod(method)) {
      throw new ValidationError(`Unknown orchestration method: ${String(method)}`, 'orchestrationMethod');
    }
    this.orchestrationMethod = method;
    this.logs?.info('Orchestration method changed', { orchestrationMethod: method });
  }

  getOrchestrationMethod(): OrchestrationMethod {
    return this.orchestrationMethod;
  }

  registerAgent(agentId: string, handle: AgentHandle, capability: AgentCapabilityInput): boolean {
    return this.registry.registerAgent(agentId, handle, capability);
  }

  unregisterAgent(agentId: string): boolean {
    return this.registry.unregisterAgent(agentId);
  }

  getAgentCapabilities(): AgentCapability[] {
    return this.registry.getAllCapabilities();
  }

  getAgentHealth(): Record<string, AgentHealthStatus> {
    return this.registry.getAllAgentHealth();
  }

  start(): void {
    if (this.lifetime) return;
    const lifetime = new AbortController();
    this.lifetime = lifetime;

    this.healthTimer = setInterval(() => {
      void this.refreshHealth(lifetime.signal);
    }, this.settings.healthCheckIntervalMs);
    this.housekeepingTimer = setInterval(() => {
      void this.runHousekeeping(new Date(), lifetime.signal);
    }, this.settings.housekeepingIntervalMs);

    this.logs?.info('Agent communication bus started');
  }

  stop(): void {
    if (!this.lifetime) return;
    this.lifetime.abort();
    this.lifetime = null;
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
    if (this.housekeepingTimer) {
      clearInterval(this.housekeepingTimer);
      this.housekeepingTimer = null;
    }
    this.logs?.info('Agent communication bus stopped');
  }

  isRunning(): boolean {
    return this.lifetime !== null;
  }

  async refreshHealth(signal?: AbortSignal): Promise<void> {
    try {
      await this.registry.refreshHealth(this.settings.healthCheckTimeoutMs, signal);
    } catch (error) {
      this.logs?.error('Health refresh failed', { error: errorMessage(error) });
    }
  }

  /** One housekeeping pass. Each task's failure is logged and the pass moves on. */
  async runHousekeeping(now: Date = new Date(), signal?: AbortSignal): Promise<void> {
    const idleSemaphores = this.semaphores.cleanupIdle(this.settings.idleSemaphoreMs, now.getTime());
    if (idleSemaphores > 0) {
      this.logs?.debug('Released idle semaphores', { count: idleSemaphores });
    }

    try {
      const pruned = await this.stateStore.prune(new Date(now.getTime() - this.settings.workflowRetentionMs));
      if (pruned > 0) {
        this.logs?.debug('Pruned finished workflows', { count: pruned });
      }
    } catch (error) {
      this.logs?.error('Workflow pruning failed', { error: errorMessage(error) });
    }

    const taskSignal = signal ?? new AbortController().signal;
    for (const task of this.housekeepingTasks) {
      if (taskSignal.aborted) return;
      try {
        await task.run(now, taskSignal);
      } catch (error) {
        this.logs?.error('Housekeeping task failed: ' + task.name, { error: errorMessage(error) });
      }
    }
  }

  private async invoke(
    handle: AgentHandle,
    capability: AgentCapability,
    request: AgentRequest,
    servedIntent: AgentRequest['intent'],
    signal?: AbortSignal,
  ): Promise<AgentTaskResult> {
    const semaphore = this.semaphores.get(capability.agentType, capability.maxConcurrentRequests);
    await semaphore.acquire(this.settings.semaphoreWaitTimeoutMs, signal);
    // Once dispatched, an agent call is bounded by its deadline only; the caller's
    // signal is checked again between workflow steps.
    try {
      return await withTimeout(
        (agentSignal) => handle.executeTask(toAgentTask(request, servedIntent), agentSignal),
        this.settings.agentTimeoutMs,
        `Agent ${capability.agentId}`,
      );
    } finally {
      semaphore.release();
    }
  }

  private async runWorkflow(workflowId: string, initialRequest: AgentRequest, signal?: AbortSignal): Promise<WorkflowState> {
    const method = initialRequest.orchestrationMethod ?? this.orchestrationMethod;
    const state: WorkflowState = {
      workflowId,
      traceId: initialRequest.traceId,
      currentState: 'processing',
      orchestrationMethod: method,
      pendingRequests: [initialRequest],
      completedResponses: [],
      executionHistory: [],
      isCompleted: false,
      hopCount: 0,
      startedAt: new Date(),
    };

    try {
      await this.saveState(state);
      this.logs?.info('Workflow started', { workflowId, traceId: state.traceId, intent: initialRequest.intent });

      let current: AgentRequest = { ...initialRequest, orchestrationMethod: method };
      for (;;) {
        const stepStartedAt = new Date();
        const response = await this.routeRequest(current, { signal });
        const requestId = current.id;

        state.hopCount++;
        state.pendingRequests = state.pendingRequests.filter((r) => r.id !== requestId);
        state.completedResponses.push(response);
        state.executionHistory.push({
          stepName: state.hopCount === 1 ? 'initial_request' : `follow_up_${state.hopCount - 1}`,
          requestId,
          agentId: response.agentId ?? 'unknown',
          intent: current.intent,
          isCompleted: response.success,
          result: response.content,
          errorMessage: response.errorMessage,
          startedAt: stepStartedAt,
          completedAt: new Date(),
        });

        if (!response.success) {
          markFailed(state, response.errorMessage ?? 'Workflow step failed');
          break;
        }
        if (!response.requiresFollowUp || !response.nextIntent) {
          markCompleted(state);
          break;
        }
        if (signal?.aborted) {
          markFailed(state, `Workflow cancelled after ${state.hopCount} step(s)`);
          break;
        }
        if (state.hopCount >= this.settings.maxWorkflowHops) {
          markFailed(state, `Workflow exceeded the maximum of ${this.settings.maxWorkflowHops} hops`);
          break;
        }

        current = createFollowUpRequest(current, response, response.nextIntent);
        state.pendingRequests.push(current);
        await this.saveState(state);
      }
    } catch (error) {
      markFailed(state, errorMessage(error));
    }

    await this.saveState(state);
    if (state.currentState === 'completed') {
      this.logs?.info('Workflow completed', { workflowId, traceId: state.traceId, hops: state.hopCount });
      this.emit('workflow:completed', state);
    } else {
      this.logs?.warn('Workflow failed', { workflowId, traceId: state.traceId, error: state.errorMessage });
      this.emit('workflow:failed', state);
    }
    return state;
  }

  /** A store failure is logged; the caller still gets the in-memory state. */
  private async saveState(state: WorkflowState): Promise<void> {
    try {
      await this.stateStore.save(state);
    } catch (error) {
      this.logs?.error('Failed to persist workflow state', {
        workflowId: state.workflowId,
        traceId: state.traceId,
        error: errorMessage(error),
      });
    }
  }

  private fromResult(
    request: AgentRequest,
    capability: AgentCapability,
    method: OrchestrationMethod,
    startedAt: number,
    result: AgentTaskResult,
  ): AgentResponse {
    return {
      id: uuidv4(),
      requestId: request.id,
      traceId: request.traceId,
      success: result.success,
      content: result.content,
      errorMessage: result.success ? undefined : result.errorMessage ?? 'Agent reported a failure',
      errorKind: result.success ? undefined : 'internal',
      retryable: false,
      confidence: clampConfidence(result.confidence),
      processingTimeMs: Date.now() - startedAt,
      agentId: capability.agentId,
      agentType: capability.agentType,
      requiresFollowUp: result.requiresFollowUp ?? false,
      nextIntent: result.nextIntent,
      data: result.data ?? {},
      actions: result.actions ?? [],
      orchestrationMethod: method,
      createdAt: new Date(),
    };
  }

  private fromError(
    request: AgentRequest,
    capability: AgentCapability,
    method: OrchestrationMethod,
    startedAt: number,
    error: unknown,
  ): AgentResponse {
    const errorKind: ResponseErrorKind =
      error instanceof TimeoutError ? 'timeout' : error instanceof CancelledError ? 'cancelled' : 'internal';
    return {
      ...this.emptyResponse(request, method, startedAt),
      errorMessage: errorMessage(error),
      errorKind,
      retryable: errorKind === 'timeout',
      agentId: capability.agentId,
      agentType: capability.agentType,
    };
  }

  private reject(
    request: AgentRequest,
    method: OrchestrationMethod,
    startedAt: number,
    errorKind: ResponseErrorKind,
    message: string,
  ): AgentResponse {
    this.logs?.warn(message, { traceId: request.traceId, requestId: request.id, intent: request.intent });
    const response: AgentResponse = {
      ...this.emptyResponse(request, method, startedAt),
      errorMessage: message,
      errorKind,
    };
    this.emit('request:failed', response);
    return response;
  }

  private emptyResponse(request: AgentRequest, method: OrchestrationMethod, startedAt: number): AgentResponse {
    return {
      id: uuidv4(),
      requestId: request.id,
      traceId: request.traceId,
      success: false,
      content: '',
      retryable: false,
      confidence: 0,
      processingTimeMs: Date.now() - startedAt,
      requiresFollowUp: false,
      data: {},
      actions: [],
      orchestrationMethod: method,
      createdAt: new Date(),
    };
  }
}

function markCompleted(state: WorkflowState): void {
  state.currentState = 'completed';
  state.isCompleted = true;
  state.completedAt = new Date();
}

function markFailed(state: WorkflowState, message: string): void {
  state.currentState = 'error';
  state.isCompleted = false;
  state.errorMessage = message;
  state.completedAt = new Date();
}

function clampConfidence(confidence: number): number {
  if (!Number.isFinite(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}
