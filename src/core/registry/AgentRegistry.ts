import { EventEmitter } from 'events';
import {
  AgentCapability,
  AgentCapabilityInput,
  AgentHandle,
  AgentHealthStatus,
  AgentIntent,
  AgentPerformanceMetrics,
  CapabilityValidation,
  isAgentIntent,
} from '../types';
import { ValidationError, errorMessage } from '../errors';
import { withTimeout } from '../concurrency/timeout';
import { LogAggregator } from '../../monitoring/core/Monitoring';

export const DEFAULT_SUCCESS_RATE = 0.5;
export const DEFAULT_RESPONSE_TIME_MS = 1000;

export interface AgentRegistration {
  readonly handle: AgentHandle;
  readonly capability: AgentCapability;
}

export interface AgentRegistryOptions {
  logs?: LogAggregator;
  /** Weight of the newest sample in the response-time and confidence averages. */
  metricsSmoothing?: number;
}

interface RegistryEntry extends AgentRegistration {
  health: AgentHealthStatus;
}

export class AgentRegistry extends EventEmitter {
  private agents: Map<string, RegistryEntry> = new Map();
  private intentIndex: Map<AgentIntent, Set<string>> = new Map();
  private readonly logs?: LogAggregator;
  private readonly metricsSmoothing: number;

  constructor(options: AgentRegistryOptions = {}) {
    super();
    this.logs = options.logs;
    this.metricsSmoothing = options.metricsSmoothing ?? 0.5;
  }

  registerAgent(agentId: string, handle: AgentHandle | undefined, capability: AgentCapabilityInput | undefined): boolean {
    if (!agentId || agentId.trim() === '') {
      throw new ValidationError('Agent id is required', 'agentId');
    }
    if (!handle || !capability) {
      throw new ValidationError(`Agent ${agentId} needs both a handle and a capability`, 'capability');
    }

    const existing = this.agents.get(agentId);
    if (existing && existing.capability.isActive) {
      this.logs?.warn('Agent already registered', { agentId });
      return false;
    }

    const validation = this.validateCapability(capability);
    if (!validation.isValid) {
      this.logs?.warn('Agent capability rejected', { agentId, errors: validation.errors });
      return false;
    }
    for (const warning of validation.warnings) {
      this.logs?.warn(warning, { agentId });
    }

    if (existing) {
      this.removeFromIndex(agentId, existing.capability.supportedIntents);
    }

    const stored = freezeCapability({
      ...capability,
      agentId,
      supportedIntents: [...capability.supportedIntents],
      supportedTasks: [...capability.supportedTasks],
      supportedIndustries: [...capability.supportedIndustries],
      requiredPermissions: [...capability.requiredPermissions],
      performanceMetrics: {
        successRate: capability.performanceMetrics?.successRate ?? DEFAULT_SUCCESS_RATE,
        averageResponseTimeMs: capability.performanceMetrics?.averageResponseTimeMs ?? DEFAULT_RESPONSE_TIME_MS,
        averageConfidence: capability.performanceMetrics?.averageConfidence ?? 0,
        totalRequests: capability.performanceMetrics?.totalRequests ?? 0,
        successfulRequests: capability.performanceMetrics?.successfulRequests ?? 0,
        lastUpdated: capability.performanceMetrics?.lastUpdated ?? new Date(),
      },
    });

    this.agents.set(agentId, {
      handle,
      capability: stored,
      health: {
        agentId,
        isHealthy: stored.isActive,
        status: stored.isActive ? 'registered' : 'inactive',
        lastChecked: new Date(),
        responseTimeMs: 0,
      },
    });
    this.addToIndex(agentId, stored.supportedIntents);

    this.logs?.info('Agent registered: ' + stored.agentName, { agentId, agentType: stored.agentType });
    this.emit('agent:registered', stored);
    return true;
  }

  unregisterAgent(agentId: string): boolean {
    const entry = this.agents.get(agentId);
    if (!entry) return false;

    this.removeFromIndex(agentId, entry.capability.supportedIntents);
    this.agents.delete(agentId);
    this.logs?.info('Agent unregistered', { agentId });
    this.emit('agent:unregistered', agentId);
    return true;
  }

  setAgentActive(agentId: string, isActive: boolean): boolean {
    const entry = this.agents.get(agentId);
    if (!entry) return false;

    this.agents.set(agentId, {
      ...entry,
      capability: freezeCapability({ ...entry.capability, isActive }),
      health: {
        ...entry.health,
        isHealthy: isActive,
        status: isActive ? 'registered' : 'inactive',
        lastChecked: new Date(),
      },
    });
    this.emit('agent:statusChanged', { agentId, isActive });
    return true;
  }

  validateCapability(capability: AgentCapabilityInput): CapabilityValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!capability.agentName || capability.agentName.trim() === '') {
      errors.push('Agent name is required');
    }
    if (!capability.supportedIntents || capability.supportedIntents.length === 0) {
      errors.push('At least one supported intent is required');
    } else {
      for (const intent of capability.supportedIntents) {
        if (!isAgentIntent(intent)) {
          errors.push(`Invalid intent: ${String(intent)}`);
        }
      }
    }
    if (!capability.agentType || capability.agentType.trim() === '') {
      errors.push('Agent type is required');
    }
    if (!capability.version) {
      warnings.push('Version not specified');
    }
    if (capability.maxConcurrentRequests !== undefined && capability.maxConcurrentRequests < 1) {
      errors.push('maxConcurrentRequests must be at least 1');
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  findAgentsForIntent(intent: AgentIntent, industry?: string): AgentCapability[] {
    const agentIds = this.intentIndex.get(intent);
    if (!agentIds) return [];

    const wanted = industry?.trim().toLowerCase();
    const matches: AgentCapability[] = [];
    for (const agentId of agentIds) {
      const entry = this.agents.get(agentId);
      if (!entry || !entry.capability.isActive) continue;
      if (wanted && !servesIndustry(entry.capability, wanted)) continue;
      matches.push(entry.capability);
    }
    return matches;
  }

  getRegistration(agentId: string): AgentRegistration | undefined {
    const entry = this.agents.get(agentId);
    return entry ? { handle: entry.handle, capability: entry.capability } : undefined;
  }

  getCapability(agentId: string): AgentCapability | undefined {
    return this.agents.get(agentId)?.capability;
  }

  getAllCapabilities(): AgentCapability[] {
    return Array.from(this.agents.values()).map((e) => e.capability);
  }

  /**
   * Replaces the metrics snapshot in one assignment; readers holding the old
   * capability keep a consistent view. Unknown agents are ignored.
   */
  updateAgentMetrics(agentId: string, responseTimeMs: number, success: boolean, confidence: number): void {
    const entry = this.agents.get(agentId);
    if (!entry) return;

    const previous = entry.capability.performanceMetrics;
    const alpha = this.metricsSmoothing;
    const isFirstSample = previous.totalRequests === 0;
    const totalRequests = previous.totalRequests + 1;
    const successfulRequests = previous.successfulRequests + (success ? 1 : 0);
    const boundedConfidence = Math.min(1, Math.max(0, confidence));

    const metrics: AgentPerformanceMetrics = {
      totalRequests,
      successfulRequests,
      successRate: successfulRequests / totalRequests,
      averageResponseTimeMs: isFirstSample
        ? responseTimeMs
        : alpha * responseTimeMs + (1 - alpha) * previous.averageResponseTimeMs,
      averageConfidence: isFirstSample
        ? boundedConfidence
        : alpha * boundedConfidence + (1 - alpha) * previous.averageConfidence,
      lastUpdated: new Date(),
    };

    this.agents.set(agentId, {
      ...entry,
      capability: freezeCapability({ ...entry.capability, performanceMetrics: metrics }),
    });
  }

  getAllAgentHealth(): Record<string, AgentHealthStatus> {
    const snapshot: Record<string, AgentHealthStatus> = {};
    for (const [agentId, entry] of this.agents.entries()) {
      snapshot[agentId] = { ...entry.health };
    }
    return snapshot;
  }

  /** Probes every active agent that exposes a health check. Never throws. */
  async refreshHealth(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const probes = Array.from(this.agents.entries())
      .filter(([, entry]) => entry.capability.isActive && entry.handle.checkHealth)
      .map(([agentId, entry]) => this.probe(agentId, entry.handle, timeoutMs, signal));
    await Promise.all(probes);
    this.emit('health:refreshed', this.getAllAgentHealth());
  }

  size(): number {
    return this.agents.size;
  }

  private async probe(agentId: string, handle: AgentHandle, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const startedAt = Date.now();
    let health: AgentHealthStatus;
    try {
      const healthy = await withTimeout(
        (probeSignal) => (handle.checkHealth ? handle.checkHealth(probeSignal) : Promise.resolve(true)),
        timeoutMs,
        `Health check for ${agentId}`,
        signal,
      );
      health = {
        agentId,
        isHealthy: healthy,
        status: healthy ? 'healthy' : 'unhealthy',
        lastChecked: new Date(),
        responseTimeMs: Date.now() - startedAt,
        errorMessage: healthy ? undefined : 'Health check reported unhealthy',
      };
    } catch (error) {
      this.logs?.warn('Agent health check failed', { agentId, error: errorMessage(error) });
      health = {
        agentId,
        isHealthy: false,
        status: 'unhealthy',
        lastChecked: new Date(),
        responseTimeMs: Date.now() - startedAt,
        errorMessage: errorMessage(error),
      };
    }

    const current = this.agents.get(agentId);
    if (current && current.handle === handle) {
      this.agents.set(agentId, { ...current, health });
    }
  }

  private addToIndex(agentId: string, intents: AgentIntent[]): void {
    for (const intent of intents) {
      let ids = this.intentIndex.get(intent);
      if (!ids) {
        ids = new Set();
        this.intentIndex.set(intent, ids);
      }
      ids.add(agentId);
    }
  }

  private removeFromIndex(agentId: string, intents: AgentIntent[]): void {
    for (const intent of intents) {
      this.intentIndex.get(intent)?.delete(agentId);
    }
  }
}

function servesIndustry(capability: AgentCapability, industry: string): boolean {
  if (capability.supportedIndustries.length === 0) return true;
  return capability.supportedIndustries.some((i) => i.toLowerCase() === industry);
}

function freezeCapability(capability: AgentCapability): AgentCapability {
  Object.freeze(capability.supportedIntents);
  Object.freeze(capability.supportedTasks);
  Object.freeze(capability.supportedIndustries);
  Object.freeze(capability.requiredPermissions);
  Object.freeze(capability.performanceMetrics);
  return Object.freeze(capability);
}
