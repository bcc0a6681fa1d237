import Redis from 'ioredis';
import { loadConfig, SystemConfig } from './config';
import { loadAgentCatalog } from './config/catalog';
import { AgentRegistry } from './core/registry/AgentRegistry';
import { AuditSink } from './core/types';
import { errorMessage } from './core/errors';
import { AgentCommunicationBus } from './messages/bus/AgentCommunicationBus';
import { InMemoryWorkflowStateStore, WorkflowStateStore } from './workflows/state/WorkflowStateStore';
import { RedisWorkflowStateStore } from './workflows/state/RedisWorkflowStateStore';
import { ActionRelevanceValidator } from './validation/relevance/ActionRelevanceValidator';
import { ApprovalService } from './validation/approval/ApprovalService';
import { AgentActionValidator } from './validation/actions/AgentActionValidator';
import { ComplianceChecker } from './compliance/ComplianceChecker';
import { ChatCompletionClient } from './integrations/llm/ChatCompletionClient';
import { HttpContactContextLookup } from './integrations/contacts/HttpContactContextLookup';
import { HttpAuditSink, InMemoryAuditSink } from './integrations/audit/AuditSinks';
import { LogAggregator, MetricsCollector } from './monitoring/core/Monitoring';
import { CommandDispatcher } from './api/commands';
import { APIServer } from './api/server';
import { createAgentHandle, knownHandlers } from './agents';

class ControlPlane {
  private logs: LogAggregator;
  private metrics: MetricsCollector;
  private registry: AgentRegistry;
  private redis: Redis | null = null;
  private completion?: ChatCompletionClient;
  private relevanceValidator: ActionRelevanceValidator;
  private approvals: ApprovalService;
  private actionValidator: AgentActionValidator;
  private bus: AgentCommunicationBus;
  private apiServer: APIServer;

  constructor(private config: SystemConfig) {
    this.logs = new LogAggregator({ level: config.logging.level });
    this.metrics = new MetricsCollector();
    this.registry = new AgentRegistry({ logs: this.logs });

    if (config.llm.enabled) {
      this.completion = new ChatCompletionClient({
        baseUrl: config.llm.baseUrl,
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        timeoutMs: config.llm.timeoutMs,
      });
    }

    const auditSink: AuditSink = config.audit.endpoint
      ? new HttpAuditSink({ endpoint: config.audit.endpoint, apiKey: config.audit.apiKey })
      : new InMemoryAuditSink();

    this.relevanceValidator = new ActionRelevanceValidator({
      completion: this.completion,
      contacts: config.contacts.baseUrl
        ? new HttpContactContextLookup({ baseUrl: config.contacts.baseUrl, apiKey: config.contacts.apiKey })
        : undefined,
      auditSink,
      logs: this.logs,
      metrics: this.metrics,
      config: config.relevance,
    });

    this.approvals = new ApprovalService({
      getConfig: () => this.relevanceValidator.getValidationConfig().approval,
      completion: this.completion,
      logs: this.logs,
      llmTimeoutMs: config.llm.timeoutMs,
    });

    this.actionValidator = new AgentActionValidator({
      relevanceValidator: this.relevanceValidator,
      approvals: this.approvals,
      logs: this.logs,
    });

    this.bus = new AgentCommunicationBus({
      registry: this.registry,
      stateStore: this.createStateStore(),
      complianceChecker: new ComplianceChecker({ auditSink, logs: this.logs, metrics: this.metrics }),
      housekeeping: [
        {
          name: 'expire-approvals',
          run: (now) => {
            this.approvals.cleanupExpired(now);
          },
        },
        { name: 'prune-metrics', run: (now) => this.metrics.prune(now.getTime()) },
      ],
      logs: this.logs,
      metrics: this.metrics,
      settings: config.orchestration,
    });

    this.apiServer = new APIServer(
      new CommandDispatcher({ bus: this.bus, relevanceValidator: this.relevanceValidator, approvals: this.approvals }),
      this.bus,
      this.approvals,
      this.metrics,
      this.logs,
    );

    this.setupEventHandlers();
  }

  async start(): Promise<void> {
    await this.registerCatalogAgents();
    await this.checkModel();
    this.bus.start();
    await this.apiServer.listen(this.config.server.port);
    this.logs.info('Agent control plane started', {
      port: this.config.server.port,
      agents: this.registry.size(),
      orchestrationMethod: this.bus.getOrchestrationMethod(),
    });
  }

  async stop(): Promise<void> {
    this.bus.stop();
    await this.apiServer.close();
    if (this.redis) {
      await this.redis.quit();
      this.redis = null;
    }
    this.logs.info('Agent control plane stopped');
  }

  private createStateStore(): WorkflowStateStore {
    const url = this.config.redis.url;
    if (!url) return new InMemoryWorkflowStateStore();

    this.redis = new Redis(url);
    this.redis.on('error', (error: Error) => this.logs.error('Redis error: ' + error.message));
    return new RedisWorkflowStateStore(this.redis, this.config.redis.workflowTtlSeconds);
  }

  private async registerCatalogAgents(): Promise<void> {
    const catalog = await loadAgentCatalog(this.config.catalog.directory);
    for (const error of catalog.errors) {
      this.logs.warn(error);
    }

    const services = { actionValidator: this.actionValidator, completion: this.completion, logs: this.logs };
    for (const card of catalog.cards) {
      const handle = createAgentHandle(card, services);
      if (!handle) {
        this.logs.warn(`Unknown handler '${card.handler}' in ${card.source}`, { known: knownHandlers() });
        continue;
      }
      if (!this.bus.registerAgent(card.capability.agentId, handle, card.capability)) {
        this.logs.warn('Agent card rejected: ' + card.source, { agentId: card.capability.agentId });
      }
    }
  }

  private async checkModel(): Promise<void> {
    if (!this.completion) {
      this.logs.info('Language model disabled; relevance checks stop at the deterministic tiers');
      return;
    }
    const healthy = await this.completion.checkHealth();
    if (healthy) {
      this.logs.info('Language model reachable: ' + this.config.llm.baseUrl);
    } else {
      this.logs.warn('Language model not reachable: ' + this.config.llm.baseUrl);
    }
  }

  private setupEventHandlers(): void {
    this.registry.on('agent:registered', () => this.metrics.incrementCounter('agents_registered_total'));
    this.registry.on('health:refreshed', () => this.metrics.setGauge('agents_registered', this.registry.size()));

    this.bus.on('workflow:completed', () => this.metrics.incrementCounter('workflows_total', { outcome: 'completed' }));
    this.bus.on('workflow:failed', () => this.metrics.incrementCounter('workflows_total', { outcome: 'error' }));
    this.approvals.on('approval:requested', () => this.metrics.incrementCounter('approval_requests_total'));
  }
}

async function main(): Promise<void> {
  const plane = new ControlPlane(loadConfig());

  const shutdown = (): void => {
    plane.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed: ' + errorMessage(error));
        process.exit(1);
      },
    );
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  await plane.start();
}

main().catch((error: unknown) => {
  console.error('Failed to start: ' + errorMessage(error));
  process.exit(1);
});
