import { describe, it, expect } from 'vitest';
import { loadConfig } from './index';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config.server.port).toBe(3000);
    expect(config.logging.level).toBe('info');
    expect(config.orchestration).toEqual({
      defaultOrchestrationMethod: 'custom',
      agentTimeoutMs: 30000,
      maxConcurrentPerAgentType: 5,
      semaphoreWaitTimeoutMs: 30000,
      healthCheckIntervalMs: 60000,
      housekeepingIntervalMs: 300000,
      maxWorkflowHops: 10,
    });
    expect(config.relevance).toEqual({
      enableLlmValidation: true,
      maxContextAgeMinutes: 5,
      llmTimeoutMs: 30000,
      defaultActionOnUncertainty: 'suppress',
    });
    expect(config.llm).toEqual({
      baseUrl: 'http://localhost:8080',
      apiKey: undefined,
      model: 'gpt-4o-mini',
      timeoutMs: 30000,
      enabled: true,
    });
    expect(config.catalog.directory).toBe('config/agents');
    expect(config.contacts.baseUrl).toBeUndefined();
    expect(config.redis).toEqual({ url: undefined, workflowTtlSeconds: 86400 });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8081',
      LOG_LEVEL: 'debug',
      ORCHESTRATION_METHOD: 'connected_agent',
      MAX_WORKFLOW_HOPS: '4',
      LLM_TIMEOUT_MS: '5000',
      LLM_ENABLED: 'false',
      ENABLE_LLM_VALIDATION: '0',
      LLM_API_KEY: ' test-secret ',
      DEFAULT_ACTION_ON_UNCERTAINTY: 'allow',
      CONTACT_SERVICE_URL: 'http://crm.local',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(config.server.port).toBe(8081);
    expect(config.logging.level).toBe('debug');
    expect(config.orchestration.defaultOrchestrationMethod).toBe('connected_agent');
    expect(config.orchestration.maxWorkflowHops).toBe(4);
    expect(config.llm).toMatchObject({ apiKey: 'test-secret', timeoutMs: 5000, enabled: false });
    expect(config.relevance).toMatchObject({ enableLlmValidation: false, llmTimeoutMs: 5000, defaultActionOnUncertainty: 'allow' });
    expect(config.contacts.baseUrl).toBe('http://crm.local');
    expect(config.redis.url).toBe('redis://localhost:6379');
  });

  it('should reject malformed values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow("PORT must be a number, got 'eighty'");
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow("LOG_LEVEL must be debug, info, warn or error, got 'verbose'");
    expect(() => loadConfig({ ORCHESTRATION_METHOD: 'magic' })).toThrow("Unknown ORCHESTRATION_METHOD 'magic'");
    expect(() => loadConfig({ DEFAULT_ACTION_ON_UNCERTAINTY: 'maybe' })).toThrow(
      "DEFAULT_ACTION_ON_UNCERTAINTY must be suppress or allow, got 'maybe'",
    );
  });
});
