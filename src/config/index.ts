import dotenv from 'dotenv';
import { LogLevel, OrchestrationMethod, isOrchestrationMethod } from '../core/types';
import { ValidationError } from '../core/errors';
import { BusSettings } from '../messages/bus/AgentCommunicationBus';
import { RelevanceConfigPatch } from '../validation/relevance/config';

dotenv.config();

type Env = Record<string, string | undefined>;

export interface LlmConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  enabled: boolean;
}

export interface SystemConfig {
  server: {
    port: number;
  };
  logging: {
    level: LogLevel;
  };
  orchestration: Partial<BusSettings>;
  relevance: RelevanceConfigPatch;
  llm: LlmConfig;
  catalog: {
    directory: string;
  };
  contacts: {
    baseUrl?: string;
    apiKey?: string;
  };
  audit: {
    endpoint?: string;
    apiKey?: string;
  };
  redis: {
    url?: string;
    workflowTtlSeconds: number;
  };
}

function getEnv(env: Env, key: string, defaultValue: string = ''): string {
  return env[key] || defaultValue;
}

function getOptional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function getBool(env: Env, key: string, defaultValue: boolean): boolean {
  const val = env[key]?.trim().toLowerCase();
  if (val === undefined || val === '') return defaultValue;
  return val === 'true' || val === '1';
}

function getNumber(env: Env, key: string, defaultValue: number): number {
  const raw = env[key]?.trim();
  if (!raw) return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${key} must be a number, got '${raw}'`, key);
  }
  return parsed;
}

function getLogLevel(env: Env): LogLevel {
  const level = getEnv(env, 'LOG_LEVEL', 'info');
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') return level;
  throw new ValidationError(`LOG_LEVEL must be debug, info, warn or error, got '${level}'`, 'LOG_LEVEL');
}

function getOrchestrationMethod(env: Env): OrchestrationMethod {
  const method = getEnv(env, 'ORCHESTRATION_METHOD', 'custom');
  if (!isOrchestrationMethod(method)) {
    throw new ValidationError(`Unknown ORCHESTRATION_METHOD '${method}'`, 'ORCHESTRATION_METHOD');
  }
  return method;
}

function getUncertaintyAction(env: Env): 'suppress' | 'allow' {
  const value = getEnv(env, 'DEFAULT_ACTION_ON_UNCERTAINTY', 'suppress');
  if (value === 'suppress' || value === 'allow') return value;
  throw new ValidationError(`DEFAULT_ACTION_ON_UNCERTAINTY must be suppress or allow, got '${value}'`);
}

export function loadConfig(env: Env = process.env): SystemConfig {
  const llmTimeoutMs = getNumber(env, 'LLM_TIMEOUT_MS', 30000);
  return {
    server: {
      port: getNumber(env, 'PORT', 3000),
    },
    logging: {
      level: getLogLevel(env),
    },
    orchestration: {
      defaultOrchestrationMethod: getOrchestrationMethod(env),
      agentTimeoutMs: getNumber(env, 'AGENT_TIMEOUT_MS', 30000),
      maxConcurrentPerAgentType: getNumber(env, 'MAX_CONCURRENT_PER_AGENT_TYPE', 5),
      semaphoreWaitTimeoutMs: getNumber(env, 'SEMAPHORE_WAIT_TIMEOUT_MS', 30000),
      healthCheckIntervalMs: getNumber(env, 'HEALTH_CHECK_INTERVAL_MS', 60000),
      housekeepingIntervalMs: getNumber(env, 'HOUSEKEEPING_INTERVAL_MS', 300000),
      maxWorkflowHops: getNumber(env, 'MAX_WORKFLOW_HOPS', 10),
    },
    relevance: {
      enableLlmValidation: getBool(env, 'ENABLE_LLM_VALIDATION', true),
      maxContextAgeMinutes: getNumber(env, 'MAX_CONTEXT_AGE_MINUTES', 5),
      llmTimeoutMs,
      defaultActionOnUncertainty: getUncertaintyAction(env),
    },
    llm: {
      baseUrl: getEnv(env, 'LLM_BASE_URL', 'http://localhost:8080'),
      apiKey: getOptional(env, 'LLM_API_KEY'),
      model: getEnv(env, 'LLM_MODEL', 'gpt-4o-mini'),
      timeoutMs: llmTimeoutMs,
      enabled: getBool(env, 'LLM_ENABLED', true),
    },
    catalog: {
      directory: getEnv(env, 'AGENT_CATALOG_DIR', 'config/agents'),
    },
    contacts: {
      baseUrl: getOptional(env, 'CONTACT_SERVICE_URL'),
      apiKey: getOptional(env, 'CONTACT_SERVICE_API_KEY'),
    },
    audit: {
      endpoint: getOptional(env, 'AUDIT_ENDPOINT_URL'),
      apiKey: getOptional(env, 'AUDIT_API_KEY'),
    },
    redis: {
      url: getOptional(env, 'REDIS_URL'),
      workflowTtlSeconds: getNumber(env, 'WORKFLOW_TTL_SECONDS', 86400),
    },
  };
}
