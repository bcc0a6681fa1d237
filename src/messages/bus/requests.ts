import { v4 as uuidv4 } from 'uuid';
import {
  AgentCapability,
  AgentIntent,
  AgentRequest,
  AgentResponse,
  AgentTask,
  OrchestrationMethod,
  UrgencyLevel,
} from '../../core/types';

export interface NewAgentRequest {
  intent: AgentIntent;
  originalUserInput: string;
  traceId?: string;
  conversationId?: string;
  interactionId?: string;
  context?: Record<string, unknown>;
  urgency?: UrgencyLevel;
  orchestrationMethod?: OrchestrationMethod;
  sourceAgentId?: string;
  userId?: string;
  industry?: string;
}

export function createAgentRequest(input: NewAgentRequest): AgentRequest {
  return {
    id: uuidv4(),
    traceId: input.traceId ?? uuidv4(),
    intent: input.intent,
    originalUserInput: input.originalUserInput,
    conversationId: input.conversationId,
    interactionId: input.interactionId,
    context: input.context ?? {},
    urgency: input.urgency ?? 'medium',
    orchestrationMethod: input.orchestrationMethod,
    sourceAgentId: input.sourceAgentId,
    userId: input.userId,
    industry: input.industry,
    createdAt: new Date(),
  };
}

/** Next hop of a workflow: same trace, the previous agent's output as input. */
export function createFollowUpRequest(previous: AgentRequest, response: AgentResponse, nextIntent: AgentIntent): AgentRequest {
  return {
    id: uuidv4(),
    traceId: previous.traceId,
    intent: nextIntent,
    originalUserInput: response.content,
    conversationId: previous.conversationId,
    interactionId: previous.interactionId,
    context: { ...response.data },
    urgency: previous.urgency,
    orchestrationMethod: previous.orchestrationMethod,
    sourceAgentId: response.agentId,
    userId: previous.userId,
    industry: previous.industry,
    createdAt: new Date(),
  };
}

export function toAgentTask(request: AgentRequest, servedIntent: AgentIntent): AgentTask {
  return {
    id: request.id,
    traceId: request.traceId,
    type: servedIntent,
    description: request.originalUserInput,
    conversationId: request.conversationId,
    interactionId: request.interactionId,
    context: { ...request.context },
    sourceAgentId: request.sourceAgentId,
    urgency: request.urgency,
    userId: request.userId,
    industry: request.industry,
    createdAt: request.createdAt,
  };
}

/**
 * Highest success rate first, then lowest average latency, then agent id so
 * equal candidates always resolve the same way.
 */
export function selectBestAgent(candidates: AgentCapability[]): AgentCapability | undefined {
  return candidates
    .filter((c) => c.isActive)
    .sort((a, b) => {
      const bySuccess = b.performanceMetrics.successRate - a.performanceMetrics.successRate;
      if (bySuccess !== 0) return bySuccess;
      const byLatency = a.performanceMetrics.averageResponseTimeMs - b.performanceMetrics.averageResponseTimeMs;
      if (byLatency !== 0) return byLatency;
      if (a.agentId === b.agentId) return 0;
      return a.agentId < b.agentId ? -1 : 1;
    })[0];
}
