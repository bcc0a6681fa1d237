import { AgentHandle, TextCompletion } from '../core/types';
import { AgentActionValidator } from '../validation/actions/AgentActionValidator';
import { LogAggregator } from '../monitoring/core/Monitoring';
import { AgentCard } from '../config/catalog';
import { GeneralInquiryAgent } from './GeneralInquiryAgent';
import { IntentClassificationAgent } from './IntentClassificationAgent';
import { NextBestActionAgent } from './NextBestActionAgent';

export { GeneralInquiryAgent, IntentClassificationAgent, NextBestActionAgent };

export interface AgentServices {
  actionValidator: AgentActionValidator;
  completion?: TextCompletion;
  logs?: LogAggregator;
}

type AgentFactory = (card: AgentCard, services: AgentServices) => AgentHandle;

const AGENT_FACTORIES: Record<string, AgentFactory> = {
  general_inquiry: (card, services) => new GeneralInquiryAgent(services.completion),
  intent_classification: (card, services) => new IntentClassificationAgent(services.completion, services.logs),
  next_best_action: (card, services) =>
    new NextBestActionAgent(card.capability.agentId, card.capability.agentType, services.actionValidator),
};

export function knownHandlers(): string[] {
  return Object.keys(AGENT_FACTORIES).sort();
}

/** Builds the handle a catalog card names, or undefined for an unknown handler. */
export function createAgentHandle(card: AgentCard, services: AgentServices): AgentHandle | undefined {
  const factory = AGENT_FACTORIES[card.handler];
  return factory ? factory(card, services) : undefined;
}
