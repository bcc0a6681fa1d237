import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { AGENT_INTENTS, AgentCapabilityInput } from '../core/types';
import { errorMessage } from '../core/errors';

const CARD_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

const agentCardSchema = z.object({
  agentId: z.string().min(1),
  agentName: z.string().min(1),
  version: z.string().default(''),
  description: z.string().optional(),
  agentType: z.string().min(1),
  handler: z.string().min(1),
  supportedIntents: z.array(z.enum(AGENT_INTENTS)).min(1),
  supportedTasks: z.array(z.string()).default([]),
  supportedIndustries: z.array(z.string()).default([]),
  requiredPermissions: z.array(z.string()).default([]),
  isActive: z.boolean().default(true),
  maxConcurrentRequests: z.number().int().positive().optional(),
});

export interface AgentCard {
  /** Name of the built-in handler that serves this agent. */
  handler: string;
  capability: AgentCapabilityInput & { agentId: string };
  source: string;
}

export interface AgentCatalog {
  cards: AgentCard[];
  errors: string[];
}

export function parseAgentCard(text: string, source: string): AgentCard {
  const document: unknown = source.endsWith('.json') ? JSON.parse(text) : YAML.parse(text);
  const parsed = agentCardSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'card'}: ${i.message}`).join('; ');
    throw new Error(`Invalid agent card ${source}: ${issues}`);
  }
  const { handler, ...capability } = parsed.data;
  return { handler, capability, source };
}

/** Reads every agent card in `directory`. Bad cards are reported, not thrown. */
export async function loadAgentCatalog(directory: string): Promise<AgentCatalog> {
  const entries = await fs.readdir(directory);
  const cards: AgentCard[] = [];
  const errors: string[] = [];

  for (const entry of entries.sort()) {
    if (!CARD_EXTENSIONS.has(path.extname(entry).toLowerCase())) continue;
    const source = path.join(directory, entry);
    try {
      cards.push(parseAgentCard(await fs.readFile(source, 'utf8'), source));
    } catch (error) {
      errors.push(errorMessage(error));
    }
  }
  return { cards, errors };
}
