import { LlmResponseError } from '../../core/errors';

const FENCED = /```(?:json)?\s*([\s\S]*?)```/i;

/** Pulls the first JSON object out of model output, fenced or bare. */
export function extractJsonObject(raw: string): unknown {
  const fenced = FENCED.exec(raw);
  const candidate = fenced ? fenced[1] : raw;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new LlmResponseError('Failed to parse LLM response: no JSON object found', raw);
  }
  try {
    return JSON.parse(candidate.slice(start, end + 1));
  } catch (error) {
    throw new LlmResponseError(
      `Failed to parse LLM response: ${error instanceof Error ? error.message : String(error)}`,
      raw,
    );
  }
}
