/**
 * JSON extraction for model responses.
 *
 * Models asked for JSON sometimes wrap it in a markdown fence or add a
 * sentence around it; this pulls the object out before parsing.
 */

import { StructuredOutputError } from '../errors.js';

/**
 * Parse the JSON payload of a model response
 *
 * @throws {StructuredOutputError} when no JSON can be parsed
 */
export function extractJson(raw: string): unknown {
  const candidates: string[] = [raw];

  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    candidates.push(fenced[1]);
  }

  const objMatch = raw.match(/\{[\s\S]*\}/);
  if (objMatch) {
    candidates.push(objMatch[0]);
  }

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      // next candidate
    }
  }

  throw new StructuredOutputError(`Failed to parse JSON response: ${raw.slice(0, 200)}`, {
    raw,
  });
}

/**
 * Build the system prompt for a JSON request
 */
export function withJsonInstruction(
  system: string | undefined,
  schemaHint?: { description?: string }
): string {
  const parts: string[] = [];
  if (system) {
    parts.push(system);
  }
  if (schemaHint?.description) {
    parts.push(`Respond with a JSON object of this shape:\n${schemaHint.description}`);
  }
  parts.push('Respond with valid JSON only. No markdown fences or explanation.');
  return parts.join('\n\n');
}
