/**
 * Response parsing shared by the classification and standards agents.
 *
 * Models wrap JSON in markdown fences, add trailing commas or break strings across
 * lines. parseJsonObject isolates the outer object and retries once after repairJson;
 * parseStructuredResponse then validates it against the agent's zod schema.
 */
import type { z } from 'zod';
import { LLMResponseError } from '../errors';

/**
 * Try to repair common LLM JSON mistakes: trailing commas, unescaped newlines in strings.
 */
export function repairJson(jsonText: string): string {
  // Remove trailing commas before } or ] (common LLM mistake)
  const out = jsonText.replace(/,(\s*[}\]])/g, '$1');

  // Replace unescaped newlines inside double-quoted strings
  let inString = false;
  let escape = false;
  const result: string[] = [];
  for (const c of out) {
    if (escape) {
      result.push(c);
      escape = false;
      continue;
    }
    if (c === '\\' && inString) {
      result.push(c);
      escape = true;
      continue;
    }
    if (c === '"') {
      inString = !inString;
      result.push(c);
      continue;
    }
    if (inString && (c === '\n' || c === '\r')) {
      result.push(' ');
      continue;
    }
    result.push(c);
  }
  return result.join('');
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extract the JSON object from a model response. Returns null when none can be read.
 */
export function parseJsonObject(content: string): Record<string, unknown> | null {
  if (!content) return null;

  let jsonText = content.trim();

  // Strip markdown code fences if present
  if (jsonText.startsWith('```')) {
    jsonText = jsonText.replace(/^```[a-zA-Z]*\s*/u, '');
    jsonText = jsonText.replace(/```$/u, '').trim();
  }

  const firstBrace = jsonText.indexOf('{');
  const lastBrace = jsonText.lastIndexOf('}');
  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) {
    return null;
  }
  jsonText = jsonText.slice(firstBrace, lastBrace + 1);

  let value = tryParse(jsonText);
  if (value === undefined) {
    value = tryParse(repairJson(jsonText));
  }
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Parse and validate a model response, throwing LLMResponseError with the first
 * 300 characters of the response when it does not fit the schema.
 */
export function parseStructuredResponse<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  agent: string
): T {
  const preview = content.slice(0, 300);
  const json = parseJsonObject(content);
  if (!json) {
    throw new LLMResponseError(`${agent} response is not a JSON object`, { agent, preview });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new LLMResponseError(`${agent} response failed validation: ${issues.join('; ')}`, {
      agent,
      preview,
    });
  }
  return parsed.data;
}
