/**
 * Structured-block parsing for model responses, validated with Zod.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

export type ParseFailure = 'no_block' | 'invalid_json' | 'validation';

export type ParseResult<T> =
  | { success: true; data: T; rawResponse: string }
  | { success: false; failure: ParseFailure; error: string; rawResponse: string };

/**
 * End index (inclusive) of the bracket opened at `start`, skipping quoted
 * strings and escapes. Returns -1 when the bracket never closes.
 */
function balancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{' || ch === '[') depth++;
    else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate the structured block in a response that may wrap it in prose or a
 * markdown code fence. Prefers the first balanced `{...}`/`[...]` span that
 * parses; otherwise returns the first balanced span (so fixers can repair it),
 * or null when there is no block at all.
 */
export function extractJson(response: string): string | null {
  const trimmed = response.trim();

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1].trim() : trimmed;

  let firstBalanced: string | null = null;
  for (let start = body.search(/[{[]/); start >= 0; ) {
    const end = balancedEnd(body, start);
    if (end > start) {
      const candidate = body.slice(start, end + 1);
      if (isJson(candidate)) return candidate;
      firstBalanced ??= candidate;
    }
    // Spans nested in a balanced candidate are part of it, not separate blocks.
    const from = end > start ? end + 1 : start + 1;
    const next = body.slice(from).search(/[{[]/);
    start = next < 0 ? -1 : from + next;
  }
  if (firstBalanced !== null) return firstBalanced;

  const start = body.search(/[{[]/);
  if (start < 0) return null;
  const end = body.lastIndexOf(body[start] === '{' ? '}' : ']');
  return end > start ? body.slice(start, end + 1) : null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Parse and validate a response against a Zod schema.
 */
export function parseJsonResponse<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseResult<T> {
  const rawResponse = response;
  const block = extractJson(response);
  if (block === null) {
    return { success: false, failure: 'no_block', error: 'No structured block found', rawResponse };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { success: false, failure: 'invalid_json', error: `Invalid JSON: ${reason}`, rawResponse };
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    return {
      success: false,
      failure: 'validation',
      error: `Validation failed: ${formatIssues(validated.error)}`,
      rawResponse,
    };
  }
  return { success: true, data: validated.data, rawResponse };
}

/**
 * Parse a response, applying fixers cumulatively until one yields a valid result.
 */
export function parseWithRetry<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fixers: Array<(input: string) => string> = defaultFixers,
): ParseResult<T> {
  const first = parseJsonResponse(response, schema);
  if (first.success || first.failure === 'no_block') return first;

  let fixed = response;
  for (const fixer of fixers) {
    fixed = fixer(fixed);
    const result = parseJsonResponse(fixed, schema);
    if (result.success) return { ...result, rawResponse: response };
  }
  return first;
}

/**
 * Common JSON fixers for LLM output issues.
 */
export const jsonFixers = {
  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: (input: string): string => input.replace(/,\s*([}\]])/g, '$1'),

  /** Fix unquoted keys */
  quoteKeys: (input: string): string =>
    input.replace(/([{,])\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*:/g, '$1"$2":'),

  /** Raw newlines are not allowed inside JSON strings */
  fixNewlines: (input: string): string => input.replace(/[\r\n]+/g, ' '),
};

export const defaultFixers = [
  jsonFixers.removeTrailingCommas,
  jsonFixers.fixNewlines,
  jsonFixers.quoteKeys,
];
