/**
 * Prompt template utilities for consistent LLM interactions.
 */

/**
 * Build a prompt by substituting `{name}` placeholders. Values are inserted
 * literally, so resume text containing `$` sequences survives untouched.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match,
  );
}

/**
 * Create a structured extraction system prompt.
 */
export function structuredExtractionSystem(taskDescription: string): string {
  return `You are a precise data extraction assistant. Your task is to ${taskDescription}.

Rules:
1. Extract information exactly as it appears in the source
2. Return valid JSON matching the requested schema
3. Use empty lists or 0 for missing fields
4. Do not make up or infer information that isn't present`;
}

/** Appended to the prompt when the first answer could not be parsed. */
export const STRICT_RETRY_INSTRUCTION =
  'Your previous answer could not be parsed. Respond with ONLY one JSON object matching the format above. No prose, no markdown, no comments.';
