/**
 * @roleradar/llm - Ollama client wrapper for local LLM inference
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  type OllamaModelType,
  type ModelConfig,
  defaultModelConfigs,
} from './models.js';

export {
  OllamaClient,
  OllamaCompletionService,
  OllamaHttpError,
  type CompletionRequest,
  type CompletionService,
  type OllamaCompletionOptions,
  type OllamaChatMessage,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client.js';

export { buildPrompt, structuredExtractionSystem, STRICT_RETRY_INSTRUCTION } from './prompts.js';

export {
  extractJson,
  parseJsonResponse,
  parseWithRetry,
  jsonFixers,
  defaultFixers,
  type ParseFailure,
  type ParseResult,
} from './parse.js';
