/**
 * Ollama HTTP client for local LLM inference, plus the narrow completion
 * interface the agents depend on.
 */

import { z } from 'zod';
import {
  OLLAMA_BASE_URL,
  defaultModelConfigs,
  type ModelConfig,
  type OllamaModelType,
} from './models.js';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

const chatResponseSchema = z.object({
  model: z.string(),
  created_at: z.string().optional(),
  message: z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
  }),
  done: z.boolean(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
});

export type OllamaChatResponse = z.infer<typeof chatResponseSchema>;

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

/** Non-2xx answer from the Ollama server. */
export class OllamaHttpError extends Error {
  constructor(
    readonly status: number,
    body: string,
  ) {
    super(`Ollama chat failed: ${status} - ${body.slice(0, 200)}`);
    this.name = 'OllamaHttpError';
  }
}

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(baseUrl: string = OLLAMA_BASE_URL, defaultTimeout: number = 300000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Chat completion using the /api/chat endpoint.
   */
  async chat(
    request: OllamaChatRequest,
    timeout?: number,
    signal?: AbortSignal,
  ): Promise<OllamaChatResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new OllamaHttpError(response.status, await response.text());
      }

      return chatResponseSchema.parse(await response.json());
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Check if Ollama is running and a model is available.
   */
  async isAvailable(model?: string): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      if (!response.ok) return false;
      if (!model) return true;

      const data = tagsResponseSchema.parse(await response.json());
      return data.models.some((m) => m.name === model || m.name.startsWith(model));
    } catch {
      return false;
    }
  }
}

export interface CompletionRequest {
  prompt: string;
  system?: string;
  temperature?: number;
  /** Ask the server for JSON-only output. */
  json?: boolean;
  signal?: AbortSignal;
}

/** Text in, text out. Agents only ever see this. */
export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OllamaCompletionOptions {
  client?: OllamaClient;
  modelType?: OllamaModelType;
  config?: Partial<ModelConfig>;
  /** Extra attempts after a network failure or 5xx. */
  retries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isRetryable(error: unknown): boolean {
  if (error instanceof OllamaHttpError) return error.status >= 500;
  // zod failures mean the server answered with something unexpected; retrying won't help
  return !(error instanceof z.ZodError);
}

export class OllamaCompletionService implements CompletionService {
  private readonly client: OllamaClient;
  private readonly config: ModelConfig;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OllamaCompletionOptions = {}) {
    this.client = options.client ?? new OllamaClient();
    this.config = { ...defaultModelConfigs[options.modelType ?? 'GENERAL'], ...options.config };
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.sleep = options.sleep ?? wait;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: OllamaChatMessage[] = [];
    if (request.system) messages.push({ role: 'system', content: request.system });
    messages.push({ role: 'user', content: request.prompt });

    let lastError: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) await this.sleep(this.retryDelayMs * 2 ** (attempt - 1));
      try {
        const response = await this.client.chat(
          {
            model: this.config.model,
            messages,
            format: request.json ? 'json' : undefined,
            options: {
              temperature: request.temperature ?? this.config.temperature,
              top_p: this.config.topP,
              num_predict: this.config.maxTokens,
            },
          },
          this.config.timeout,
          request.signal,
        );
        return response.message.content;
      } catch (error) {
        lastError = error;
        if (request.signal?.aborted || !isRetryable(error)) break;
      }
    }
    throw lastError;
  }
}
