/**
 * Ollama model configuration loaded from environment variables.
 * All models run locally via Ollama - no external API costs.
 */

export const OllamaModels = {
  /** Structured extraction (resume parsing) */
  GENERAL: process.env.OLLAMA_MODEL_GENERAL ?? 'qwen2.5:32b-instruct-q4_K_M',

  /** Job-fit reasoning (match scoring) */
  REASONING: process.env.OLLAMA_MODEL_REASONING ?? 'qwen2.5:32b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  GENERAL: {
    model: OllamaModels.GENERAL,
    temperature: 0.3,
    maxTokens: 2048,
    timeout: 180000, // 3 minutes per resume
  },
  REASONING: {
    model: OllamaModels.REASONING,
    temperature: 0.3,
    maxTokens: 2048,
    timeout: 180000,
  },
};
