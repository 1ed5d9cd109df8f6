/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { LogLevel } from '@roleradar/core';

export interface AgentContext {
  runId?: string;
  timestamp: Date;
  signal?: AbortSignal;
  metadata?: Record<string, unknown>;
}

export type AgentResult<T> =
  | { success: true; data: T; duration: number; context: AgentContext }
  | { success: false; error: string; cause: unknown; duration: number; context: AgentContext };

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>>;
}

export interface AgentLog {
  timestamp: Date;
  level: LogLevel;
  message: string;
  data?: unknown;
}
