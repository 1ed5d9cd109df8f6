/**
 * Base agent class providing common functionality for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { createLogger, errorMessage, type Logger } from '@roleradar/core';
import type { Agent, AgentConfig, AgentContext, AgentResult, AgentLog } from './types.js';

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];
  private logger?: Logger;

  protected log(level: AgentLog['level'], message: string, data?: unknown): void {
    this.logs.push({
      timestamp: new Date(),
      level,
      message,
      data,
    });

    // config is a subclass field, so the shared logger is created on first use
    this.logger ??= createLogger(this.config.name);
    this.logger[level](message, data);
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /** Like `run`, but never throws: failures come back as `success: false`. */
  async execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();
    this.logs = [];

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
    };

    this.info(`Starting execution`);

    try {
      const validatedInput = this.inputSchema.parse(input);
      const output = await this.run(validatedInput, fullContext);
      const validatedOutput = this.outputSchema.parse(output);

      const duration = Date.now() - startTime;
      this.info(`Completed successfully`, { duration });

      return {
        success: true,
        data: validatedOutput,
        duration,
        context: fullContext,
      };
    } catch (err) {
      const duration = Date.now() - startTime;
      const message = errorMessage(err);

      this.error(`Execution failed: ${message}`, err);

      return {
        success: false,
        error: message,
        cause: err,
        duration,
        context: fullContext,
      };
    }
  }

  /**
   * Abstract method to be implemented by each agent.
   * Contains the core agent logic.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  /**
   * Get execution logs.
   */
  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}
