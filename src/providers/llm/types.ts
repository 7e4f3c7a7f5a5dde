import type { JSONValue } from '@ai-sdk/provider';
import type { z } from 'zod';
import type { LLMProvider } from '@/config/schema';
import type { StrategyExecutorOptions } from './structured-output/types';

export type { LLMProvider };

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for LLM completion requests.
 * If not provided, the provider uses the API's defaults.
 */
export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  /** Provider-specific options, sent under the provider's key */
  options?: Record<string, JSONValue>;
}

/**
 * Options for structured JSON completion requests.
 */
export interface JSONCompletionOptions extends CompletionOptions {
  /** Retry count, verbose logging, forced strategy */
  strategyOptions?: StrategyExecutorOptions;
}

export interface LLMClient {
  /**
   * Generate a structured completion from the LLM.
   *
   * Uses the tiered strategy chain (structured output, tool calling, JSON mode,
   * prompt-based extraction) unless a strategy is forced through `strategyOptions`.
   *
   * @returns Parsed and validated response
   */
  completeJSON<T>(
    messages: Message[],
    schema: z.ZodType<T>,
    options?: JSONCompletionOptions
  ): Promise<T>;

  readonly modelId: string;
}
