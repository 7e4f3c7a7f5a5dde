/**
 * Vercel AI SDK v6 LLM Client
 *
 * Wraps generateText behind the tiered structured-output strategies.
 * No streaming: every task needs the complete response before validation.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { z } from 'zod';
import {
  executeWithStrategies,
  getDefaultCapabilities,
  type ProviderCapabilities
} from './structured-output';
import type { JSONCompletionOptions, LLMClient, Message } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;
  private readonly capabilities: ProviderCapabilities;

  constructor(
    private model: LanguageModelV3,
    capabilities?: ProviderCapabilities
  ) {
    this.modelId = model.modelId;
    this.capabilities = capabilities ?? getDefaultCapabilities('openai-compatible');
  }

  async completeJSON<T>(
    messages: Message[],
    schema: z.ZodType<T>,
    options?: JSONCompletionOptions
  ): Promise<T> {
    const { strategyOptions, ...completionOptions } = options ?? {};

    return executeWithStrategies(
      this.model,
      messages,
      schema,
      this.capabilities,
      completionOptions,
      strategyOptions
    );
  }
}
