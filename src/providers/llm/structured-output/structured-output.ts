/**
 * Tier 1: Structured Output Strategy
 *
 * Native structured output via Output.object(). The provider constrains
 * decoding to the schema, so no schema text is added to the prompt.
 *
 * Supported by OpenAI (json_schema response format) and some
 * OpenAI-compatible providers.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText, Output, zodSchema } from 'ai';
import type { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import {
  type ProviderCapabilities,
  type StructuredOutputStrategy,
  toProviderOptions
} from './types';

export const structuredOutputStrategy: StructuredOutputStrategy = {
  name: 'structured-output',

  isSupported(capabilities: ProviderCapabilities): boolean {
    return capabilities.supportsStructuredOutputs;
  },

  async execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    capabilities: ProviderCapabilities,
    options?: CompletionOptions
  ): Promise<T> {
    const { output } = await generateText({
      model,
      messages,
      output: Output.object({ schema: zodSchema(schema) }),
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      providerOptions: toProviderOptions(capabilities, options)
    });

    return schema.parse(output);
  }
};
