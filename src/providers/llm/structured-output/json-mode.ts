/**
 * Tier 3: JSON Mode Strategy
 *
 * Output.json() guarantees syntactically valid JSON but not the schema,
 * so the JSON Schema goes into the prompt and the result is validated
 * with zod afterwards.
 *
 * Supported by OpenAI, Google and some OpenAI-compatible providers.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText, Output } from 'ai';
import type { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import {
  appendToLastMessage,
  describeSchema,
  type ProviderCapabilities,
  type StructuredOutputStrategy,
  toProviderOptions
} from './types';

export const jsonModeStrategy: StructuredOutputStrategy = {
  name: 'json-mode',

  isSupported(capabilities: ProviderCapabilities): boolean {
    return capabilities.supportsJsonMode;
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
      messages: appendToLastMessage(
        messages,
        `Respond with a JSON value conforming to this JSON Schema:\n${describeSchema(schema)}`
      ),
      output: Output.json(),
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      providerOptions: toProviderOptions(capabilities, options)
    });

    return schema.parse(output);
  }
};
