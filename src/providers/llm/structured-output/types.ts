/**
 * Strategy Types for Structured Output Generation
 *
 * A strategy is one way of getting schema-conforming JSON out of a model.
 * Task prompts pick one explicitly through their inference mode, or let the
 * provider's tiered chain decide.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { z } from 'zod';
import type { CompletionOptions, Message } from '../types';

/**
 * Strategy names, most reliable first.
 */
export const strategyNames = [
  'structured-output',
  'tool-calling',
  'json-mode',
  'prompt-based'
] as const;
export type StrategyName = (typeof strategyNames)[number];

/**
 * Provider capabilities for structured output.
 * Detected at factory level based on provider type.
 */
export interface ProviderCapabilities {
  /** Native structured outputs (e.g., OpenAI json_schema) */
  supportsStructuredOutputs: boolean;
  supportsToolCalling: boolean;
  /** response_format: json_object */
  supportsJsonMode: boolean;
  provider: string;
}

export interface StrategyError {
  strategy: StrategyName;
  error: Error;
}

export interface StructuredOutputStrategy {
  readonly name: StrategyName;

  isSupported(capabilities: ProviderCapabilities): boolean;

  /**
   * Generate output and validate it against the schema.
   * @throws Error if generation or validation fails
   */
  execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    capabilities: ProviderCapabilities,
    options?: CompletionOptions
  ): Promise<T>;
}

export interface StrategyExecutorOptions {
  /** Maximum retries per strategy before falling back (default: 2) */
  maxRetriesPerStrategy?: number;
  /** Log strategy selection and fallback (default: false) */
  verbose?: boolean;
  /** Use only this strategy */
  forceStrategy?: StrategyName;
}

/**
 * Describe a schema to the model as JSON Schema.
 */
export function describeSchema<T>(schema: z.ZodType<T>): string {
  try {
    return JSON.stringify(z.toJSONSchema(schema, { unrepresentable: 'any' }), null, 2);
  } catch {
    return 'a JSON object matching the expected schema';
  }
}

/**
 * Append an instruction to the last message of a conversation.
 */
export function appendToLastMessage(messages: Message[], suffix: string): Message[] {
  const lastMessage = messages.at(-1);
  if (!lastMessage) {
    throw new Error('No messages provided');
  }
  return [
    ...messages.slice(0, -1),
    { role: lastMessage.role, content: `${lastMessage.content}\n\n${suffix}` }
  ];
}

/**
 * Wrap provider-specific options under the provider's key, as the AI SDK expects.
 */
export function toProviderOptions(
  capabilities: ProviderCapabilities,
  options?: CompletionOptions
): Record<string, NonNullable<CompletionOptions['options']>> | undefined {
  return options?.options ? { [capabilities.provider]: options.options } : undefined;
}
