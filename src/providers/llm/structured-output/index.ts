/**
 * Strategy Registry and Executor
 *
 * Picks structured-output strategies from provider capabilities and runs
 * them in order. Each strategy is retried with validation feedback before
 * the executor falls back to the next one.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { z } from 'zod';
import { c } from '@/utils/colors';
import type { CompletionOptions, Message } from '../types';
import { jsonModeStrategy } from './json-mode';
import { promptBasedStrategy } from './prompt-based';
import { structuredOutputStrategy } from './structured-output';
import { toolCallingStrategy } from './tool-calling';
import type {
  ProviderCapabilities,
  StrategyError,
  StrategyExecutorOptions,
  StrategyName,
  StructuredOutputStrategy
} from './types';

const ALL_STRATEGIES: StructuredOutputStrategy[] = [
  structuredOutputStrategy,
  toolCallingStrategy,
  jsonModeStrategy,
  promptBasedStrategy
];

/**
 * Strategies for a provider, in that provider's order of preference.
 */
export function getStrategiesForProvider(
  capabilities: ProviderCapabilities
): StructuredOutputStrategy[] {
  let ordered: StructuredOutputStrategy[];

  switch (capabilities.provider) {
    case 'anthropic':
      // No native structured output
      ordered = [toolCallingStrategy, promptBasedStrategy];
      break;

    case 'google':
      // JSON mode with response_schema first
      ordered = [jsonModeStrategy, toolCallingStrategy, promptBasedStrategy];
      break;

    default:
      ordered = ALL_STRATEGIES;
  }

  return ordered.filter((s) => s.isSupported(capabilities));
}

/**
 * Validation failures are worth a retry with feedback; transport errors are not.
 */
function isValidationError(error: Error): boolean {
  return (
    error instanceof z.ZodError ||
    error.message.includes('validation') ||
    error.message.includes('parse')
  );
}

/**
 * Execute structured output generation with tiered fallback and retry logic.
 *
 * With `forceStrategy` only that strategy runs, and it must be supported by
 * the provider. Throws an aggregated error when every strategy fails.
 */
export async function executeWithStrategies<T>(
  model: LanguageModelV3,
  messages: Message[],
  schema: z.ZodType<T>,
  capabilities: ProviderCapabilities,
  options?: CompletionOptions,
  executorOptions?: StrategyExecutorOptions
): Promise<T> {
  const { maxRetriesPerStrategy = 2, verbose = false, forceStrategy } = executorOptions ?? {};

  let strategies = getStrategiesForProvider(capabilities);

  if (forceStrategy) {
    const forced = strategies.find((s) => s.name === forceStrategy);
    if (!forced) {
      throw new Error(
        `Forced strategy "${forceStrategy}" is not supported for provider "${capabilities.provider}"`
      );
    }
    strategies = [forced];
  }

  if (strategies.length === 0) {
    throw new Error(`No strategies available for provider "${capabilities.provider}"`);
  }

  const errors: StrategyError[] = [];

  for (const strategy of strategies) {
    let currentMessages = messages;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetriesPerStrategy; attempt++) {
      try {
        const result = await strategy.execute(
          model,
          currentMessages,
          schema,
          capabilities,
          options
        );
        if (verbose && attempt > 0) {
          console.log(c.dim(`[llm] ${strategy.name} succeeded on attempt ${attempt + 1}`));
        }
        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (verbose) {
          console.log(
            c.dim(`[llm] ${strategy.name} failed on attempt ${attempt + 1}: ${lastError.message}`)
          );
        }

        if (attempt >= maxRetriesPerStrategy || !isValidationError(lastError)) {
          break;
        }

        currentMessages = [
          ...messages,
          {
            role: 'user',
            content:
              `The previous response was invalid. Error: ${lastError.message}. ` +
              'Please try again with a valid response matching the expected format.'
          }
        ];
      }
    }

    if (lastError) {
      errors.push({ strategy: strategy.name, error: lastError });
    }
  }

  const errorSummary = errors.map((e) => `${e.strategy}: ${e.error.message}`).join('\n');

  throw new Error(
    `All structured output strategies failed for provider "${capabilities.provider}".\n` +
      `Tried strategies: ${strategies.map((s) => s.name).join(', ')}\n` +
      `Errors:\n${errorSummary}`
  );
}

/**
 * Default capabilities for a provider.
 */
export function getDefaultCapabilities(provider: string): ProviderCapabilities {
  switch (provider) {
    case 'openai':
    case 'openai-compatible':
      return {
        provider,
        supportsStructuredOutputs: true,
        supportsToolCalling: true,
        supportsJsonMode: true
      };

    case 'anthropic':
      return {
        provider,
        supportsStructuredOutputs: false,
        supportsToolCalling: true,
        supportsJsonMode: false
      };

    case 'google':
      return {
        provider,
        supportsStructuredOutputs: false,
        supportsToolCalling: true,
        supportsJsonMode: true
      };

    case 'ollama':
      // Varies by model
      return {
        provider,
        supportsStructuredOutputs: false,
        supportsToolCalling: false,
        supportsJsonMode: true
      };

    default:
      return {
        provider,
        supportsStructuredOutputs: false,
        supportsToolCalling: false,
        supportsJsonMode: false
      };
  }
}

export type {
  ProviderCapabilities,
  StrategyError,
  StrategyExecutorOptions,
  StrategyName,
  StructuredOutputStrategy
};
export { strategyNames } from './types';
export { extractJSON, parseJSONLoose } from './prompt-based';
export { jsonModeStrategy, promptBasedStrategy, structuredOutputStrategy, toolCallingStrategy };
