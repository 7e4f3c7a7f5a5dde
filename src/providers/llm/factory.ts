/**
 * LLM Client Factory
 *
 * One model builder per provider. The `llm` config section is validated
 * before it gets here, so builders only re-check what the type cannot say.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { LLMConfig, LLMProvider } from '@/config/schema';
import { ConfigurationError } from '@/core/errors';
import { VercelLLMClient } from './client';
import { getDefaultCapabilities, type ProviderCapabilities } from './structured-output';
import type { LLMClient } from './types';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface CreateLLMClientOptions {
  apiKey?: string;
  baseUrl?: string;
  /** Name reported to openai-compatible endpoints */
  providerName?: string;
  /** Override default capability detection */
  capabilities?: Partial<ProviderCapabilities>;
}

type ModelBuilder = (model: string, options: CreateLLMClientOptions) => LanguageModelV3;

const builders: Record<LLMProvider, ModelBuilder> = {
  openai: (model, { apiKey }) => createOpenAI({ apiKey })(model),

  anthropic: (model, { apiKey }) => createAnthropic({ apiKey })(model),

  google: (model, { apiKey }) => createGoogleGenerativeAI({ apiKey })(model),

  // Ollama serves /v1/chat/completions; the SDK wants a key it never checks
  ollama: (model, { baseUrl }) =>
    createOpenAICompatible({
      name: 'ollama',
      baseURL: baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
      apiKey: 'ollama'
    }).languageModel(model),

  'openai-compatible': (model, { apiKey, baseUrl, providerName }) => {
    if (!baseUrl) {
      throw new ConfigurationError('baseUrl required for openai-compatible provider');
    }
    return createOpenAICompatible({
      name: providerName ?? 'openai-compatible',
      baseURL: baseUrl,
      apiKey: apiKey ?? '',
      supportsStructuredOutputs: true
    }).languageModel(model);
  }
};

export function createLLMClient(
  provider: LLMProvider,
  model: string,
  options: CreateLLMClientOptions = {}
): LLMClient {
  const capabilities: ProviderCapabilities = {
    ...getDefaultCapabilities(provider),
    ...options.capabilities,
    provider
  };
  return new VercelLLMClient(builders[provider](model, options), capabilities);
}

export function createLLMClientFromConfig(config: LLMConfig): LLMClient {
  const { provider, model, ...options } = config;
  return createLLMClient(provider, model, options);
}
