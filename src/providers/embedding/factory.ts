/**
 * Embedding Client Factory
 *
 * One model builder per provider, fed from the `embedding` config section.
 * Where the provider can shorten vectors, the configured dimensions are
 * fixed on the model once.
 */

import { createCohere } from '@ai-sdk/cohere';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createMistral } from '@ai-sdk/mistral';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { EmbeddingModelV3 } from '@ai-sdk/provider';
import { defaultEmbeddingSettingsMiddleware, wrapEmbeddingModel } from 'ai';
import type { EmbeddingConfig, EmbeddingProvider } from '@/config/schema';
import { ConfigurationError } from '@/core/errors';
import { DEFAULT_OLLAMA_BASE_URL } from '../llm/factory';
import { VercelEmbeddingClient } from './client';
import type { EmbeddingClient } from './types';

export interface CreateEmbeddingClientOptions {
  apiKey?: string;
  baseUrl?: string;
  /** Name reported to openai-compatible endpoints */
  providerName?: string;
}

type ModelBuilder = (
  model: string,
  dimensions: number,
  options: CreateEmbeddingClientOptions
) => EmbeddingModelV3;

/**
 * Send the provider option that fixes output size with every request.
 */
function withDimensions(
  model: EmbeddingModelV3,
  providerKey: string,
  setting: Record<string, number>
): EmbeddingModelV3 {
  return wrapEmbeddingModel({
    model,
    middleware: defaultEmbeddingSettingsMiddleware({
      settings: { providerOptions: { [providerKey]: setting } }
    })
  });
}

const builders: Record<EmbeddingProvider, ModelBuilder> = {
  openai: (model, dimensions, { apiKey }) =>
    withDimensions(createOpenAI({ apiKey }).embedding(model), 'openai', { dimensions }),

  google: (model, dimensions, { apiKey }) =>
    withDimensions(createGoogleGenerativeAI({ apiKey }).embedding(model), 'google', {
      outputDimensionality: dimensions
    }),

  cohere: (model, _dimensions, { apiKey }) => createCohere({ apiKey }).embedding(model),

  mistral: (model, _dimensions, { apiKey }) => createMistral({ apiKey }).embedding(model),

  ollama: (model, _dimensions, { baseUrl }) =>
    createOpenAICompatible({
      name: 'ollama',
      baseURL: baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
      apiKey: 'ollama'
    }).embeddingModel(model),

  // Not every compatible endpoint accepts a dimensions option
  'openai-compatible': (model, _dimensions, { apiKey, baseUrl, providerName }) => {
    if (!baseUrl) {
      throw new ConfigurationError('baseUrl required for openai-compatible provider');
    }
    return createOpenAICompatible({
      name: providerName ?? 'openai-compatible',
      baseURL: baseUrl,
      apiKey: apiKey ?? ''
    }).embeddingModel(model);
  }
};

export function createEmbeddingClient(
  provider: EmbeddingProvider,
  model: string,
  dimensions: number,
  options: CreateEmbeddingClientOptions = {}
): EmbeddingClient {
  return new VercelEmbeddingClient(builders[provider](model, dimensions, options));
}

export function createEmbeddingClientFromConfig(config: EmbeddingConfig): EmbeddingClient {
  const { provider, model, dimensions, ...options } = config;
  return createEmbeddingClient(provider, model, dimensions, options);
}
