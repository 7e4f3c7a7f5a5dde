/**
 * chunkwise
 *
 * Document-level NLP tasks over chunked documents. Each task runs one batch
 * of inference over every chunk of every document, then merges the chunk
 * results back into one result per document.
 *
 * @example
 * ```typescript
 * import { Classification, Doc, EngineRegistry, Pipeline, getConfig } from 'chunkwise';
 *
 * const engines = EngineRegistry.fromConfig(getConfig());
 * const pipeline = new Pipeline([
 *   new Classification({ engine: engines.get('llm'), labels: ['billing', 'support'] })
 * ]);
 * const [doc] = await pipeline.run([new Doc({ text: 'My invoice is wrong.' })]);
 * ```
 */

export * from './core';
export { Doc, type DocInit } from './data/doc';
export * from './engines';

export { ConfigError, getConfig, loadConfig, parseConfig, resetConfig } from './config/config';
export type { Config, ConfigInput, EmbeddingConfig, LLMConfig } from './config/schema';

export { createEmbeddingClient, createEmbeddingClientFromConfig } from './providers/embedding/factory';
export type { EmbeddingClient } from './providers/embedding/types';
export { createLLMClient, createLLMClientFromConfig } from './providers/llm/factory';
export type { LLMClient, Message } from './providers/llm/types';
