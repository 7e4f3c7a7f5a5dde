/**
 * Engine Registry
 *
 * Holds the inference backends available to tasks. `fromConfig` is the
 * startup capability probe: a backend is registered only when its config
 * section is present, so asking for anything else fails fast with
 * BackendUnavailableError instead of at first inference.
 */

import type { Config } from '@/config/schema';
import { BackendUnavailableError } from '@/core/errors';
import { createEmbeddingClientFromConfig } from '@/providers/embedding/factory';
import { createLLMClientFromConfig } from '@/providers/llm/factory';
import { VercelLLMEngine } from './llm/engine';
import type { BackendType, Engine, EngineFor } from './types';
import { EmbeddingZeroShotEngine } from './zero-shot/engine';

export class EngineRegistry {
  private readonly engines = new Map<BackendType, Engine>();

  constructor(engines: Engine[] = []) {
    for (const engine of engines) this.register(engine);
  }

  /**
   * Build the registry for a validated config.
   */
  static fromConfig(config: Config): EngineRegistry {
    const registry = new EngineRegistry();
    const { strictMode, batchSize } = config.engine;

    if (config.llm) {
      const { temperature, maxTokens, maxRetries, options } = config.llm;
      registry.register(
        new VercelLLMEngine(createLLMClientFromConfig(config.llm), {
          strictMode,
          batchSize,
          maxRetriesPerStrategy: maxRetries,
          verbose: config.pipeline.verbose,
          completion: { temperature, maxTokens, options }
        })
      );
    }

    if (config.embedding) {
      registry.register(
        new EmbeddingZeroShotEngine(createEmbeddingClientFromConfig(config.embedding), {
          strictMode,
          batchSize
        })
      );
    }

    return registry;
  }

  /** Later registrations replace earlier ones for the same backend */
  register(engine: Engine): this {
    this.engines.set(engine.backend, engine);
    return this;
  }

  has(backend: BackendType): boolean {
    return this.engines.has(backend);
  }

  available(): BackendType[] {
    return [...this.engines.keys()];
  }

  get<B extends BackendType>(backend: B): EngineFor<B> {
    const engine = this.engines.get(backend);
    if (!engine || !isBackend(engine, backend)) {
      throw new BackendUnavailableError(backend, this.available());
    }
    return engine;
  }
}

function isBackend<B extends BackendType>(engine: Engine, backend: B): engine is EngineFor<B> {
  return engine.backend === backend;
}
