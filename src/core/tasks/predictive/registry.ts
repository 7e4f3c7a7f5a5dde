/**
 * Bridge Registry
 *
 * Each task declares, per backend tag, a factory for its bridge. The bridge
 * is resolved once when the task is constructed; a backend the task has no
 * factory for fails there with UnsupportedBackendError.
 */

import { ConfigurationError, UnsupportedBackendError } from '@/core/errors';
import {
  backendTypes,
  type Engine,
  type InferenceMode,
  type LLMEngine,
  type LLMInferenceMode,
  type ZeroShotEngine,
  type ZeroShotInferenceMode
} from '@/engines/types';
import type { Bridge, BridgeOptions } from './bridge';

export interface BridgeFactories<Raw, Result> {
  llm?: (
    engine: LLMEngine,
    options: BridgeOptions,
    mode?: LLMInferenceMode
  ) => Bridge<Raw, Result>;
  'zero-shot'?: (
    engine: ZeroShotEngine,
    options: BridgeOptions,
    mode?: ZeroShotInferenceMode
  ) => Bridge<Raw, Result>;
}

export function supportedBackends<Raw, Result>(factories: BridgeFactories<Raw, Result>): string[] {
  return backendTypes.filter((backend) => factories[backend] !== undefined);
}

/**
 * Pick the bridge for the engine's backend.
 *
 * @param inferenceMode - Explicit mode; its backend tag must match the engine's
 */
export function resolveBridge<Raw, Result>(
  taskName: string,
  engine: Engine,
  factories: BridgeFactories<Raw, Result>,
  options: BridgeOptions,
  inferenceMode?: InferenceMode
): Bridge<Raw, Result> {
  if (inferenceMode && inferenceMode.backend !== engine.backend) {
    throw new ConfigurationError(
      `${taskName}: inference mode for backend "${inferenceMode.backend}" ` +
        `cannot be used with a "${engine.backend}" engine`
    );
  }

  switch (engine.backend) {
    case 'llm': {
      const create = factories.llm;
      if (!create) {
        throw new UnsupportedBackendError(taskName, engine.backend, supportedBackends(factories));
      }
      return create(
        engine,
        options,
        inferenceMode?.backend === 'llm' ? inferenceMode.mode : undefined
      );
    }

    case 'zero-shot': {
      const create = factories['zero-shot'];
      if (!create) {
        throw new UnsupportedBackendError(taskName, engine.backend, supportedBackends(factories));
      }
      return create(
        engine,
        options,
        inferenceMode?.backend === 'zero-shot' ? inferenceMode.mode : undefined
      );
    }

    default: {
      const _exhaustive: never = engine;
      throw new ConfigurationError(`Unknown engine: ${String(_exhaustive)}`);
    }
  }
}
