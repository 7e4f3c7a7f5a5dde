/**
 * Engines
 *
 * Inference backends behind the bridge contract.
 */

export { chunkArray, mapInBatches } from './batch';
export { type LLMEngineOptions, VercelLLMEngine } from './llm/engine';
export { formatExamples, renderTemplate, templateVariables } from './llm/template';
export { EngineRegistry } from './registry';
export type * from './types';
export { backendTypes } from './types';
export {
  DEFAULT_HYPOTHESIS_TEMPLATE,
  EmbeddingZeroShotEngine,
  type ZeroShotEngineOptions
} from './zero-shot/engine';
