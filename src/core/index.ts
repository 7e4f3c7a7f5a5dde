/**
 * Core
 *
 * Public API barrel file. Re-exports the pipeline, tasks and errors.
 *
 * @example
 * ```typescript
 * import { Classification, Pipeline } from '@/core';
 * ```
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline
// ═══════════════════════════════════════════════════════════════════════════════

export { Pipeline, type PipelineOptions, type PipelineState, type RunOptions } from './pipeline';

// ═══════════════════════════════════════════════════════════════════════════════
// Tasks
// ═══════════════════════════════════════════════════════════════════════════════

export {
  createRunStats,
  DOCUMENTS,
  type DocPredicate,
  Task,
  type TaskIOType,
  type TaskOptions,
  type TaskRunStats
} from './tasks/task';

export * from './tasks/predictive';

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

export * from './errors';
