/**
 * Task Errors
 *
 * Typed error hierarchy for task construction and execution.
 * Every error carries a `type` so callers can branch without string matching:
 *
 * - CONFIGURATION_ERROR: raised at construction time, fatal
 * - EXTRACTION_ERROR: a document cannot be turned into engine input, aborts the run
 * - INFERENCE_ERROR: a chunk failed inference while the engine runs in strict mode
 * - CONSOLIDATION_ERROR: engine or strategy output broke a length/shape invariant
 */

export type TaskErrorType =
  | 'CONFIGURATION_ERROR'
  | 'EXTRACTION_ERROR'
  | 'INFERENCE_ERROR'
  | 'CONSOLIDATION_ERROR';

export class TaskError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: TaskErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'TaskError';
    this.cause = cause;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export class ConfigurationError extends TaskError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

export class DuplicateTaskIdError extends ConfigurationError {
  constructor(public readonly taskIds: string[]) {
    super(`Duplicate task ids in pipeline: ${taskIds.join(', ')}`);
    this.name = 'DuplicateTaskIdError';
  }
}

export class TaskChainTypeMismatchError extends ConfigurationError {
  constructor(
    public readonly producerId: string,
    public readonly consumerId: string,
    producedType: string,
    consumedType: string
  ) {
    super(
      `Task "${producerId}" outputs ${producedType} but "${consumerId}" expects ${consumedType}`
    );
    this.name = 'TaskChainTypeMismatchError';
  }
}

export class UnsupportedBackendError extends ConfigurationError {
  constructor(
    public readonly taskName: string,
    public readonly backend: string,
    supported: readonly string[]
  ) {
    super(
      `${taskName} does not support backend "${backend}" (supported: ${supported.join(', ')})`
    );
    this.name = 'UnsupportedBackendError';
  }
}

export class BackendUnavailableError extends ConfigurationError {
  constructor(
    public readonly backend: string,
    available: readonly string[]
  ) {
    super(
      `Backend "${backend}" is not available` +
        (available.length > 0 ? ` (available: ${available.join(', ')})` : ' (none configured)')
    );
    this.name = 'BackendUnavailableError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Execution
// ═══════════════════════════════════════════════════════════════════════════════

export class MissingTextError extends TaskError {
  constructor(
    public readonly taskId: string,
    public readonly docIndex: number
  ) {
    super(`Task "${taskId}": document ${docIndex} has no text`, 'EXTRACTION_ERROR');
    this.name = 'MissingTextError';
  }
}

export class InferenceError extends TaskError {
  constructor(message: string, cause?: Error) {
    super(message, 'INFERENCE_ERROR', cause);
    this.name = 'InferenceError';
  }
}

export class ConsolidationError extends TaskError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONSOLIDATION_ERROR', cause);
    this.name = 'ConsolidationError';
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
