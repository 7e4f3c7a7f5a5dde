/**
 * Task Base
 *
 * A task is one pipeline stage. It receives the full document list, applies
 * itself to the documents its condition accepts, and returns every document
 * in the original order. Rejected documents pass through untouched, with no
 * entry under the task id.
 */

import type { Doc } from '@/data/doc';
import { TaskError } from '@/core/errors';

/** What a task consumes and produces; chained tasks must agree on it */
export type TaskIOType = string;

export const DOCUMENTS: TaskIOType = 'documents';

/** Decides per document, against its current state, whether the task applies */
export type DocPredicate = (doc: Doc) => boolean;

/**
 * Counters a task run adds to. Passed in by the caller and mutated, so one
 * object can collect a whole run.
 */
export interface TaskRunStats {
  /** Documents the task was applied to */
  documents: number;
  /** Documents rejected by the condition */
  skipped: number;
  chunks: number;
  /** Chunks that came back null from the engine */
  failedChunks: number;
}

export function createRunStats(): TaskRunStats {
  return { documents: 0, skipped: 0, chunks: 0, failedChunks: 0 };
}

export interface TaskOptions {
  id?: string;
  condition?: DocPredicate | null;
}

export abstract class Task {
  readonly id: string;
  readonly condition: DocPredicate | null;

  protected constructor(options: TaskOptions, defaultId: string) {
    this.id = options.id ?? defaultId;
    this.condition = options.condition ?? null;
  }

  get inputType(): TaskIOType {
    return DOCUMENTS;
  }

  get outputType(): TaskIOType {
    return DOCUMENTS;
  }

  get promptTemplate(): string | null {
    return null;
  }

  async run(docs: readonly Doc[], stats: TaskRunStats = createRunStats()): Promise<Doc[]> {
    const selected = docs
      .map((doc, index) => ({ doc, index }))
      .filter(({ doc }) => this.condition === null || this.condition(doc));

    stats.documents += selected.length;
    stats.skipped += docs.length - selected.length;

    const output = [...docs];
    if (selected.length === 0) {
      return output;
    }

    const processed = await this.process(
      selected.map(({ doc }) => doc),
      stats
    );
    if (processed.length !== selected.length) {
      throw new TaskError(
        `Task "${this.id}" returned ${processed.length} documents for ${selected.length} inputs`,
        'CONSOLIDATION_ERROR'
      );
    }

    selected.forEach(({ index }, k) => {
      const doc = processed[k];
      if (doc) output[index] = doc;
    });
    return output;
  }

  /**
   * Apply the task to the accepted documents, returning them in the same order.
   */
  protected abstract process(docs: Doc[], stats: TaskRunStats): Promise<Doc[]>;
}
