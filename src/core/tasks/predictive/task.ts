/**
 * Predictive Task
 *
 * Runs a bridge over a document set in five strictly ordered steps:
 *
 * 1. Extract: one base input record per document (MissingTextError on null text)
 * 2. Chunk-expand: one record per chunk, `text` replaced by the chunk, and
 *    one offset range per document into the flattened record list
 * 3. Execute: a single call into the engine executable for every record
 * 4. Consolidate: one result per document from its range of chunk results
 * 5. Integrate: results written to `doc.results[taskId]`
 *
 * The executable is built once, at construction, so configuration problems
 * (missing template, unsupported few-shot, bad examples) surface before any
 * document is processed.
 */

import { z } from 'zod';
import type { Doc } from '@/data/doc';
import type { Engine, Executable, FewshotExample, InferenceMode, InputRecord } from '@/engines/types';
import { ConfigurationError, ConsolidationError } from '@/core/errors';
import { Task, type TaskOptions, type TaskRunStats } from '../task';
import type { Bridge } from './bridge';
import type { ChunkOffset } from './consolidation';

export interface PredictiveTaskOptions<Example extends FewshotExample = FewshotExample>
  extends TaskOptions {
  engine: Engine;
  /** Must be tagged with the engine's backend */
  inferenceMode?: InferenceMode;
  /** Replaces the task's default prompt instructions */
  promptInstructions?: string | null;
  fewshotExamples?: readonly Example[];
  /** Store each document's raw chunk results under `doc.meta[taskId].raw` */
  includeMeta?: boolean;
}

/** What `includeMeta` stores per document */
export interface TaskMeta {
  raw: unknown[];
}

/**
 * Validate few-shot examples against the task's example schema.
 */
export function validateExamples<Example extends FewshotExample>(
  taskName: string,
  examples: readonly unknown[],
  schema: z.ZodType<Example>
): Example[] {
  return examples.map((example, index) => {
    const result = schema.safeParse(example);
    if (!result.success) {
      throw new ConfigurationError(
        `${taskName}: invalid few-shot example ${index}: ${z.prettifyError(result.error)}`,
        result.error
      );
    }
    return result.data;
  });
}

export abstract class PredictiveTask<
  Raw,
  Result,
  Example extends FewshotExample = FewshotExample
> extends Task {
  readonly includeMeta: boolean;
  readonly fewshotExamples: readonly Example[];
  protected readonly bridge: Bridge<Raw, Result>;
  private readonly executable: Executable<Raw>;

  protected constructor(
    taskName: string,
    options: PredictiveTaskOptions<Example>,
    defaultId: string,
    bridge: Bridge<Raw, Result>,
    exampleSchema: z.ZodType<Example>
  ) {
    super(options, defaultId);
    this.bridge = bridge;
    this.includeMeta = options.includeMeta ?? false;
    this.fewshotExamples = validateExamples(taskName, options.fewshotExamples ?? [], exampleSchema);

    if (this.fewshotExamples.length > 0 && !bridge.supportsFewShot) {
      throw new ConfigurationError(
        `${taskName}: the ${bridge.backend} backend does not support few-shot examples`
      );
    }

    this.executable = bridge.buildExecutable(this.fewshotExamples);
  }

  override get promptTemplate(): string | null {
    return this.bridge.promptTemplate;
  }

  get inferenceMode(): InferenceMode {
    return this.bridge.inferenceMode;
  }

  protected override async process(docs: Doc[], stats: TaskRunStats): Promise<Doc[]> {
    const baseRecords = this.bridge.extract(docs);

    const records: InputRecord[] = [];
    const offsets: ChunkOffset[] = [];
    docs.forEach((doc, i) => {
      const start = records.length;
      for (const chunk of doc.effectiveChunks()) {
        records.push({ ...baseRecords[i], text: chunk });
      }
      offsets.push([start, records.length]);
    });
    stats.chunks += records.length;

    const rawResults = await this.executable(records);
    if (rawResults.length !== records.length) {
      throw new ConsolidationError(
        `Task "${this.id}": engine returned ${rawResults.length} results for ${records.length} chunks`
      );
    }
    stats.failedChunks += rawResults.filter((raw) => raw === null).length;

    const results = this.bridge.consolidate(rawResults, offsets);
    if (results.length !== docs.length) {
      throw new ConsolidationError(
        `Task "${this.id}": consolidation returned ${results.length} results for ${docs.length} documents`
      );
    }

    this.bridge.integrate(results, docs);

    if (this.includeMeta) {
      docs.forEach((doc, i) => {
        const [start, end] = offsets[i] ?? [0, 0];
        const meta: TaskMeta = { raw: rawResults.slice(start, end) };
        doc.meta[this.id] = meta;
      });
    }

    return docs;
  }
}
