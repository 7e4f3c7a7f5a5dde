/**
 * Information Extraction
 *
 * Extracts entities of a caller-described shape from documents, either the
 * single most relevant one or all of them.
 */

import type { z } from 'zod';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { informationExtractionBridges } from './bridges';
import {
  createExampleSchema,
  type EntityRecord,
  type ExtractionMode,
  type ExtractionRaw,
  type InformationExtractionExample,
  type InformationExtractionResult
} from './schemas';

export type {
  ExtractedEntity,
  ExtractionMode,
  InformationExtractionExample,
  InformationExtractionResult,
  MultiExtractionResult,
  SingleExtractionResult
} from './schemas';

export interface InformationExtractionOptions
  extends PredictiveTaskOptions<InformationExtractionExample> {
  /** Object schema describing one entity */
  entitySchema: z.ZodType<EntityRecord>;
  /** Defaults to 'multi' */
  mode?: ExtractionMode;
}

const TASK_NAME = 'InformationExtraction';

export class InformationExtraction extends PredictiveTask<
  ExtractionRaw,
  InformationExtractionResult,
  InformationExtractionExample
> {
  readonly mode: ExtractionMode;

  constructor(options: InformationExtractionOptions) {
    const mode = options.mode ?? 'multi';
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      informationExtractionBridges({ entitySchema: options.entitySchema, mode }),
      {
        taskId: options.id ?? 'information_extraction',
        promptInstructions: options.promptInstructions
      },
      options.inferenceMode
    );
    super(
      TASK_NAME,
      options,
      'information_extraction',
      bridge,
      createExampleSchema(options.entitySchema, mode)
    );
    this.mode = mode;
  }
}
