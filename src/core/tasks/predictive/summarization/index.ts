/**
 * Summarization
 */

import { ConfigurationError } from '@/core/errors';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { summarizationBridges } from './bridges';
import {
  exampleSchema,
  type SummarizationExample,
  type SummarizationOutput,
  type SummarizationResult
} from './schemas';

export type { SummarizationExample, SummarizationResult } from './schemas';

export interface SummarizationOptions extends PredictiveTaskOptions<SummarizationExample> {
  /** Approximate summary length */
  maxWords: number;
  /** Replace the document text with the summary */
  overwrite?: boolean;
}

const TASK_NAME = 'Summarization';

export class Summarization extends PredictiveTask<
  SummarizationOutput,
  SummarizationResult,
  SummarizationExample
> {
  readonly maxWords: number;
  readonly overwrite: boolean;

  constructor(options: SummarizationOptions) {
    if (!Number.isInteger(options.maxWords) || options.maxWords <= 0) {
      throw new ConfigurationError(`${TASK_NAME}: maxWords must be a positive integer`);
    }
    const overwrite = options.overwrite ?? false;
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      summarizationBridges(options.maxWords),
      {
        taskId: options.id ?? 'summarization',
        promptInstructions: options.promptInstructions,
        overwrite
      },
      options.inferenceMode
    );
    super(TASK_NAME, options, 'summarization', bridge, exampleSchema);
    this.maxWords = options.maxWords;
    this.overwrite = overwrite;
  }
}
