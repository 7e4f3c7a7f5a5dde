/**
 * Translation
 */

import { ConfigurationError } from '@/core/errors';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { translationBridges } from './bridges';
import {
  exampleSchema,
  type TranslationExample,
  type TranslationOutput,
  type TranslationResult
} from './schemas';

export type { TranslationExample, TranslationResult } from './schemas';

export interface TranslationOptions extends PredictiveTaskOptions<TranslationExample> {
  targetLanguage: string;
  /** Replace the document text with the translation */
  overwrite?: boolean;
}

const TASK_NAME = 'Translation';

export class Translation extends PredictiveTask<
  TranslationOutput,
  TranslationResult,
  TranslationExample
> {
  readonly targetLanguage: string;
  readonly overwrite: boolean;

  constructor(options: TranslationOptions) {
    const targetLanguage = options.targetLanguage.trim();
    if (!targetLanguage) {
      throw new ConfigurationError(`${TASK_NAME}: targetLanguage is required`);
    }
    const overwrite = options.overwrite ?? false;
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      translationBridges(targetLanguage),
      {
        taskId: options.id ?? 'translation',
        promptInstructions: options.promptInstructions,
        overwrite
      },
      options.inferenceMode
    );
    super(TASK_NAME, options, 'translation', bridge, exampleSchema);
    this.targetLanguage = targetLanguage;
    this.overwrite = overwrite;
  }
}
