/**
 * Question Answering
 *
 * Answers a fixed list of questions per document. Answers found in several
 * chunks are joined in chunk order.
 */

import { ConfigurationError } from '@/core/errors';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { questionAnsweringBridges } from './bridges';
import {
  createExampleSchema,
  type QAOutput,
  type QuestionAnsweringExample,
  type QuestionAnsweringResult
} from './schemas';

export type { QuestionAnsweringExample, QuestionAnsweringResult } from './schemas';

export interface QuestionAnsweringOptions extends PredictiveTaskOptions<QuestionAnsweringExample> {
  questions: readonly string[];
}

const TASK_NAME = 'QuestionAnswering';

export class QuestionAnswering extends PredictiveTask<
  QAOutput,
  QuestionAnsweringResult,
  QuestionAnsweringExample
> {
  readonly questions: readonly string[];

  constructor(options: QuestionAnsweringOptions) {
    const questions = options.questions.map((q) => q.trim());
    if (questions.length === 0 || questions.some((q) => q.length === 0)) {
      throw new ConfigurationError(`${TASK_NAME}: questions must be a non-empty list of non-blank strings`);
    }
    if (new Set(questions).size !== questions.length) {
      throw new ConfigurationError(`${TASK_NAME}: questions must be unique`);
    }
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      questionAnsweringBridges(questions),
      { taskId: options.id ?? 'question_answering', promptInstructions: options.promptInstructions },
      options.inferenceMode
    );
    super(TASK_NAME, options, 'question_answering', bridge, createExampleSchema(questions));
    this.questions = questions;
  }
}
