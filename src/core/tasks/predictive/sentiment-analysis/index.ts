/**
 * Sentiment Analysis
 *
 * Aspect-based. The "overall" aspect is always scored, in addition to any
 * aspects the caller names.
 */

import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { sentimentAnalysisBridges } from './bridges';
import {
  createExampleSchema,
  OVERALL_ASPECT,
  type SentimentAnalysisExample,
  type SentimentAnalysisResult,
  type SentimentOutput
} from './schemas';

export { OVERALL_ASPECT } from './schemas';
export type { SentimentAnalysisExample, SentimentAnalysisResult } from './schemas';

export interface SentimentAnalysisOptions extends PredictiveTaskOptions<SentimentAnalysisExample> {
  aspects?: readonly string[];
}

const TASK_NAME = 'SentimentAnalysis';

export class SentimentAnalysis extends PredictiveTask<
  SentimentOutput,
  SentimentAnalysisResult,
  SentimentAnalysisExample
> {
  readonly aspects: readonly string[];

  constructor(options: SentimentAnalysisOptions) {
    const named = (options.aspects ?? []).map((aspect) => aspect.trim()).filter(Boolean);
    const aspects = [...new Set([OVERALL_ASPECT, ...named])];
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      sentimentAnalysisBridges(aspects),
      { taskId: options.id ?? 'sentiment_analysis', promptInstructions: options.promptInstructions },
      options.inferenceMode
    );
    super(TASK_NAME, options, 'sentiment_analysis', bridge, createExampleSchema(aspects));
    this.aspects = aspects;
  }
}
