/**
 * Sentiment Analysis Bridge
 */

import type { z } from 'zod';
import type { LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import { type ChunkOffset, MapScoreConsolidation } from '../consolidation';
import type { BridgeFactories } from '../registry';
import { createOutputSchema, type SentimentAnalysisResult, type SentimentOutput } from './schemas';

export class SentimentAnalysisLLMBridge extends LLMBridge<SentimentOutput, SentimentAnalysisResult> {
  private readonly consolidation: MapScoreConsolidation<SentimentOutput>;

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly aspects: readonly string[]
  ) {
    super(engine, options, mode);
    this.consolidation = new MapScoreConsolidation(aspects, (raw) => ({
      scores: raw.sentimentPerAspect,
      score: raw.score
    }));
  }

  protected override get defaultPromptInstructions(): string {
    return (
      `Perform aspect-based sentiment analysis of the text for these aspects: ${this.aspects.join(', ')}.\n` +
      'For each aspect, give the sentiment of the text with respect to that aspect as a score ' +
      'between 0 and 1: 1 is extremely positive, 0.5 neutral, 0 extremely negative. ' +
      'The "overall" aspect reflects the sentiment of the text as a whole.\n' +
      'Also provide a confidence score between 0 and 1 for the analysis.'
    );
  }

  protected override createOutputSchema(): z.ZodType<SentimentOutput> {
    return createOutputSchema(this.aspects);
  }

  override consolidate(
    results: readonly (SentimentOutput | null)[],
    offsets: readonly ChunkOffset[]
  ): SentimentAnalysisResult[] {
    return this.consolidation.consolidate(results, offsets).map(({ scores, score }) => ({
      sentimentPerAspect: scores,
      score
    }));
  }
}

export function sentimentAnalysisBridges(
  aspects: readonly string[]
): BridgeFactories<SentimentOutput, SentimentAnalysisResult> {
  return {
    llm: (engine, options, mode) => new SentimentAnalysisLLMBridge(engine, options, mode, aspects)
  };
}
