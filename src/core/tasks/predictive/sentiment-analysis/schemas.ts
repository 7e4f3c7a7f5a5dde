/**
 * Sentiment Analysis Schemas
 *
 * Sentiment per aspect is a score in [0, 1]: 1 very positive, 0.5 neutral,
 * 0 very negative.
 */

import { z } from 'zod';

export const OVERALL_ASPECT = 'overall';

export interface SentimentOutput {
  sentimentPerAspect: Record<string, number>;
  score: number | null;
}

function aspectScores(aspects: readonly string[]) {
  return z.object(
    Object.fromEntries(aspects.map((aspect) => [aspect, z.number().min(0).max(1)]))
  );
}

export function createOutputSchema(aspects: readonly string[]): z.ZodType<SentimentOutput> {
  return z.object({
    sentimentPerAspect: aspectScores(aspects),
    score: z.number().min(0).max(1).nullable().describe('Confidence in the analysis')
  });
}

export type SentimentAnalysisExample = {
  text: string;
  sentimentPerAspect: Record<string, number>;
};

export function createExampleSchema(
  aspects: readonly string[]
): z.ZodType<SentimentAnalysisExample> {
  return z.object({
    text: z.string().min(1),
    sentimentPerAspect: aspectScores(aspects)
  });
}

export interface SentimentAnalysisResult {
  /** Mean score in [0, 1] per aspect; look scores up by aspect name */
  sentimentPerAspect: Record<string, number>;
  score: number | null;
}
