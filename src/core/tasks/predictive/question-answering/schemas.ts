/**
 * Question Answering Schemas
 *
 * Questions are an enum of the task's question list, so every answer the
 * model returns maps back to exactly one declared question.
 */

import { z } from 'zod';
import type { QAPair } from '../consolidation';

export interface QAOutput {
  qaPairs: QAPair[];
}

export function createOutputSchema(questions: readonly string[]): z.ZodType<QAOutput> {
  return z.object({
    qaPairs: z
      .array(
        z.object({
          question: z.enum(questions).describe('The question, copied verbatim'),
          answer: z.string(),
          score: z.number().min(0).max(1).nullable()
        })
      )
      .describe('One entry per question')
  });
}

export function createExampleSchema(questions: readonly string[]) {
  return z.object({
    text: z.string().min(1),
    qaPairs: z.array(z.object({ question: z.enum(questions), answer: z.string() }))
  });
}

export type QuestionAnsweringExample = {
  text: string;
  qaPairs: { question: string; answer: string }[];
};

export interface QuestionAnsweringResult {
  /** In the task's question order; unanswered questions have an empty answer */
  qaPairs: QAPair[];
}
