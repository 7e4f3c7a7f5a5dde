/**
 * Summarization Schemas
 */

import { z } from 'zod';

export interface SummarizationOutput {
  summary: string;
  score: number | null;
}

export const outputSchema: z.ZodType<SummarizationOutput> = z.object({
  summary: z.string(),
  score: z.number().min(0).max(1).nullable()
});

export const exampleSchema = z.object({
  text: z.string().min(1),
  summary: z.string().min(1),
  maxWords: z.number().int().positive().optional()
});

export type SummarizationExample = z.infer<typeof exampleSchema>;

export interface SummarizationResult {
  summary: string;
  score: number | null;
}
