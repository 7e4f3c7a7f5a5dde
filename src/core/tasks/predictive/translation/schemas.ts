/**
 * Translation Schemas
 */

import { z } from 'zod';

export interface TranslationOutput {
  translation: string;
  score: number | null;
}

export const outputSchema: z.ZodType<TranslationOutput> = z.object({
  translation: z.string(),
  score: z.number().min(0).max(1).nullable()
});

export const exampleSchema = z.object({
  text: z.string().min(1),
  targetLanguage: z.string().min(1),
  translation: z.string().min(1)
});

export type TranslationExample = z.infer<typeof exampleSchema>;

export interface TranslationResult {
  translation: string;
  score: number | null;
}
