/**
 * NER Schemas
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// Model Output
// ═══════════════════════════════════════════════════════════════════════════════

export interface RecognizedEntity {
  /** Surface form as it appears in the text */
  text: string;
  entityType: string;
  score: number | null;
}

export interface NEROutput {
  entities: RecognizedEntity[];
}

export function createOutputSchema(entityTypes: readonly string[]): z.ZodType<NEROutput> {
  return z.object({
    entities: z.array(
      z.object({
        text: z.string().describe('The entity exactly as written in the text'),
        entityType: z.enum(entityTypes),
        score: z.number().min(0).max(1).nullable()
      })
    )
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Few-shot Examples
// ═══════════════════════════════════════════════════════════════════════════════

export type NERExample = {
  text: string;
  entities: { text: string; entityType: string }[];
};

export function createExampleSchema(entityTypes: readonly string[]): z.ZodType<NERExample> {
  return z
    .object({
      text: z.string().min(1),
      entities: z.array(z.object({ text: z.string().min(1), entityType: z.enum(entityTypes) }))
    })
    .superRefine((example, ctx) => {
      example.entities.forEach((entity, i) => {
        if (!example.text.includes(entity.text)) {
          ctx.addIssue({
            code: 'custom',
            path: ['entities', i, 'text'],
            message: `"${entity.text}" does not occur in the example text`
          });
        }
      });
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════════

export interface LocatedEntity extends RecognizedEntity {
  /** Offsets of the first occurrence in the document text, or null */
  start: number | null;
  end: number | null;
}

export interface NERResult {
  entities: LocatedEntity[];
}
