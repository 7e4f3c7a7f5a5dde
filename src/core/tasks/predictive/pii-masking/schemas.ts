/**
 * PII Masking Schemas
 */

import { z } from 'zod';

export interface PIIEntity {
  entityType: string;
  /** The PII as it appeared before masking */
  text: string;
}

export interface PIIMaskingOutput {
  maskedText: string;
  piiEntities: PIIEntity[];
  score: number | null;
}

function piiEntitySchema(piiTypes: readonly string[] | null) {
  return z.object({
    entityType: piiTypes ? z.enum(piiTypes) : z.string().min(1),
    text: z.string().min(1)
  });
}

export function createOutputSchema(
  piiTypes: readonly string[] | null
): z.ZodType<PIIMaskingOutput> {
  return z.object({
    maskedText: z.string().describe('The text with every PII occurrence masked'),
    piiEntities: z.array(piiEntitySchema(piiTypes)).describe('Every PII that was masked'),
    score: z.number().min(0).max(1).nullable()
  });
}

export type PIIMaskingExample = {
  text: string;
  maskedText: string;
  piiEntities: PIIEntity[];
};

export function createExampleSchema(
  piiTypes: readonly string[] | null
): z.ZodType<PIIMaskingExample> {
  return z
    .object({
      text: z.string().min(1),
      maskedText: z.string().min(1),
      piiEntities: z.array(piiEntitySchema(piiTypes))
    })
    .superRefine((example, ctx) => {
      example.piiEntities.forEach((entity, i) => {
        if (!example.text.includes(entity.text)) {
          ctx.addIssue({
            code: 'custom',
            path: ['piiEntities', i, 'text'],
            message: `"${entity.text}" does not occur in the example text`
          });
        } else if (example.maskedText.includes(entity.text)) {
          ctx.addIssue({
            code: 'custom',
            path: ['maskedText'],
            message: `"${entity.text}" is left unmasked`
          });
        }
      });
    });
}

export interface PIIMaskingResult {
  maskedText: string;
  /** Distinct entities in first-seen order */
  piiEntities: PIIEntity[];
  score: number | null;
}
