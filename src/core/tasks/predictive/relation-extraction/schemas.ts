/**
 * Relation Extraction Schemas
 *
 * A relation is a (head, relation, tail) triplet. Entity types are a closed
 * set when the task declares them and free text otherwise.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// Model Output
// ═══════════════════════════════════════════════════════════════════════════════

export interface RelationEntity {
  text: string;
  entityType: string;
}

export interface RelationTriplet {
  head: RelationEntity;
  relation: string;
  tail: RelationEntity;
  score: number | null;
}

export interface RelationExtractionOutput {
  triplets: RelationTriplet[];
}

function entitySchema(entityTypes: readonly string[] | null) {
  return z.object({
    text: z.string().min(1).describe('The entity exactly as written in the text'),
    entityType: entityTypes ? z.enum(entityTypes) : z.string().min(1)
  });
}

export function createOutputSchema(
  relations: readonly string[],
  entityTypes: readonly string[] | null
): z.ZodType<RelationExtractionOutput> {
  return z.object({
    triplets: z.array(
      z.object({
        head: entitySchema(entityTypes).describe('Subject of the relation'),
        relation: z.enum(relations),
        tail: entitySchema(entityTypes).describe('Object of the relation'),
        score: z.number().min(0).max(1).nullable()
      })
    )
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Few-shot Examples
// ═══════════════════════════════════════════════════════════════════════════════

export type RelationExtractionExample = {
  text: string;
  triplets: { head: RelationEntity; relation: string; tail: RelationEntity }[];
};

export function createExampleSchema(
  relations: readonly string[],
  entityTypes: readonly string[] | null
): z.ZodType<RelationExtractionExample> {
  return z
    .object({
      text: z.string().min(1),
      triplets: z.array(
        z.object({
          head: entitySchema(entityTypes),
          relation: z.enum(relations),
          tail: entitySchema(entityTypes)
        })
      )
    })
    .superRefine((example, ctx) => {
      example.triplets.forEach((triplet, i) => {
        for (const side of ['head', 'tail'] as const) {
          if (!example.text.includes(triplet[side].text)) {
            ctx.addIssue({
              code: 'custom',
              path: ['triplets', i, side, 'text'],
              message: `"${triplet[side].text}" does not occur in the example text`
            });
          }
        }
      });
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════════

export interface RelationExtractionResult {
  /** Distinct triplets in first-seen order, score averaged over chunks */
  triplets: RelationTriplet[];
}
