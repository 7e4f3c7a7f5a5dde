/**
 * Information Extraction Schemas
 *
 * The entity shape is caller-described: any zod object schema. The model
 * reports a confidence per entity next to it, kept out of the caller's
 * schema so user fields and scores never collide.
 */

import { z } from 'zod';

/** Any record the caller's entity schema produces */
export type EntityRecord = Record<string, unknown>;

export type ExtractionMode = 'single' | 'multi';

/** Caller's fields plus the consolidated confidence */
export type ExtractedEntity = EntityRecord & { score: number | null };

// ═══════════════════════════════════════════════════════════════════════════════
// Model Output
// ═══════════════════════════════════════════════════════════════════════════════

export interface SingleExtractionOutput {
  entity: EntityRecord | null;
  score: number | null;
}

export interface MultiExtractionOutput {
  entities: { entity: EntityRecord; score: number | null }[];
}

export type ExtractionRaw = SingleExtractionOutput | MultiExtractionOutput;

const confidence = () => z.number().min(0).max(1).nullable();

export function createOutputSchema(
  entitySchema: z.ZodType<EntityRecord>,
  mode: ExtractionMode
): z.ZodType<ExtractionRaw> {
  if (mode === 'multi') {
    return z.object({
      entities: z
        .array(z.object({ entity: entitySchema, score: confidence() }))
        .describe('Every occurrence of the entity in the text, each with a confidence')
    });
  }
  return z.object({
    entity: entitySchema.nullable().describe('The most relevant entity, or null if there is none'),
    score: confidence()
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Few-shot Examples
// ═══════════════════════════════════════════════════════════════════════════════

export type InformationExtractionExample = {
  text: string;
  /** single mode; null when the text holds no such entity */
  entity?: EntityRecord | null;
  /** multi mode */
  entities?: EntityRecord[];
};

export function createExampleSchema(
  entitySchema: z.ZodType<EntityRecord>,
  mode: ExtractionMode
): z.ZodType<InformationExtractionExample> {
  return z
    .object({
      text: z.string().min(1),
      entity: entitySchema.nullable().optional(),
      entities: z.array(entitySchema).optional()
    })
    .superRefine((example, ctx) => {
      if (mode === 'multi' && !example.entities) {
        ctx.addIssue({ code: 'custom', path: ['entities'], message: 'entities required in multi mode' });
      }
      if (mode === 'single' && example.entity === undefined) {
        ctx.addIssue({ code: 'custom', path: ['entity'], message: 'entity required in single mode' });
      }
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════════

export interface SingleExtractionResult {
  entity: ExtractedEntity | null;
}

export interface MultiExtractionResult {
  entities: ExtractedEntity[];
}

export type InformationExtractionResult = SingleExtractionResult | MultiExtractionResult;
