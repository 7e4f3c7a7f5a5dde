/**
 * Classification Schemas
 *
 * Model output, few-shot example and result shapes. Label enums are built
 * from the task's label set, so schemas are created per task instance.
 */

import { z } from 'zod';
import type { ZeroShotResult } from '@/engines/types';
import type { LabelScore } from '../consolidation';

// ═══════════════════════════════════════════════════════════════════════════════
// Model Output
// ═══════════════════════════════════════════════════════════════════════════════

export interface SingleLabelOutput {
  label: string;
  score: number;
}

export interface MultiLabelOutput {
  labelScores: LabelScore[];
}

export type LLMClassificationOutput = SingleLabelOutput | MultiLabelOutput;

export type ClassificationRaw = LLMClassificationOutput | ZeroShotResult;

const confidence = () => z.number().min(0).max(1);

export function labelScoreSchema(labels: readonly string[]) {
  return z.object({ label: z.enum(labels), score: confidence() });
}

export function createOutputSchema(
  labels: readonly string[],
  multiLabel: boolean
): z.ZodType<LLMClassificationOutput> {
  if (multiLabel) {
    return z.object({
      labelScores: z
        .array(labelScoreSchema(labels))
        .describe('One entry per label with a score between 0 and 1')
    });
  }
  return labelScoreSchema(labels).describe('The best-fitting label and its confidence');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Few-shot Examples
// ═══════════════════════════════════════════════════════════════════════════════

export type ClassificationExample = {
  text: string;
  /** single-label */
  label?: string;
  score?: number;
  /** multi-label */
  labelScores?: LabelScore[];
};

export function createExampleSchema(
  labels: readonly string[],
  multiLabel: boolean
): z.ZodType<ClassificationExample> {
  return z
    .object({
      text: z.string().min(1),
      label: z.enum(labels).optional(),
      score: confidence().optional(),
      labelScores: z.array(labelScoreSchema(labels)).optional()
    })
    .superRefine((example, ctx) => {
      if (multiLabel && !example.labelScores) {
        ctx.addIssue({
          code: 'custom',
          path: ['labelScores'],
          message: 'labelScores required for multi-label examples'
        });
      }
      if (!multiLabel && example.label === undefined) {
        ctx.addIssue({
          code: 'custom',
          path: ['label'],
          message: 'label required for single-label examples'
        });
      }
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════════

export interface SingleLabelResult {
  label: string;
  score: number;
}

export interface MultiLabelResult {
  /** Sorted by descending score */
  labelScores: LabelScore[];
}

export type ClassificationResult = SingleLabelResult | MultiLabelResult;
