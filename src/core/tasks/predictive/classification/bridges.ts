/**
 * Classification Bridges
 *
 * Both backends feed label scores into label-score consolidation; the
 * single-label result is the top entry of the consolidated distribution.
 */

import type { z } from 'zod';
import type { LLMEngine, LLMInferenceMode, ZeroShotEngine, ZeroShotInferenceMode, ZeroShotResult } from '@/engines/types';
import { type BridgeOptions, LLMBridge, ZeroShotBridge } from '../bridge';
import { type ChunkOffset, type LabelScore, LabelScoreConsolidation } from '../consolidation';
import type { BridgeFactories } from '../registry';
import {
  type ClassificationRaw,
  type ClassificationResult,
  createOutputSchema,
  type LLMClassificationOutput
} from './schemas';

export interface ClassificationSettings {
  labels: readonly string[];
  labelDescriptions: Readonly<Record<string, string>>;
  multiLabel: boolean;
}

function toResult(distribution: LabelScore[], multiLabel: boolean): ClassificationResult {
  const top = distribution[0];
  if (multiLabel || !top) {
    return { labelScores: distribution };
  }
  return { label: top.label, score: top.score };
}

function describeLabels({ labels, labelDescriptions }: ClassificationSettings): string {
  const described = labels.filter((label) => labelDescriptions[label] !== undefined);
  if (described.length === 0) return '';
  const lines = described.map((label) => `- ${label}: ${labelDescriptions[label]}`);
  return `\nLabel descriptions:\n${lines.join('\n')}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LLM
// ═══════════════════════════════════════════════════════════════════════════════

export class ClassificationLLMBridge extends LLMBridge<
  LLMClassificationOutput,
  ClassificationResult
> {
  private readonly consolidation: LabelScoreConsolidation<LLMClassificationOutput>;

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly settings: ClassificationSettings
  ) {
    super(engine, options, mode);
    this.consolidation = new LabelScoreConsolidation(settings.labels, (raw) =>
      'labelScores' in raw
        ? raw.labelScores.map((ls): [string, number] => [ls.label, ls.score])
        : [[raw.label, raw.score]]
    );
  }

  protected override get defaultPromptInstructions(): string {
    const labels = this.settings.labels.join(', ');
    const body = this.settings.multiLabel
      ? `Perform multi-label classification of the text given these labels: ${labels}.\n` +
        'For each label, give a score between 0 and 1 for how strongly the text should be ' +
        'assigned that label. 1 means it absolutely should, 0 the opposite. ' +
        'Scores do not have to add up to 1.'
      : `Classify the text into exactly one of these labels: ${labels}.\n` +
        'Return the best-fitting label with a confidence score between 0 and 1.';
    return body + describeLabels(this.settings);
  }

  protected override createOutputSchema(): z.ZodType<LLMClassificationOutput> {
    return createOutputSchema(this.settings.labels, this.settings.multiLabel);
  }

  override consolidate(
    results: readonly (LLMClassificationOutput | null)[],
    offsets: readonly ChunkOffset[]
  ): ClassificationResult[] {
    return this.consolidation
      .consolidate(results, offsets)
      .map((distribution) => toResult(distribution, this.settings.multiLabel));
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Zero-shot
// ═══════════════════════════════════════════════════════════════════════════════

export class ClassificationZeroShotBridge extends ZeroShotBridge<ClassificationResult> {
  private readonly consolidation: LabelScoreConsolidation<ZeroShotResult>;

  constructor(
    engine: ZeroShotEngine,
    options: BridgeOptions,
    mode: ZeroShotInferenceMode | undefined,
    private readonly settings: ClassificationSettings
  ) {
    super(
      engine,
      options,
      settings.labels,
      mode ?? (settings.multiLabel ? 'multi-label' : 'single-label')
    );
    this.consolidation = new LabelScoreConsolidation(settings.labels, (raw) =>
      raw.labels.map((label, i): [string, number] => [label, raw.scores[i] ?? 0])
    );
  }

  override consolidate(
    results: readonly (ZeroShotResult | null)[],
    offsets: readonly ChunkOffset[]
  ): ClassificationResult[] {
    return this.consolidation
      .consolidate(results, offsets)
      .map((distribution) => toResult(distribution, this.settings.multiLabel));
  }
}

export function classificationBridges(
  settings: ClassificationSettings
): BridgeFactories<ClassificationRaw, ClassificationResult> {
  return {
    llm: (engine, options, mode) => new ClassificationLLMBridge(engine, options, mode, settings),
    'zero-shot': (engine, options, mode) =>
      new ClassificationZeroShotBridge(engine, options, mode, settings)
  };
}
