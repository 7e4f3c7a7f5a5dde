/**
 * Zero-shot Engine
 *
 * Embedding-similarity classifier. Each label is turned into a hypothesis
 * sentence through the prompt template (`{{label}}`), embedded once per
 * executable, and compared with each chunk's embedding.
 *
 * - multi-label: each label scored independently as (cosine + 1) / 2
 * - single-label: softmax over cosine / temperature, scores sum to 1
 *
 * Results list labels by descending score; ties keep the declared label order.
 */

import { ConfigurationError, InferenceError, toError } from '@/core/errors';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { computeCosineSimilarity } from '@/providers/embedding/utils';
import { logChunkFailure } from '@/utils/logger';
import { chunkArray } from '../batch';
import { renderTemplate } from '../llm/template';
import type {
  ChoiceShape,
  EngineOptions,
  Executable,
  ExecutableSpec,
  InputRecord,
  ZeroShotEngine,
  ZeroShotInferenceMode,
  ZeroShotResult
} from '../types';

export const DEFAULT_HYPOTHESIS_TEMPLATE = 'This text is about {{label}}.';
const DEFAULT_BATCH_SIZE = 32;
const DEFAULT_TEMPERATURE = 0.1;

export interface ZeroShotEngineOptions extends EngineOptions {
  /** Softmax temperature for single-label mode */
  temperature?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Scoring
// ═══════════════════════════════════════════════════════════════════════════════

export function softmax(values: readonly number[], temperature: number): number[] {
  if (values.length === 0) return [];
  const scaled = values.map((v) => v / temperature);
  const max = Math.max(...scaled);
  const exps = scaled.map((v) => Math.exp(v - max));
  const total = exps.reduce((sum, v) => sum + v, 0);
  return exps.map((v) => v / total);
}

/**
 * Pair labels with scores and sort by descending score (stable).
 */
export function rankLabels(labels: readonly string[], scores: readonly number[]): ZeroShotResult {
  const ranked = labels
    .map((label, i) => ({ label, score: scores[i] ?? 0 }))
    .sort((a, b) => b.score - a.score);
  return { labels: ranked.map((r) => r.label), scores: ranked.map((r) => r.score) };
}

export function scoreSimilarities(
  similarities: readonly number[],
  mode: ZeroShotInferenceMode,
  temperature: number
): number[] {
  return mode === 'single-label'
    ? softmax(similarities, temperature)
    : similarities.map((s) => (s + 1) / 2);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Engine
// ═══════════════════════════════════════════════════════════════════════════════

export class EmbeddingZeroShotEngine implements ZeroShotEngine {
  readonly backend = 'zero-shot' as const;
  readonly supportsFewShot = false;
  readonly strictMode: boolean;
  private readonly batchSize: number;
  private readonly temperature: number;

  constructor(
    private readonly client: EmbeddingClient,
    options: ZeroShotEngineOptions = {}
  ) {
    this.strictMode = options.strictMode ?? false;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  }

  buildExecutable(
    spec: ExecutableSpec<ZeroShotInferenceMode, ChoiceShape>
  ): Executable<ZeroShotResult> {
    const { labels } = spec.outputShape;
    if (labels.length === 0) {
      throw new ConfigurationError('Zero-shot engine requires at least one label');
    }
    if (spec.fewshotExamples.length > 0) {
      throw new ConfigurationError('Zero-shot engine does not support few-shot examples');
    }

    const template = spec.promptTemplate ?? DEFAULT_HYPOTHESIS_TEMPLATE;
    const hypotheses = labels.map((label) => renderTemplate(template, { label }));
    let labelVectors: Promise<number[][]> | null = null;

    return async (records) => {
      labelVectors ??= this.client.embedBatch(hypotheses).catch((error: unknown) => {
        labelVectors = null;
        const cause = toError(error);
        throw new InferenceError(`Failed to embed label hypotheses: ${cause.message}`, cause);
      });
      const vectors = await labelVectors;

      const results: (ZeroShotResult | null)[] = [];
      for (const batch of chunkArray(records, this.batchSize)) {
        const offset = results.length;
        results.push(...(await this.classifyBatch(batch, offset, labels, vectors, spec.mode)));
      }
      return results;
    };
  }

  private async classifyBatch(
    records: InputRecord[],
    offset: number,
    labels: readonly string[],
    labelVectors: number[][],
    mode: ZeroShotInferenceMode
  ): Promise<(ZeroShotResult | null)[]> {
    const texts = records.map((r) => (typeof r['text'] === 'string' ? r['text'] : ''));
    const embeddable = texts.flatMap((text, i) => (text.trim() ? [i] : []));

    let vectors: number[][];
    try {
      vectors = await this.client.embedBatch(embeddable.map((i) => texts[i] ?? ''));
    } catch (error) {
      return records.map((_, i) => this.fail(offset + i, toError(error)));
    }

    const byIndex = new Map(embeddable.map((recordIndex, k) => [recordIndex, vectors[k]]));

    return records.map((_, i) => {
      const vector = byIndex.get(i);
      if (!vector) {
        return this.fail(offset + i, new Error('chunk has no text to classify'));
      }
      const similarities = labelVectors.map((lv) => computeCosineSimilarity(vector, lv));
      return rankLabels(labels, scoreSimilarities(similarities, mode, this.temperature));
    });
  }

  private fail(recordIndex: number, cause: Error): null {
    if (this.strictMode) {
      throw new InferenceError(
        `Zero-shot inference failed for chunk ${recordIndex}: ${cause.message}`,
        cause
      );
    }
    logChunkFailure(this.backend, recordIndex, cause);
    return null;
  }
}
