/**
 * Consolidation Strategies
 *
 * Merge per-chunk raw results back into one result per document. Every
 * strategy receives the flattened chunk results of a whole task run plus one
 * offset range per document, and returns exactly one aggregate per range.
 *
 * Strategies are generic over the engine's raw result type: a bridge passes
 * an extractor that reads the per-chunk value the strategy aggregates. An
 * extractor that throws means the raw result has an unexpected shape; that
 * surfaces as a ConsolidationError and is never swallowed.
 *
 * Aggregation rules, per range of n chunks:
 * - LabelScore: one score per label per chunk, clamp to [0,1], sum per
 *   label, divide by n, stable sort desc
 * - SingleEntity: majority vote by identity, earliest-seen wins ties,
 *   null unless the winner outnumbers the null votes
 * - MultiEntity: dedup by identity in first-seen order, mean score
 * - Text: join non-null texts, trim, mean score
 * - QA: per declared question, join answers with a space, mean score
 * - MapScore: clamp, sum per key, divide by n; mean overall score
 */

import { ConsolidationError, toError } from '@/core/errors';
import { clampScore, entityKey, mean } from './utils';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/** Half-open range [start, end) into the flattened chunk results of one task run */
export type ChunkOffset = readonly [start: number, end: number];

export interface ConsolidationStrategy<Raw, Out> {
  consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): Out[];
}

/** Entities carry arbitrary identity fields plus an optional confidence */
export interface ScoredEntity {
  score: number | null;
}

export interface LabelScore {
  label: string;
  score: number;
}

export interface ScoredText {
  text: string;
  score: number | null;
}

export interface QAPair {
  question: string;
  answer: string;
  score: number | null;
}

export interface MapScore {
  scores: Record<string, number>;
  score: number | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run an extractor, converting any failure into a ConsolidationError.
 */
function read<Raw, V>(extract: (raw: Raw) => V, raw: Raw, index: number): V {
  try {
    return extract(raw);
  } catch (error) {
    const cause = toError(error);
    throw new ConsolidationError(
      `Unrecognized raw result for chunk ${index}: ${cause.message}`,
      cause
    );
  }
}

/**
 * Apply `fn` to every range, after checking the range lies inside `results`.
 */
function perRange<Raw, Out>(
  results: readonly (Raw | null)[],
  offsets: readonly ChunkOffset[],
  fn: (chunks: { raw: Raw | null; index: number }[], n: number) => Out
): Out[] {
  return offsets.map(([start, end]) => {
    if (start < 0 || end < start || end > results.length) {
      throw new ConsolidationError(
        `Offset range [${start}, ${end}) is outside ${results.length} chunk results`
      );
    }
    const chunks: { raw: Raw | null; index: number }[] = [];
    for (let index = start; index < end; index++) {
      chunks.push({ raw: results[index] ?? null, index });
    }
    return fn(chunks, end - start);
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Label Score
// ═══════════════════════════════════════════════════════════════════════════════

export class LabelScoreConsolidation<Raw> implements ConsolidationStrategy<Raw, LabelScore[]> {
  constructor(
    private readonly labels: readonly string[],
    private readonly extract: (raw: Raw) => Iterable<readonly [label: string, score: number]>
  ) {}

  consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): LabelScore[][] {
    return perRange(results, offsets, (chunks, n) => {
      const totals = new Map<string, number>(this.labels.map((label) => [label, 0]));

      for (const { raw, index } of chunks) {
        if (raw === null) continue;
        // A label repeated within one chunk counts once, last value wins
        const chunkScores = new Map(read(this.extract, raw, index));
        for (const [label, score] of chunkScores) {
          const current = totals.get(label);
          if (current === undefined) continue;
          totals.set(label, current + clampScore(score));
        }
      }

      return [...totals]
        .map(([label, total]) => ({ label, score: n > 0 ? total / n : 0 }))
        .sort((a, b) => b.score - a.score);
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Single Entity (majority vote)
// ═══════════════════════════════════════════════════════════════════════════════

export class SingleEntityConsolidation<Raw, E extends ScoredEntity>
  implements ConsolidationStrategy<Raw, E | null>
{
  constructor(private readonly extract: (raw: Raw) => E | null) {}

  consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): (E | null)[] {
    return perRange(results, offsets, (chunks) => {
      let nullVotes = 0;
      // Map iteration order is insertion order, i.e. first-seen chunk order
      const votes = new Map<string, { entity: E; count: number; scores: (number | null)[] }>();

      for (const { raw, index } of chunks) {
        const entity = raw === null ? null : read(this.extract, raw, index);
        if (entity === null) {
          nullVotes++;
          continue;
        }
        const key = entityKey(entity);
        const vote = votes.get(key);
        if (vote) {
          vote.count++;
          vote.scores.push(entity.score);
        } else {
          votes.set(key, { entity, count: 1, scores: [entity.score] });
        }
      }

      let winner: { entity: E; count: number; scores: (number | null)[] } | null = null;
      for (const vote of votes.values()) {
        if (!winner || vote.count > winner.count) winner = vote;
      }

      if (!winner || winner.count <= nullVotes) {
        return null;
      }
      return { ...winner.entity, score: mean(winner.scores) };
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Multi Entity (dedup + average)
// ═══════════════════════════════════════════════════════════════════════════════

export class MultiEntityConsolidation<Raw, E extends ScoredEntity>
  implements ConsolidationStrategy<Raw, E[]>
{
  constructor(private readonly extract: (raw: Raw) => readonly E[]) {}

  consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): E[][] {
    return perRange(results, offsets, (chunks) => {
      const groups = new Map<string, { entity: E; scores: (number | null)[] }>();

      for (const { raw, index } of chunks) {
        if (raw === null) continue;
        for (const entity of read(this.extract, raw, index)) {
          const key = entityKey(entity);
          const group = groups.get(key);
          if (group) group.scores.push(entity.score);
          else groups.set(key, { entity, scores: [entity.score] });
        }
      }

      return [...groups.values()].map(({ entity, scores }) => ({
        ...entity,
        score: mean(scores)
      }));
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Text
// ═══════════════════════════════════════════════════════════════════════════════

export class TextConsolidation<Raw> implements ConsolidationStrategy<Raw, ScoredText> {
  constructor(
    private readonly extract: (raw: Raw) => { text: string | null; score: number | null } | null,
    private readonly separator = '\n'
  ) {}

  consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): ScoredText[] {
    return perRange(results, offsets, (chunks) => {
      const texts: string[] = [];
      const scores: (number | null)[] = [];

      for (const { raw, index } of chunks) {
        if (raw === null) continue;
        const value = read(this.extract, raw, index);
        if (value === null || value.text === null) continue;
        texts.push(value.text);
        scores.push(value.score);
      }

      return { text: texts.join(this.separator).trim(), score: mean(scores) };
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Question Answering
// ═══════════════════════════════════════════════════════════════════════════════

export class QAConsolidation<Raw> implements ConsolidationStrategy<Raw, QAPair[]> {
  constructor(
    private readonly questions: readonly string[],
    private readonly extract: (raw: Raw) => readonly QAPair[]
  ) {}

  consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): QAPair[][] {
    return perRange(results, offsets, (chunks) => {
      const collected = new Map<string, { answers: string[]; scores: (number | null)[] }>(
        this.questions.map((q) => [q, { answers: [], scores: [] }])
      );

      for (const { raw, index } of chunks) {
        if (raw === null) continue;
        for (const pair of read(this.extract, raw, index)) {
          const entry = collected.get(pair.question);
          if (!entry) continue;
          entry.answers.push(pair.answer);
          entry.scores.push(pair.score);
        }
      }

      return [...collected].map(([question, { answers, scores }]) => ({
        question,
        answer: answers.join(' ').trim(),
        score: mean(scores)
      }));
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Aspect Score Map
// ═══════════════════════════════════════════════════════════════════════════════

export class MapScoreConsolidation<Raw> implements ConsolidationStrategy<Raw, MapScore> {
  constructor(
    private readonly keys: readonly string[],
    private readonly extract: (raw: Raw) => {
      scores: Readonly<Record<string, number>>;
      score: number | null;
    }
  ) {}

  consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): MapScore[] {
    return perRange(results, offsets, (chunks, n) => {
      const totals = new Map<string, number>(this.keys.map((key) => [key, 0]));
      const overall: (number | null)[] = [];

      for (const { raw, index } of chunks) {
        if (raw === null) continue;
        const value = read(this.extract, raw, index);
        for (const [key, score] of Object.entries(value.scores)) {
          const current = totals.get(key);
          if (current === undefined) continue;
          totals.set(key, current + clampScore(score));
        }
        overall.push(value.score);
      }

      const scores: Record<string, number> = {};
      for (const [key, total] of totals) {
        scores[key] = n > 0 ? total / n : 0;
      }
      return { scores, score: mean(overall) };
    });
  }
}
