/**
 * Zero-shot Engine Tests
 *
 * Label hypotheses and chunk texts are looked up in a fixed vector table.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ConfigurationError, InferenceError } from '@/core/errors';
import type { ChoiceShape } from '@/engines/types';
import {
  EmbeddingZeroShotEngine,
  rankLabels,
  scoreSimilarities,
  softmax
} from '@/engines/zero-shot/engine';
import { UNIT_VECTOR_X, UNIT_VECTOR_Y } from '../../helpers/fixtures';
import { createMockEmbeddingClient } from '../../helpers/mocks';

const shape: ChoiceShape = { kind: 'choice', labels: ['sports', 'politics'] };

function createVectors(): Record<string, number[]> {
  return {
    'This text is about sports.': UNIT_VECTOR_X,
    'This text is about politics.': UNIT_VECTOR_Y,
    'match report': UNIT_VECTOR_X,
    'election night': UNIT_VECTOR_Y
  };
}

describe('scoring helpers', () => {
  test('softmax sums to 1 and keeps order', () => {
    const scores = softmax([1, 0], 1);
    expect(scores.reduce((a, b) => a + b, 0)).toBeCloseTo(1);
    expect(scores[0]).toBeGreaterThan(scores[1] ?? 1);
  });

  test('multi-label maps cosine from [-1, 1] to [0, 1]', () => {
    expect(scoreSimilarities([1, 0, -1], 'multi-label', 0.1)).toEqual([1, 0.5, 0]);
  });

  test('rankLabels sorts descending and keeps declared order on ties', () => {
    expect(rankLabels(['a', 'b', 'c'], [0.2, 0.5, 0.2])).toEqual({
      labels: ['b', 'a', 'c'],
      scores: [0.5, 0.2, 0.2]
    });
  });
});

describe('EmbeddingZeroShotEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('multi-label scores each label independently', async () => {
    const engine = new EmbeddingZeroShotEngine(createMockEmbeddingClient(createVectors()));
    const run = engine.buildExecutable({
      mode: 'multi-label',
      promptTemplate: null,
      outputShape: shape,
      fewshotExamples: []
    });

    expect(await run([{ text: 'election night' }])).toEqual([
      { labels: ['politics', 'sports'], scores: [1, 0.5] }
    ]);
  });

  test('single-label puts almost all mass on the closest label', async () => {
    const engine = new EmbeddingZeroShotEngine(createMockEmbeddingClient(createVectors()));
    const [result] = await engine.buildExecutable({
      mode: 'single-label',
      promptTemplate: null,
      outputShape: shape,
      fewshotExamples: []
    })([{ text: 'match report' }]);

    expect(result?.labels).toEqual(['sports', 'politics']);
    expect(result?.scores[0]).toBeCloseTo(1, 3);
  });

  test('uses a custom hypothesis template', async () => {
    const client = createMockEmbeddingClient({
      ...createVectors(),
      'Topic: sports': UNIT_VECTOR_X,
      'Topic: politics': UNIT_VECTOR_Y
    });
    await new EmbeddingZeroShotEngine(client)
      .buildExecutable({
        mode: 'multi-label',
        promptTemplate: 'Topic: {{label}}',
        outputShape: shape,
        fewshotExamples: []
      })([{ text: 'match report' }]);

    expect(client.batches[0]).toEqual(['Topic: sports', 'Topic: politics']);
  });

  test('embeds label hypotheses once per executable', async () => {
    const client = createMockEmbeddingClient(createVectors());
    const run = new EmbeddingZeroShotEngine(client).buildExecutable({
      mode: 'multi-label',
      promptTemplate: null,
      outputShape: shape,
      fewshotExamples: []
    });

    await run([{ text: 'match report' }]);
    await run([{ text: 'election night' }]);

    expect(client.batches).toEqual([
      ['This text is about sports.', 'This text is about politics.'],
      ['match report'],
      ['election night']
    ]);
  });

  test('a blank chunk becomes null in lenient mode', async () => {
    const run = new EmbeddingZeroShotEngine(createMockEmbeddingClient(createVectors())).buildExecutable({
      mode: 'multi-label',
      promptTemplate: null,
      outputShape: shape,
      fewshotExamples: []
    });

    const results = await run([{ text: '   ' }, { text: 'match report' }, { text: null }]);
    expect(results[0]).toBeNull();
    expect(results[1]?.labels[0]).toBe('sports');
    expect(results[2]).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  test('a failed embedding request nulls its whole batch', async () => {
    const run = new EmbeddingZeroShotEngine(createMockEmbeddingClient(createVectors()), {
      batchSize: 2
    }).buildExecutable({
      mode: 'multi-label',
      promptTemplate: null,
      outputShape: shape,
      fewshotExamples: []
    });

    const results = await run([
      { text: 'match report' },
      { text: 'unknown text' },
      { text: 'election night' }
    ]);
    expect(results[0]).toBeNull();
    expect(results[1]).toBeNull();
    expect(results[2]?.labels[0]).toBe('politics');
  });

  test('strict mode rejects on a failed chunk', async () => {
    const run = new EmbeddingZeroShotEngine(createMockEmbeddingClient(createVectors()), {
      strictMode: true
    }).buildExecutable({
      mode: 'multi-label',
      promptTemplate: null,
      outputShape: shape,
      fewshotExamples: []
    });

    await expect(run([{ text: '' }])).rejects.toThrow(
      'Zero-shot inference failed for chunk 0: chunk has no text to classify'
    );
  });

  test('a label embedding failure rejects and is retried on the next call', async () => {
    const vectors = createVectors();
    delete vectors['This text is about politics.'];
    const run = new EmbeddingZeroShotEngine(createMockEmbeddingClient(vectors)).buildExecutable({
      mode: 'multi-label',
      promptTemplate: null,
      outputShape: shape,
      fewshotExamples: []
    });

    await expect(run([{ text: 'match report' }])).rejects.toThrow(InferenceError);

    vectors['This text is about politics.'] = UNIT_VECTOR_Y;
    expect(await run([{ text: 'match report' }])).toEqual([
      { labels: ['sports', 'politics'], scores: [1, 0.5] }
    ]);
  });

  test('rejects few-shot examples and empty label sets', () => {
    const engine = new EmbeddingZeroShotEngine(createMockEmbeddingClient({}));
    expect(() =>
      engine.buildExecutable({
        mode: 'multi-label',
        promptTemplate: null,
        outputShape: shape,
        fewshotExamples: [{ text: 'x' }]
      })
    ).toThrow(ConfigurationError);
    expect(() =>
      engine.buildExecutable({
        mode: 'multi-label',
        promptTemplate: null,
        outputShape: { kind: 'choice', labels: [] },
        fewshotExamples: []
      })
    ).toThrow(ConfigurationError);
  });
});
