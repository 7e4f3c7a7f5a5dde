/**
 * Batch Helper Tests
 */

import { describe, expect, test } from 'vitest';
import { chunkArray, mapInBatches } from '@/engines/batch';

describe('chunkArray', () => {
  test('splits into consecutive slices', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  test('returns no batches for no items', () => {
    expect(chunkArray([], 3)).toEqual([]);
  });

  test('rejects a non-positive size', () => {
    expect(() => chunkArray([1], 0)).toThrow(RangeError);
    expect(() => chunkArray([1], 1.5)).toThrow(RangeError);
  });
});

describe('mapInBatches', () => {
  test('preserves order and passes global indices', async () => {
    const result = await mapInBatches(['a', 'b', 'c'], 2, async (item, index) => `${item}${index}`);
    expect(result).toEqual(['a0', 'b1', 'c2']);
  });

  test('never runs more than size calls at once', async () => {
    let active = 0;
    let peak = 0;
    await mapInBatches([1, 2, 3, 4, 5], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active--;
      return item;
    });
    expect(peak).toBe(2);
  });
});
