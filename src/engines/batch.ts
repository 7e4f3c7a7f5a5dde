/**
 * Batch helpers shared by engines.
 */

/**
 * Split items into consecutive slices of at most `size` items.
 */
export function chunkArray<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Map items through an async function, `size` at a time, preserving order.
 * The next batch starts only after the current one has settled.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  size: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let offset = 0;
  for (const batch of chunkArray(items, size)) {
    const base = offset;
    results.push(...(await Promise.all(batch.map((item, i) => fn(item, base + i)))));
    offset += batch.length;
  }
  return results;
}
