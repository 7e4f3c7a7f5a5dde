/**
 * Predictive Task Utilities
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Scores
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Clamp a score to [0, 1]. Non-finite scores count as 0.
 */
export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

/**
 * Arithmetic mean of the non-null values, or null when there are none.
 */
export function mean(values: readonly (number | null | undefined)[]): number | null {
  const present = values.filter((v): v is number => typeof v === 'number');
  if (present.length === 0) return null;
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entity Identity
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * JSON serialization with object keys sorted at every level.
 */
export function canonicalJSON(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v === null || typeof v !== 'object' || Array.isArray(v)) return v;
    return Object.fromEntries(Object.entries(v).sort(byKey));
  });
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Identity key of an entity: every field except `score`, key-order independent.
 */
export function entityKey(entity: object): string {
  const identity = Object.entries(entity).filter(([key]) => key !== 'score');
  return canonicalJSON(Object.fromEntries(identity));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Text Offsets
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Character span of the first occurrence of `needle` in `text`, or nulls.
 */
export function findSpan(
  text: string | null,
  needle: string
): { start: number | null; end: number | null } {
  const start = text && needle ? text.indexOf(needle) : -1;
  return start < 0 ? { start: null, end: null } : { start, end: start + needle.length };
}
