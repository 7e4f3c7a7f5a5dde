/**
 * Logger
 *
 * Semantic logging for pipeline runs:
 * - RUN: a pipeline run over a document set
 * - TASK: one task applied to the documents
 * - WARN: a chunk that failed inference and was recorded as null
 *
 * Progress lines are only printed when the pipeline runs verbosely.
 * Chunk failures are always reported, on stderr.
 */

import type { TaskRunStats } from '@/core/tasks/task';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/** Indent for continuation lines (matches timestamp width) */
const INDENT = '           ';

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline Logging (RUN / TASK)
// ═══════════════════════════════════════════════════════════════════════════════

export function logPipelineStart(taskIds: readonly string[], docCount: number): void {
  const time = c.dim(formatTime());
  console.log(
    `${time} ${c.cyan('RUN')} ${plural(taskIds.length, 'task')} over ${plural(docCount, 'document')}`
  );
}

export function logTaskStart(taskId: string, position: number, total: number): void {
  console.log(`${INDENT}${c.magenta('TASK')} ${c.white(taskId)} ${c.dim(`(${position}/${total})`)}`);
}

export function logTaskResult(taskId: string, stats: TaskRunStats, durationMs: number): void {
  const parts = [
    plural(stats.documents, 'document'),
    plural(stats.chunks, 'chunk'),
    formatDuration(durationMs)
  ];
  if (stats.skipped > 0) {
    parts.splice(1, 0, c.yellow(`${stats.skipped} skipped`));
  }

  const status =
    stats.failedChunks > 0
      ? c.yellow(`⚠ ${stats.failedChunks} failed`)
      : c.brightGreen('✓');

  console.log(`${INDENT}  ${status} ${c.dim(taskId)} ${c.dim(`(${parts.join(', ')})`)}`);
}

export function logPipelineEnd(docCount: number, durationMs: number): void {
  console.log(
    `${INDENT}${c.dim('→ Done:')} ${plural(docCount, 'document')} ${c.dim(`in ${formatDuration(durationMs)}`)}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Chunk Failures (WARN)
// ═══════════════════════════════════════════════════════════════════════════════

export function logChunkFailure(backend: string, recordIndex: number, error: Error): void {
  const time = c.dim(formatTime());
  console.warn(
    `${time} ${c.warning('WARN')} ${backend} chunk ${recordIndex} failed: ${c.dim(truncate(error.message, 120))}`
  );
}
