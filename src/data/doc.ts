/**
 * Document
 *
 * The unit of work flowing through a pipeline. Tasks read `text` (or its
 * `chunks`) and write one entry per task id under `results`.
 *
 * When `chunks` is non-empty each chunk is a contiguous slice of `text`, in
 * order. When empty, tasks treat the whole text as the only chunk.
 */

import { isDeepStrictEqual } from 'node:util';

export interface DocInit {
  text?: string | null;
  chunks?: string[];
  id?: string | null;
  uri?: string | null;
  meta?: Record<string, unknown>;
  results?: Record<string, unknown>;
}

export class Doc {
  text: string | null;
  chunks: string[];
  id: string | null;
  uri: string | null;
  meta: Record<string, unknown>;
  results: Record<string, unknown>;

  constructor(init: DocInit = {}) {
    this.text = init.text ?? null;
    this.chunks = init.chunks ?? [];
    this.id = init.id ?? null;
    this.uri = init.uri ?? null;
    this.meta = init.meta ?? {};
    this.results = init.results ?? {};
  }

  /**
   * Chunks a task should process: the stored chunks, or the full text as one chunk.
   */
  effectiveChunks(): (string | null)[] {
    return this.chunks.length > 0 ? [...this.chunks] : [this.text];
  }

  /**
   * Replace the text. Existing chunks no longer slice the new text, so they are dropped.
   */
  replaceText(text: string): void {
    this.text = text;
    this.chunks = [];
  }

  /**
   * Independent deep copy. Mutating the copy never affects this document.
   */
  clone(): Doc {
    return new Doc({
      text: this.text,
      chunks: [...this.chunks],
      id: this.id,
      uri: this.uri,
      meta: structuredClone(this.meta),
      results: structuredClone(this.results)
    });
  }

  equals(other: Doc): boolean {
    return (
      this.text === other.text &&
      this.id === other.id &&
      this.uri === other.uri &&
      isDeepStrictEqual(this.chunks, other.chunks) &&
      isDeepStrictEqual(this.meta, other.meta) &&
      isDeepStrictEqual(this.results, other.results)
    );
  }
}
