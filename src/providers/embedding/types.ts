import type { EmbeddingProvider } from '@/config/schema';

export type { EmbeddingProvider };

export interface EmbeddingClient {
  /**
   * Embed several non-empty texts in one request.
   * @returns L2-normalized vectors, in input order
   */
  embedBatch(texts: string[]): Promise<number[][]>;

  readonly modelId: string;
}
