/**
 * Vercel AI SDK v6 Embedding Client
 *
 * Wraps embedMany and L2-normalizes every vector, so cosine similarity
 * between two embeddings is a plain dot product.
 */

import type { EmbeddingModel } from 'ai';
import { embedMany } from 'ai';
import type { EmbeddingClient } from './types';
import { normalizeL2 } from './utils';

export class VercelEmbeddingClient implements EmbeddingClient {
  readonly modelId: string;

  constructor(private model: EmbeddingModel) {
    this.modelId = typeof model === 'string' ? model : model.modelId;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (texts.some((text) => !text.trim())) {
      throw new Error('Cannot embed empty or whitespace-only text');
    }

    const { embeddings } = await embedMany({ model: this.model, values: texts });
    return embeddings.map(normalizeL2);
  }
}
