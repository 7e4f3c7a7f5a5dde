/**
 * Test Fixtures
 *
 * Shared test data. Keep these minimal and focused on what each test
 * category needs.
 */

import { Doc } from '@/data/doc';

// ═══════════════════════════════════════════════════════════════════════════════
// Vector Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Unit vector pointing in positive x direction */
export const UNIT_VECTOR_X = [1, 0, 0];

/** Unit vector pointing in positive y direction */
export const UNIT_VECTOR_Y = [0, 1, 0];

/** Zero vector */
export const ZERO_VECTOR = [0, 0, 0];

/** Non-normalized vector for L2 normalization tests */
export const UNNORMALIZED_VECTOR = [3, 4, 0]; // magnitude = 5

/** Already normalized vector (magnitude = 1) */
export const NORMALIZED_VECTOR = [0.6, 0.8, 0]; // 3/5, 4/5, 0

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const VALID_MINIMAL_CONFIG = {
  llm: {
    provider: 'openai' as const,
    model: 'gpt-4o-mini',
    apiKey: 'test-secret'
  }
};

export const VALID_FULL_CONFIG = {
  llm: {
    provider: 'openai-compatible' as const,
    providerName: 'local-gateway',
    model: 'local-model',
    baseUrl: 'http://localhost:8080/v1',
    temperature: 0.2,
    maxTokens: 512,
    maxRetries: 2
  },
  embedding: {
    provider: 'ollama' as const,
    model: 'nomic-embed-text',
    dimensions: 768,
    baseUrl: 'http://localhost:11434'
  },
  engine: { strictMode: true, batchSize: 4 },
  pipeline: { inPlace: true, verbose: false, validateChain: false }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Document Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** A document split into two chunks that slice its text */
export function createChunkedDoc(): Doc {
  return new Doc({
    id: 'chunked',
    text: 'The invoice was wrong. Support fixed it quickly.',
    chunks: ['The invoice was wrong.', ' Support fixed it quickly.']
  });
}

export function createDocs(...texts: string[]): Doc[] {
  return texts.map((text, i) => new Doc({ id: `doc-${i}`, text }));
}
