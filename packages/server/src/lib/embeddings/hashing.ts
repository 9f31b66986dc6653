/**
 * Feature-hashing embedding service.
 *
 * Each token is hashed (FNV-1a, 32-bit) into one of `dimensions` buckets; the
 * bucket counts are L2-normalized. Offline and deterministic, so the retrieval
 * store works without an embeddings API and in tests.
 */

import type { EmbeddingService } from './index.js';
import { l2Normalize, tokenize } from './math.js';

const DEFAULT_DIMENSIONS = 256;
const MODEL_NAME = 'fnv1a-hashing';

export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function createHashingEmbeddingService(dimensions = DEFAULT_DIMENSIONS): EmbeddingService {
  if (!Number.isInteger(dimensions) || dimensions < 1) {
    throw new Error(`Hashing embedding dimensions must be a positive integer, got ${dimensions}`);
  }

  function embedSync(text: string): Float32Array {
    const vector = new Float32Array(dimensions);
    for (const token of tokenize(text)) {
      const bucket = fnv1a(token) % dimensions;
      vector[bucket] = vector[bucket]! + 1;
    }
    return l2Normalize(vector);
  }

  return {
    dimensions,
    modelName: `${MODEL_NAME}-${dimensions}`,

    async embed(text: string): Promise<Float32Array> {
      return embedSync(text);
    },

    async embedBatch(texts: string[]): Promise<Float32Array[]> {
      return texts.map(embedSync);
    },
  };
}
