/**
 * Embedding Service — interface and factory
 *
 * Supports an offline feature-hashing backend and the OpenAI embeddings API.
 */

import type { EmbeddingServiceConfig } from './types.js';
import { createHashingEmbeddingService } from './hashing.js';
import { createOpenAIEmbeddingService } from './openai.js';

export type { EmbeddingBackend, EmbeddingServiceConfig } from './types.js';
export { cosineSimilarity, tokenJaccard } from './math.js';

/**
 * Embedding service interface — embed text into vector space.
 */
export interface EmbeddingService {
  /** Embed a single text string */
  embed(text: string): Promise<Float32Array>;

  /** Embed a batch of texts */
  embedBatch(texts: string[]): Promise<Float32Array[]>;

  /** Dimensionality of the output vectors */
  readonly dimensions: number;

  /** Name of the model used */
  readonly modelName: string;
}

/**
 * Create an embedding service from config.
 */
export function createEmbeddingService(config: EmbeddingServiceConfig): EmbeddingService {
  switch (config.backend) {
    case 'hashing':
      return createHashingEmbeddingService(config.dimensions);
    case 'openai':
      return createOpenAIEmbeddingService(config.openaiApiKey, config.modelName);
    default:
      throw new Error(`Unknown embedding backend: ${String(config.backend)}. Use 'hashing' or 'openai'.`);
  }
}
