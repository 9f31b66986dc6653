/**
 * Embedding service types
 */

/** Supported embedding backends */
export type EmbeddingBackend = 'hashing' | 'openai';

/** Configuration for the embedding service */
export interface EmbeddingServiceConfig {
  /** Backend to use: 'hashing' (offline, deterministic) or 'openai' */
  backend: EmbeddingBackend;
  /** Model name override (default depends on backend) */
  modelName?: string;
  /** OpenAI API key (required for 'openai' backend) */
  openaiApiKey?: string;
  /** Vector width for the hashing backend (default 256) */
  dimensions?: number;
}
