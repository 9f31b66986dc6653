/**
 * Tests for embedding service factory and backends
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createEmbeddingService, cosineSimilarity } from '../index.js';
import { fnv1a } from '../hashing.js';
import { TransientReasoningError } from '@runwatch/core';

describe('createEmbeddingService', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
    vi.unstubAllGlobals();
  });

  describe('factory routing', () => {
    it('creates the hashing backend with 256 dimensions by default', () => {
      const service = createEmbeddingService({ backend: 'hashing' });
      expect(service.dimensions).toBe(256);
      expect(service.modelName).toBe('fnv1a-hashing-256');
    });

    it('honours a custom hashing width', () => {
      const service = createEmbeddingService({ backend: 'hashing', dimensions: 64 });
      expect(service.dimensions).toBe(64);
    });

    it('creates OpenAI service when backend=openai', () => {
      const service = createEmbeddingService({ backend: 'openai', openaiApiKey: 'test-key' });
      expect(service.modelName).toBe('text-embedding-3-small');
      expect(service.dimensions).toBe(1536);
    });

    it('throws for unknown backend', () => {
      expect(() => createEmbeddingService({ backend: 'unknown' as 'hashing' })).toThrow(
        'Unknown embedding backend',
      );
    });
  });

  describe('hashing service', () => {
    it('fnv1a matches the reference value for "a"', () => {
      expect(fnv1a('a')).toBe(0xe40c292c);
    });

    it('is deterministic', async () => {
      const service = createEmbeddingService({ backend: 'hashing' });
      const a = await service.embed('ERROR: NCCL timeout on rank 3');
      const b = await service.embed('ERROR: NCCL timeout on rank 3');
      expect(Array.from(a)).toEqual(Array.from(b));
    });

    it('returns unit vectors', async () => {
      const service = createEmbeddingService({ backend: 'hashing' });
      const v = await service.embed('CUDA out of memory on device 0');
      let norm = 0;
      for (const x of v) norm += x * x;
      expect(Math.sqrt(norm)).toBeCloseTo(1, 5);
    });

    it('scores near-duplicate failures above unrelated text', async () => {
      const service = createEmbeddingService({ backend: 'hashing' });
      const [query, similar, unrelated] = await service.embedBatch([
        'ERROR: NCCL timeout on rank 3',
        'ERROR: NCCL timeout on rank 7',
        'INFO: checkpoint saved to /ckpt/step-100',
      ]);
      expect(cosineSimilarity(query!, similar!)).toBeCloseTo(1, 5);
      expect(cosineSimilarity(query!, unrelated!)).toBeLessThan(0.5);
    });

    it('rejects a non-positive width', () => {
      expect(() => createEmbeddingService({ backend: 'hashing', dimensions: 0 })).toThrow(
        'positive integer',
      );
    });
  });

  describe('OpenAI service', () => {
    it('throws when no API key is provided', () => {
      delete process.env['OPENAI_API_KEY'];
      expect(() => createEmbeddingService({ backend: 'openai' })).toThrow('requires an API key');
    });

    it('uses the model width for text-embedding-3-large', () => {
      const service = createEmbeddingService({
        backend: 'openai',
        openaiApiKey: 'test-key',
        modelName: 'text-embedding-3-large',
      });
      expect(service.dimensions).toBe(3072);
    });

    it('returns vectors in input order', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValue({
          ok: true,
          json: async () => ({
            model: 'text-embedding-3-small',
            data: [
              { index: 1, embedding: [0, 1] },
              { index: 0, embedding: [1, 0] },
            ],
          }),
        }),
      );
      const service = createEmbeddingService({ backend: 'openai', openaiApiKey: 'test-key' });
      const [first, second] = await service.embedBatch(['a', 'b']);
      expect(Array.from(first!)).toEqual([1, 0]);
      expect(Array.from(second!)).toEqual([0, 1]);
    });

    it('wraps an error status as TransientReasoningError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValue({ ok: false, status: 503, text: async () => 'overloaded' }),
      );
      const service = createEmbeddingService({ backend: 'openai', openaiApiKey: 'test-key' });
      await expect(service.embed('x')).rejects.toBeInstanceOf(TransientReasoningError);
    });

    it('wraps a network failure as TransientReasoningError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
      const service = createEmbeddingService({ backend: 'openai', openaiApiKey: 'test-key' });
      await expect(service.embed('x')).rejects.toThrow('OpenAI embeddings request failed: fetch failed');
    });
  });
});
