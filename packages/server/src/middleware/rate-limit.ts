/**
 * Rate limiting for the diagnose endpoint, which may call out to a paid model.
 * Uses hono-rate-limiter with its in-memory store.
 *
 * @module middleware/rate-limit
 */

import { rateLimiter } from 'hono-rate-limiter';
import type { Context, MiddlewareHandler } from 'hono';
import { createLogger } from '../lib/logger.js';

const log = createLogger('RateLimit');

export const DEFAULT_DIAGNOSE_RATE_MAX = Number(process.env['RUNWATCH_DIAGNOSE_RATE_LIMIT'] ?? 30);
export const DEFAULT_DIAGNOSE_WINDOW_MS = Number(
  process.env['RUNWATCH_DIAGNOSE_RATE_WINDOW_MS'] ?? 60 * 1000,
);

export interface RateLimitOptions {
  limit?: number;
  windowMs?: number;
}

/**
 * Extract client IP using x-forwarded-for → cf-connecting-ip → 'unknown'.
 */
export function getClientIp(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
    c.req.header('cf-connecting-ip') ||
    'unknown'
  );
}

/**
 * A fresh limiter with its own store, keyed by client IP.
 */
export function diagnoseRateLimit(opts: RateLimitOptions = {}): MiddlewareHandler {
  return rateLimiter({
    windowMs: opts.windowMs ?? DEFAULT_DIAGNOSE_WINDOW_MS,
    limit: opts.limit ?? DEFAULT_DIAGNOSE_RATE_MAX,
    standardHeaders: 'draft-7',
    keyGenerator: (c) => `diag:${getClientIp(c)}`,
    handler: (c) => {
      const ip = getClientIp(c);
      const route = new URL(c.req.url).pathname;
      log.warn('Diagnose rate limit exceeded', { ip, route });
      return c.json({ error: 'Too Many Requests', status: 429 }, 429);
    },
  });
}
