/**
 * Error sanitization utilities — prevents leaking internal details to clients.
 */

import { ConfigurationError, TransientReasoningError } from '@runwatch/core';

const GENERIC_5XX = 'Internal server error';

/**
 * Intentional client-facing error with an explicit HTTP status code.
 * Only messages from ClientError are forwarded to the client for 4xx responses.
 */
export class ClientError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ClientError';
    this.statusCode = statusCode;
  }
}

/**
 * Patterns that must never reach the client (SQLite internals, file paths, stack traces).
 */
const SENSITIVE_PATTERNS = [
  /SQLITE_/i,
  /\/home\//,
  /\/usr\//,
  /\/tmp\//,
  /\\Users\\/,
  /at\s+\S+\s+\(.*:\d+:\d+\)/,
  /node_modules/,
  /\.ts:\d+/,
  /\.js:\d+/,
];

/**
 * Returns a safe, client-facing error message.
 * - ClientError (4xx): returns the explicit message.
 * - Everything else: returns generic "Internal server error".
 */
export function sanitizeErrorMessage(err: unknown): string {
  if (err instanceof ClientError && err.statusCode >= 400 && err.statusCode < 500) {
    const msg = err.message;
    if (SENSITIVE_PATTERNS.some((p) => p.test(msg))) {
      return 'Bad request';
    }
    return msg;
  }
  if (err instanceof ConfigurationError) {
    return 'Server is not configured for this request';
  }
  if (err instanceof TransientReasoningError) {
    return 'Upstream model unavailable';
  }
  return GENERIC_5XX;
}

/**
 * Extract HTTP status code from an error, defaulting to 500.
 */
export function getErrorStatus(err: unknown): number {
  if (err instanceof ClientError) return err.statusCode;
  if (err instanceof ConfigurationError) return 503;
  if (err instanceof TransientReasoningError) return 503;
  if (err && typeof err === 'object' && 'status' in err) {
    const s = err.status;
    if (typeof s === 'number' && s >= 400 && s < 600) return s;
  }
  return 500;
}
