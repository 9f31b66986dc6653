/**
 * Global body limit for API routes. A diagnose request carries one log line,
 * so 256KB leaves room for long stack-trace lines and nothing much more.
 */

import { bodyLimit } from 'hono/body-limit';

export const API_BODY_LIMIT_BYTES = 256 * 1024;

export const apiBodyLimit = bodyLimit({
  maxSize: API_BODY_LIMIT_BYTES,
  onError: (c) => {
    return c.json({ error: 'Request body too large', status: 413, maxSize: '256KB' }, 413);
  },
});
