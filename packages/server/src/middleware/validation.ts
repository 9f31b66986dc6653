/**
 * Zod validation middleware
 *
 * Validates JSON request bodies against a zod schema and returns 400 with
 * structured error details on failure.
 */

import type { MiddlewareHandler } from 'hono';
import type { ZodError, ZodType } from 'zod';

export interface ValidatedVariables<T> {
  validatedBody: T;
}

/**
 * Format zod validation errors into a consistent API response shape.
 */
export function formatZodErrors(error: ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Middleware factory: validates `await c.req.json()` against the given schema.
 * On success the parsed data is available as `c.get('validatedBody')`.
 * On failure, returns 400 with `{ error, status, details }`.
 */
export function validateBody<T>(
  schema: ZodType<T>,
): MiddlewareHandler<{ Variables: ValidatedVariables<T> }> {
  return async (c, next) => {
    const rawBody: unknown = await c.req.json().catch(() => null);
    if (rawBody === null) {
      return c.json({ error: 'Invalid JSON body', status: 400 }, 400);
    }

    const result = schema.safeParse(rawBody);
    if (!result.success) {
      return c.json(
        {
          error: 'Validation failed',
          status: 400,
          details: formatZodErrors(result.error),
        },
        400,
      );
    }

    c.set('validatedBody', result.data);
    await next();
  };
}
