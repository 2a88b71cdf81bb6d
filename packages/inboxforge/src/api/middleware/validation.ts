import { createMiddleware } from 'hono/factory';
import type { ZodError, ZodType } from 'zod';

export type ValidatedBody<T> = { Variables: { validatedBody: T } };

/**
 * Creates middleware that validates the request body against a Zod schema.
 * Parsed data is stored in c.set('validatedBody', data).
 */
export function validateBody<T>(schema: ZodType<T>) {
  return createMiddleware<ValidatedBody<T>>(async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        { error: 'bad_request', message: 'Invalid JSON body' },
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        {
          error: 'validation_error',
          details: formatZodError(result.error),
        },
        422,
      );
    }

    c.set('validatedBody', result.data);
    await next();
  });
}

function formatZodError(error: ZodError) {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}
