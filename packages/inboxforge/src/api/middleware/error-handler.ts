import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { InvalidJobState, JobNotFound } from '../../errors.js';
import { getLogger } from '../../monitoring/logger.js';

/**
 * Global error handler for the Hono app. Maps domain errors to their HTTP
 * status and returns a consistent JSON error response.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof JobNotFound) {
    return c.json({ error: err.code, message: err.message }, 404);
  }

  if (err instanceof InvalidJobState) {
    return c.json(
      {
        error: err.code,
        message: err.message,
        current_status: err.currentStatus,
      },
      400,
    );
  }

  if (err instanceof HTTPException) {
    return c.json({ error: 'http_error', message: err.message }, err.status);
  }

  getLogger().error('API error', { message: err.message, stack: err.stack });
  return c.json(
    {
      error: 'internal_error',
      message: 'An unexpected error occurred',
    },
    500,
  );
};
