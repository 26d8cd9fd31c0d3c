/**
 * Error Handler Middleware
 *
 * Global error handling for the API.
 * ServiceError codes map to their own status, zod failures to 400, anything
 * else to 500. Every response uses the `{ error: { code, message } }` envelope.
 */

import type { Context, ErrorHandler, MiddlewareHandler, Next } from 'hono';
import { ZodError } from 'zod';
import { isServiceError, SERVICE_ERROR_PUBLIC_MESSAGE } from '@/errors/serviceError';
import { describeError, logger } from '@/utils/logger';

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Verbose messages only in development and test
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

export const handleError: ErrorHandler = (error, c) => {
  const request = { path: c.req.path, method: c.req.method };

  if (error instanceof ZodError) {
    logger.warn('Request validation failed', { ...request, issues: error.issues.length });
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.issues,
        },
      },
      400
    );
  }

  if (isServiceError(error)) {
    const log = error.status >= 500 ? logger.error : logger.warn;
    log('Request failed', { ...request, code: error.code, status: error.status, ...describeError(error) });

    return c.json<ErrorResponse>(
      {
        error: {
          code: error.code,
          message: isVerboseErrors() ? error.message : SERVICE_ERROR_PUBLIC_MESSAGE[error.code],
        },
      },
      error.status
    );
  }

  logger.error('Unhandled error', {
    ...request,
    ...describeError(error),
    stack: error.stack,
  });

  return c.json<ErrorResponse>(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: isVerboseErrors() ? error.message : 'An internal error occurred',
      },
    },
    500
  );
};

/**
 * Catches errors that escape a middleware before Hono's own handler sees them
 */
export const errorHandler: MiddlewareHandler = async (c: Context, next: Next) => {
  try {
    return await next();
  } catch (error) {
    return handleError(error instanceof Error ? error : new Error(String(error)), c);
  }
};
