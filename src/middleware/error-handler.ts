/**
 * Error handler middleware.
 * Turns anything a handler throws into the `{ error: { code, message } }`
 * body. An AppError keeps its status, code and details. Anything else is
 * logged and answered with a generic 500 so its message stays server-side.
 */

import { AppError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

const INTERNAL_ERROR: ApiErrorResponse = {
  error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
};

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        return errorResponse(err.statusCode, {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        });
      }

      logProvider.error('Unhandled error', {
        method: req.method,
        path: new URL(req.url).pathname,
        error: err instanceof Error ? err.message : String(err),
      });
      return errorResponse(500, INTERNAL_ERROR);
    }
  };
}

function errorResponse(status: number, body: ApiErrorResponse): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}
