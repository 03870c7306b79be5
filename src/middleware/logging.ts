/**
 * Request logging middleware.
 * One RequestLogEvent per request: method, path, status, duration, the
 * authenticated user and any route params (slug, username, comment id).
 *
 * Level follows the status class: 5xx error, 4xx warn, anything else info.
 * A handler that throws is logged as a 500 and the error is re-thrown.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

function levelFor(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    const path = new URL(req.url).pathname;
    const startedAt = performance.now();

    const emit = (status: number, error?: unknown): void => {
      const durationMs = Math.round(performance.now() - startedAt);
      const fields = contextFields(ctx, error);

      const event: RequestLogEvent = {
        level: levelFor(status),
        message: `${req.method} ${path} ${status} ${durationMs}ms`,
        method: req.method,
        path,
        status,
        durationMs,
        ...(fields && { fields }),
        ...(ctx.user && { userId: ctx.user.id }),
      };
      logProvider.log(event);
    };

    let response: Response;
    try {
      response = await next(req, ctx);
    } catch (err) {
      emit(500, err);
      throw err;
    }

    emit(response.status);
    return response;
  };
}

function contextFields(ctx: HandlerContext, error: unknown): Record<string, unknown> | undefined {
  const fields: Record<string, unknown> = {};
  if (Object.keys(ctx.params).length > 0) fields.params = ctx.params;
  if (error !== undefined) fields.error = error instanceof Error ? error.message : String(error);

  return Object.keys(fields).length > 0 ? fields : undefined;
}
