/**
 * Authentication middleware.
 * Extracts the credential from the Authorization header (`Bearer <jwt>` or
 * the RealWorld `Token <jwt>` form), resolves it via UserService, and
 * attaches the user to context.
 *
 * createAuthMiddleware rejects anonymous callers with 401;
 * createOptionalAuthMiddleware lets them through with `user: null`.
 */

import type { UserService } from '../services/UserService.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const SCHEMES = ['bearer', 'token'];

/** The raw credential after the scheme, or null if the header is absent or malformed. */
export function extractToken(authHeader: string | null): string | null {
  if (!authHeader) return null;

  const [scheme, ...rest] = authHeader.trim().split(/\s+/);
  if (!scheme || !SCHEMES.includes(scheme.toLowerCase())) return null;

  const token = rest.join(' ');
  return token.length > 0 ? token : null;
}

export function createAuthMiddleware(userService: UserService): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const token = extractToken(req.headers.get('Authorization'));
      if (!token) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <token>');
      }

      const user = await userService.authenticate(token);
      if (!user) {
        return unauthorized('Invalid or expired token');
      }

      ctx.user = user;
      return next(req, ctx);
    };
  };
}

export function createOptionalAuthMiddleware(userService: UserService): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const token = extractToken(req.headers.get('Authorization'));
      ctx.user = token ? await userService.authenticate(token) : null;
      return next(req, ctx);
    };
  };
}

function unauthorized(message: string): Response {
  const body: ApiErrorResponse = {
    error: { code: 'UNAUTHORIZED', message },
  };
  return new Response(JSON.stringify(body), { status: 401, headers: JSON_HEADERS });
}
