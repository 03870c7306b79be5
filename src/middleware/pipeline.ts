/**
 * Composable middleware pipeline for Request/Response handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

import type { User } from '../domain/User.js';

export interface HandlerContext {
  /** Authenticated caller, or null for anonymous requests. */
  user: User | null;
  /** Named path parameters captured by the router. */
  params: Record<string, string>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(auth, validate)(handler)
 *   → auth wraps (validate wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}

export function createContext(): HandlerContext {
  return { user: null, params: {} };
}
