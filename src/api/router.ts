/**
 * API router.
 * Maps HTTP method + path pattern to handlers. Named groups in a pattern
 * become `ctx.params`. Framework-agnostic; works with any Request/Response
 * based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import { createUserHandlers } from './users.js';
import { createProfileHandlers } from './profiles.js';
import { createArticleHandlers } from './articles.js';
import { createCommentHandlers } from './comments.js';
import { createTagHandlers } from './tags.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const users = createUserHandlers(container);
  const profiles = createProfileHandlers(container);
  const articles = createArticleHandlers(container);
  const comments = createCommentHandlers(container);
  const tags = createTagHandlers(container);

  const routes: Route[] = [
    // Users
    { method: 'POST', pattern: /^\/api\/users\/?$/, handler: users.register },
    { method: 'POST', pattern: /^\/api\/users\/login\/?$/, handler: users.login },
    { method: 'GET', pattern: /^\/api\/user\/?$/, handler: users.getCurrent },
    { method: 'PUT', pattern: /^\/api\/user\/?$/, handler: users.update },

    // Profiles
    { method: 'GET', pattern: /^\/api\/profiles\/(?<username>[^/]+)\/?$/, handler: profiles.getProfile },
    { method: 'POST', pattern: /^\/api\/profiles\/(?<username>[^/]+)\/follow\/?$/, handler: profiles.follow },
    { method: 'DELETE', pattern: /^\/api\/profiles\/(?<username>[^/]+)\/follow\/?$/, handler: profiles.unfollow },

    // Articles (feed must precede :slug)
    { method: 'GET', pattern: /^\/api\/articles\/?$/, handler: articles.list },
    { method: 'POST', pattern: /^\/api\/articles\/?$/, handler: articles.create },
    { method: 'GET', pattern: /^\/api\/articles\/feed\/?$/, handler: articles.feed },
    { method: 'GET', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/?$/, handler: articles.getBySlug },
    { method: 'PUT', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/?$/, handler: articles.update },
    { method: 'DELETE', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/?$/, handler: articles.delete },
    { method: 'POST', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/favorite\/?$/, handler: articles.favorite },
    { method: 'DELETE', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/favorite\/?$/, handler: articles.unfavorite },

    // Comments
    { method: 'GET', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/comments\/?$/, handler: comments.list },
    { method: 'POST', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/comments\/?$/, handler: comments.add },
    { method: 'DELETE', pattern: /^\/api\/articles\/(?<slug>[^/]+)\/comments\/(?<id>[^/]+)\/?$/, handler: comments.delete },

    // Tags
    { method: 'GET', pattern: /^\/api\/tags\/?$/, handler: tags.list },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method !== method) continue;

      const match = route.pattern.exec(url.pathname);
      if (!match) continue;

      const params = decodeParams(match.groups ?? {});
      if (!params) {
        return errorResponse(400, 'INVALID_REQUEST', 'Malformed path parameter');
      }

      const response = await route.handler(req, { ...ctx, params });
      return addCorsHeaders(response);
    }

    // Check if path matches but method doesn't
    const allowed = routes
      .filter((r) => r.pattern.test(url.pathname))
      .map((r) => r.method);

    if (allowed.length > 0) {
      return errorResponse(405, 'INVALID_REQUEST', `Method ${method} not allowed`, {
        Allow: allowed.join(', '),
      });
    }

    return errorResponse(404, 'NOT_FOUND', `No route matches ${method} ${url.pathname}`);
  };

  return { handle, routes };
}

function decodeParams(groups: Record<string, string>): Record<string, string> | null {
  const params: Record<string, string> = {};
  try {
    for (const [key, value] of Object.entries(groups)) {
      params[key] = decodeURIComponent(value);
    }
  } catch {
    return null;
  }
  return params;
}

function errorResponse(
  status: number,
  code: ApiErrorResponse['error']['code'],
  message: string,
  extraHeaders: Record<string, string> = {}
): Response {
  const body: ApiErrorResponse = { error: { code, message } };
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      'Content-Type': 'application/json',
      ...extraHeaders,
      ...corsHeaders(),
    },
  });
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
