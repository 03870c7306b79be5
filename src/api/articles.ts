/**
 * Article endpoints.
 * GET    /api/articles                  List (filters: tag, author, favorited; limit/offset)
 * GET    /api/articles/feed             Articles by followed authors (auth required)
 * POST   /api/articles                  Create (auth required)
 * GET    /api/articles/:slug            Get one
 * PUT    /api/articles/:slug            Update (auth required, author only)
 * DELETE /api/articles/:slug            Delete (auth required, author only)
 * POST   /api/articles/:slug/favorite   Favorite (auth required)
 * DELETE /api/articles/:slug/favorite   Unfavorite (auth required)
 */

import { pipeline } from '../middleware/pipeline.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type {
  CreateArticleRequest,
  ListArticlesQuery,
  UpdateArticleRequest,
} from '../types/api.js';
import { currentUser } from './users.js';
import { json, noContent } from './respond.js';

const createSchema: BodySchema = {
  title: { type: 'string', required: true, nonEmpty: true, maxLength: 300 },
  description: { type: 'string', required: true, nonEmpty: true, maxLength: 1000 },
  body: { type: 'string', required: true, nonEmpty: true, maxLength: 100_000 },
  tagList: { type: 'array', required: false, items: 'string', maxItems: 20 },
};

const updateSchema: BodySchema = {
  title: { type: 'string', required: false, nonEmpty: true, maxLength: 300 },
  description: { type: 'string', required: false, nonEmpty: true, maxLength: 1000 },
  body: { type: 'string', required: false, nonEmpty: true, maxLength: 100_000 },
};

/** Parse a non-negative integer query parameter; anything else is ignored. */
function intParam(url: URL, name: string): number | undefined {
  const raw = url.searchParams.get(name);
  if (raw === null || !/^\d+$/.test(raw)) return undefined;
  return Number(raw);
}

export function parseListQuery(url: URL): ListArticlesQuery {
  return {
    tag: url.searchParams.get('tag') ?? undefined,
    author: url.searchParams.get('author') ?? undefined,
    favorited: url.searchParams.get('favorited') ?? undefined,
    limit: intParam(url, 'limit'),
    offset: intParam(url, 'offset'),
  };
}

export function createArticleHandlers(container: Container) {
  const list: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.optionalAuth
  )(async (req, ctx) => {
    const query = parseListQuery(new URL(req.url));
    return json(await container.articleQueryService.list(query, ctx.user));
  });

  const feed: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const url = new URL(req.url);
    return json(
      await container.articleQueryService.feed(currentUser(ctx), {
        limit: intParam(url, 'limit'),
        offset: intParam(url, 'offset'),
      })
    );
  });

  const create: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    validateBody('article', createSchema)
  )(async (req, ctx) => {
    const body = await req.json() as CreateArticleRequest;
    return json(await container.articleService.create(body, currentUser(ctx)), 201);
  });

  const getBySlug: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.optionalAuth
  )(async (_req, ctx) => {
    return json(await container.articleQueryService.getBySlug(ctx.params.slug, ctx.user));
  });

  const update: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    validateBody('article', updateSchema)
  )(async (req, ctx) => {
    const body = await req.json() as UpdateArticleRequest;
    return json(
      await container.articleService.update(ctx.params.slug, body, currentUser(ctx))
    );
  });

  const del: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    await container.articleService.delete(ctx.params.slug, currentUser(ctx));
    return noContent();
  });

  const favorite: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    return json(await container.articleService.favorite(ctx.params.slug, currentUser(ctx)));
  });

  const unfavorite: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    return json(await container.articleService.unfavorite(ctx.params.slug, currentUser(ctx)));
  });

  return { list, feed, create, getBySlug, update, delete: del, favorite, unfavorite };
}
