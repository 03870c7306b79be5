/**
 * Comment endpoints.
 * GET    /api/articles/:slug/comments        List comments
 * POST   /api/articles/:slug/comments        Add a comment (auth required)
 * DELETE /api/articles/:slug/comments/:id    Delete (auth required; comment or article author)
 */

import { pipeline } from '../middleware/pipeline.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { currentUser } from './users.js';
import { json, noContent } from './respond.js';

const addSchema: BodySchema = {
  body: { type: 'string', required: true, nonEmpty: true, maxLength: 10_000 },
};

export function createCommentHandlers(container: Container) {
  const list: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.optionalAuth
  )(async (_req, ctx) => {
    return json(await container.commentService.list(ctx.params.slug, ctx.user));
  });

  const add: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    validateBody('comment', addSchema)
  )(async (req, ctx) => {
    const body = await req.json() as { body: string };
    return json(
      await container.commentService.add(ctx.params.slug, body.body, currentUser(ctx)),
      201
    );
  });

  const del: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    await container.commentService.delete(ctx.params.slug, ctx.params.id, currentUser(ctx));
    return noContent();
  });

  return { list, add, delete: del };
}
