/**
 * Profile endpoints.
 * GET    /api/profiles/:username           Get a profile
 * POST   /api/profiles/:username/follow    Follow (auth required)
 * DELETE /api/profiles/:username/follow    Unfollow (auth required)
 */

import { pipeline } from '../middleware/pipeline.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { currentUser } from './users.js';
import { json } from './respond.js';

export function createProfileHandlers(container: Container) {
  const getProfile: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.optionalAuth
  )(async (_req, ctx) => {
    return json(await container.profileService.getProfile(ctx.params.username, ctx.user));
  });

  const follow: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    return json(await container.profileService.follow(ctx.params.username, currentUser(ctx)));
  });

  const unfollow: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    return json(await container.profileService.unfollow(ctx.params.username, currentUser(ctx)));
  });

  return { getProfile, follow, unfollow };
}
