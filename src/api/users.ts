/**
 * User endpoints.
 * POST /api/users          Register
 * POST /api/users/login    Log in
 * GET  /api/user           Current user (auth required)
 * PUT  /api/user           Update current user (auth required)
 */

import { pipeline } from '../middleware/pipeline.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { LoginRequest, RegisterRequest, UpdateUserRequest } from '../types/api.js';
import type { User } from '../domain/User.js';
import { UnauthorizedError } from '../errors.js';
import { json } from './respond.js';

const registerSchema: BodySchema = {
  email: { type: 'string', required: true, nonEmpty: true, maxLength: 254 },
  username: { type: 'string', required: true, nonEmpty: true, maxLength: 64 },
  password: { type: 'string', required: true, nonEmpty: true, maxLength: 256 },
};

const loginSchema: BodySchema = {
  email: { type: 'string', required: true, nonEmpty: true },
  password: { type: 'string', required: true, nonEmpty: true },
};

const updateSchema: BodySchema = {
  email: { type: 'string', required: false, nonEmpty: true, maxLength: 254 },
  username: { type: 'string', required: false, nonEmpty: true, maxLength: 64 },
  password: { type: 'string', required: false, nonEmpty: true, maxLength: 256 },
  bio: { type: 'string', required: false, maxLength: 2000 },
  image: { type: 'string', required: false, maxLength: 2000 },
};

/** The authenticated user. Only valid behind container.authenticate. */
export function currentUser(ctx: HandlerContext): User {
  if (!ctx.user) throw new UnauthorizedError();
  return ctx.user;
}

export function createUserHandlers(container: Container) {
  const register: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody('user', registerSchema)
  )(async (req) => {
    const body = await req.json() as RegisterRequest;
    return json(await container.userService.register(body), 201);
  });

  const login: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody('user', loginSchema)
  )(async (req) => {
    const body = await req.json() as LoginRequest;
    return json(await container.userService.login(body));
  });

  const getCurrent: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    return json(await container.userService.getCurrent(currentUser(ctx)));
  });

  const update: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    validateBody('user', updateSchema)
  )(async (req, ctx) => {
    const body = await req.json() as UpdateUserRequest;
    return json(await container.userService.update(currentUser(ctx), body));
  });

  return { register, login, getCurrent, update };
}
