/**
 * Dependency wiring.
 * Constructs all services with their dependencies, once per process.
 * Production passes Supabase repositories; tests pass in-memory mocks.
 */

import type { IUserRepository } from './repositories/IUserRepository.js';
import type { IArticleRepository } from './repositories/IArticleRepository.js';
import type { ICommentRepository } from './repositories/ICommentRepository.js';
import type { ILogProvider } from './providers/index.js';
import { TokenService, type TokenServiceOptions } from './services/TokenService.js';
import { UserService } from './services/UserService.js';
import { ProfileService } from './services/ProfileService.js';
import { ArticleService } from './services/ArticleService.js';
import { ArticleQueryService } from './services/ArticleQueryService.js';
import { CommentService } from './services/CommentService.js';
import {
  createAuthMiddleware,
  createErrorHandler,
  createLoggingMiddleware,
  createOptionalAuthMiddleware,
  type Middleware,
} from './middleware/index.js';

export interface Container {
  tokenService: TokenService;
  userService: UserService;
  profileService: ProfileService;
  articleService: ArticleService;
  articleQueryService: ArticleQueryService;
  commentService: CommentService;
  logProvider: ILogProvider;
  authenticate: Middleware;
  optionalAuth: Middleware;
  errorHandler: Middleware;
  logging: Middleware;
}

export function createContainer(deps: {
  userRepo: IUserRepository;
  articleRepo: IArticleRepository;
  commentRepo: ICommentRepository;
  logProvider: ILogProvider;
  jwt: TokenServiceOptions;
}): Container {
  const tokenService = new TokenService(deps.jwt);
  const userService = new UserService(deps.userRepo, tokenService);
  const articleQueryService = new ArticleQueryService(deps.articleRepo, deps.userRepo);
  const profileService = new ProfileService(deps.userRepo, articleQueryService);
  const articleService = new ArticleService(deps.articleRepo, articleQueryService);
  const commentService = new CommentService(
    deps.commentRepo,
    deps.articleRepo,
    articleQueryService
  );

  return {
    tokenService,
    userService,
    profileService,
    articleService,
    articleQueryService,
    commentService,
    logProvider: deps.logProvider,
    authenticate: createAuthMiddleware(userService),
    optionalAuth: createOptionalAuthMiddleware(userService),
    errorHandler: createErrorHandler(deps.logProvider),
    logging: createLoggingMiddleware(deps.logProvider),
  };
}
