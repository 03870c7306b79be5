/**
 * API types: request and response payloads, in the RealWorld wire shape.
 * Decoupled from domain entities so the API can evolve independently.
 */

// ── Requests ──

export interface RegisterRequest {
  email: string;
  username: string;
  password: string;
}

export interface LoginRequest {
  email: string;
  password: string;
}

/** `null` and a missing field both leave the current value in place. */
export interface UpdateUserRequest {
  email?: string | null;
  username?: string | null;
  password?: string | null;
  bio?: string | null;
  image?: string | null;
}

export interface CreateArticleRequest {
  title: string;
  description: string;
  body: string;
  tagList?: string[];
}

export interface UpdateArticleRequest {
  title?: string;
  description?: string;
  body?: string;
}

export interface ListArticlesQuery {
  tag?: string;
  author?: string;
  favorited?: string;
  limit?: number;
  offset?: number;
}

// ── Responses ──

export interface UserResponse {
  user: {
    email: string;
    token: string;
    username: string;
    bio: string;
    image: string;
  };
}

export interface ProfileView {
  username: string;
  bio: string;
  image: string;
  following: boolean;
}

export interface ProfileResponse {
  profile: ProfileView;
}

export interface ArticleView {
  slug: string;
  title: string;
  description: string;
  body: string;
  tagList: string[];
  createdAt: string;
  updatedAt: string;
  favorited: boolean;
  favoritesCount: number;
  author: ProfileView;
}

export interface ArticleResponse {
  article: ArticleView;
}

export interface MultipleArticlesResponse {
  articles: ArticleView[];
  articlesCount: number;
}

export interface CommentView {
  id: string;
  body: string;
  createdAt: string;
  updatedAt: string;
  author: ProfileView;
}

export interface CommentResponse {
  comment: CommentView;
}

export interface MultipleCommentsResponse {
  comments: CommentView[];
}

export interface TagsResponse {
  tags: string[];
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
