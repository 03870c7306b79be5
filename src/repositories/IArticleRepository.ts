/**
 * Article data access interface. Also owns favorites and tags.
 */

import type { Article } from '../domain/Article.js';
import type { PaginationOptions } from '../types/common.js';

export interface ArticleFilter extends PaginationOptions {
  tag?: string;
  authorId?: string;
  /** Restrict to articles written by any of these authors (feed). */
  authorIds?: string[];
  /** Restrict to articles favorited by this user. */
  favoritedBy?: string;
}

export interface ArticlePage {
  articles: Article[];
  /** Total matches ignoring limit/offset. */
  total: number;
}

export interface IArticleRepository {
  /** Insert or update the article and replace its tag set, atomically. */
  save(article: Article): Promise<void>;

  findById(id: string): Promise<Article | null>;

  findBySlug(slug: string): Promise<Article | null>;

  delete(id: string): Promise<void>;

  /** Newest first. */
  list(filter: ArticleFilter): Promise<ArticlePage>;

  favorite(articleId: string, userId: string): Promise<void>;

  unfavorite(articleId: string, userId: string): Promise<void>;

  /** Favorite count per article ID. Articles with none map to 0. */
  favoritesCount(articleIds: string[]): Promise<Map<string, number>>;

  /** The subset of articleIds the user has favorited. */
  favoritedArticleIds(userId: string, articleIds: string[]): Promise<Set<string>>;

  /** Every distinct tag in use. */
  allTags(): Promise<string[]>;
}
