/**
 * In-memory mock for IArticleRepository.
 * Stores rows keyed by article ID, with tags alongside as the
 * articles_with_tags view would return them.
 */

import type {
  ArticleFilter,
  ArticlePage,
  IArticleRepository,
} from '../../src/repositories/IArticleRepository.js';
import type { Article } from '../../src/domain/Article.js';
import type { ArticleWithTagsRow } from '../../src/types/database.js';
import { articleToRow, rowToArticle } from '../../src/repositories/mappers.js';

export class MockArticleRepository implements IArticleRepository {
  private articles = new Map<string, ArticleWithTagsRow>();
  /** `${userId}:${articleId}` */
  private favorites = new Set<string>();

  async save(article: Article): Promise<void> {
    const row: ArticleWithTagsRow = { ...articleToRow(article), tag_list: article.tagList };
    for (const other of this.articles.values()) {
      if (other.id !== row.id && other.slug === row.slug) {
        throw new Error(`duplicate key value violates unique constraint "articles_slug_key"`);
      }
    }
    this.articles.set(row.id, row);
  }

  async findById(id: string): Promise<Article | null> {
    const row = this.articles.get(id);
    return row ? rowToArticle(row) : null;
  }

  async findBySlug(slug: string): Promise<Article | null> {
    for (const row of this.articles.values()) {
      if (row.slug === slug) return rowToArticle(row);
    }
    return null;
  }

  async delete(id: string): Promise<void> {
    this.articles.delete(id);
    for (const key of [...this.favorites]) {
      if (key.endsWith(`:${id}`)) this.favorites.delete(key);
    }
  }

  async list(filter: ArticleFilter): Promise<ArticlePage> {
    const matches = [...this.articles.values()]
      .filter((row) => !filter.tag || row.tag_list.includes(filter.tag))
      .filter((row) => !filter.authorId || row.author_id === filter.authorId)
      .filter((row) => !filter.authorIds || filter.authorIds.includes(row.author_id))
      .filter((row) => !filter.favoritedBy || this.favorites.has(`${filter.favoritedBy}:${row.id}`))
      .sort((a, b) => b.created_at.localeCompare(a.created_at));

    return {
      articles: matches
        .slice(filter.offset, filter.offset + filter.limit)
        .map(rowToArticle),
      total: matches.length,
    };
  }

  async favorite(articleId: string, userId: string): Promise<void> {
    this.favorites.add(`${userId}:${articleId}`);
  }

  async unfavorite(articleId: string, userId: string): Promise<void> {
    this.favorites.delete(`${userId}:${articleId}`);
  }

  async favoritesCount(articleIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>(articleIds.map((id) => [id, 0]));
    for (const key of this.favorites) {
      const articleId = key.slice(key.indexOf(':') + 1);
      if (counts.has(articleId)) {
        counts.set(articleId, (counts.get(articleId) ?? 0) + 1);
      }
    }
    return counts;
  }

  async favoritedArticleIds(userId: string, articleIds: string[]): Promise<Set<string>> {
    return new Set(articleIds.filter((id) => this.favorites.has(`${userId}:${id}`)));
  }

  async allTags(): Promise<string[]> {
    const tags = new Set<string>();
    for (const row of this.articles.values()) {
      for (const tag of row.tag_list) tags.add(tag);
    }
    return [...tags].sort();
  }

  // ── Test Helpers ──

  getRow(id: string): ArticleWithTagsRow | undefined {
    return this.articles.get(id);
  }

  count(): number {
    return this.articles.size;
  }
}
