/**
 * Supabase implementation of IArticleRepository.
 * Reads go through the articles_with_tags view; writes go through the
 * save_article function so the article row and its tags commit together.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  ArticleFilter,
  ArticlePage,
  IArticleRepository,
} from './IArticleRepository.js';
import type { Article } from '../domain/Article.js';
import type { ArticleWithTagsRow, FavoriteRow } from '../types/database.js';
import { articleToRow, rowToArticle } from './mappers.js';

export class SupabaseArticleRepository implements IArticleRepository {
  constructor(private readonly db: SupabaseClient) {}

  async save(article: Article): Promise<void> {
    const { error } = await this.db.rpc('save_article', {
      p_article: articleToRow(article),
      p_tags: article.tagList,
    });

    if (error) throw new Error(`Failed to save article: ${error.message}`);
  }

  async findById(id: string): Promise<Article | null> {
    return this.findOneBy('id', id);
  }

  async findBySlug(slug: string): Promise<Article | null> {
    return this.findOneBy('slug', slug);
  }

  async delete(id: string): Promise<void> {
    // article_tags, favorites and comments cascade in the schema
    const { error } = await this.db.from('articles').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete article: ${error.message}`);
  }

  async list(filter: ArticleFilter): Promise<ArticlePage> {
    let favoritedIds: string[] | null = null;
    if (filter.favoritedBy) {
      const { data, error } = await this.db
        .from('favorites')
        .select('article_id')
        .eq('user_id', filter.favoritedBy);

      if (error) throw new Error(`Failed to list favorites: ${error.message}`);
      favoritedIds = ((data ?? []) as Pick<FavoriteRow, 'article_id'>[]).map((r) => r.article_id);
      if (favoritedIds.length === 0) return { articles: [], total: 0 };
    }

    if (filter.authorIds && filter.authorIds.length === 0) {
      return { articles: [], total: 0 };
    }

    let query = this.db
      .from('articles_with_tags')
      .select('*', { count: 'exact' });

    if (filter.tag) query = query.contains('tag_list', [filter.tag]);
    if (filter.authorId) query = query.eq('author_id', filter.authorId);
    if (filter.authorIds) query = query.in('author_id', filter.authorIds);
    if (favoritedIds) query = query.in('id', favoritedIds);

    const { data, count, error } = await query
      .order('created_at', { ascending: false })
      .range(filter.offset, filter.offset + filter.limit - 1);

    if (error) throw new Error(`Failed to list articles: ${error.message}`);
    return {
      articles: ((data ?? []) as ArticleWithTagsRow[]).map(rowToArticle),
      total: count ?? 0,
    };
  }

  async favorite(articleId: string, userId: string): Promise<void> {
    const row: FavoriteRow = { article_id: articleId, user_id: userId };
    const { error } = await this.db
      .from('favorites')
      .upsert(row, { onConflict: 'user_id,article_id', ignoreDuplicates: true });

    if (error) throw new Error(`Failed to favorite article: ${error.message}`);
  }

  async unfavorite(articleId: string, userId: string): Promise<void> {
    const { error } = await this.db
      .from('favorites')
      .delete()
      .eq('article_id', articleId)
      .eq('user_id', userId);

    if (error) throw new Error(`Failed to unfavorite article: ${error.message}`);
  }

  async favoritesCount(articleIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>(articleIds.map((id) => [id, 0]));
    if (articleIds.length === 0) return counts;

    const { data, error } = await this.db
      .from('favorites')
      .select('article_id')
      .in('article_id', articleIds);

    if (error) throw new Error(`Failed to count favorites: ${error.message}`);
    for (const row of (data ?? []) as Pick<FavoriteRow, 'article_id'>[]) {
      counts.set(row.article_id, (counts.get(row.article_id) ?? 0) + 1);
    }
    return counts;
  }

  async favoritedArticleIds(userId: string, articleIds: string[]): Promise<Set<string>> {
    if (articleIds.length === 0) return new Set();

    const { data, error } = await this.db
      .from('favorites')
      .select('article_id')
      .eq('user_id', userId)
      .in('article_id', articleIds);

    if (error) throw new Error(`Failed to load favorites: ${error.message}`);
    return new Set(((data ?? []) as Pick<FavoriteRow, 'article_id'>[]).map((r) => r.article_id));
  }

  async allTags(): Promise<string[]> {
    const { data, error } = await this.db.from('article_tags').select('tag');

    if (error) throw new Error(`Failed to list tags: ${error.message}`);
    const tags = new Set(((data ?? []) as Array<{ tag: string }>).map((r) => r.tag));
    return [...tags].sort();
  }

  private async findOneBy(column: 'id' | 'slug', value: string): Promise<Article | null> {
    const { data, error } = await this.db
      .from('articles_with_tags')
      .select('*')
      .eq(column, value)
      .maybeSingle();

    if (error) throw new Error(`Failed to find article by ${column}: ${error.message}`);
    return data ? rowToArticle(data as ArticleWithTagsRow) : null;
  }
}
