/**
 * Supabase implementation of ICommentRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ICommentRepository } from './ICommentRepository.js';
import type { Comment } from '../domain/Comment.js';
import type { CommentRow } from '../types/database.js';
import { commentToRow, rowToComment } from './mappers.js';

export class SupabaseCommentRepository implements ICommentRepository {
  constructor(private readonly db: SupabaseClient) {}

  async save(comment: Comment): Promise<void> {
    const { error } = await this.db.from('comments').insert(commentToRow(comment));

    if (error) throw new Error(`Failed to insert comment: ${error.message}`);
  }

  async findById(articleId: string, commentId: string): Promise<Comment | null> {
    const { data, error } = await this.db
      .from('comments')
      .select('*')
      .eq('id', commentId)
      .eq('article_id', articleId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find comment: ${error.message}`);
    return data ? rowToComment(data as CommentRow) : null;
  }

  async findByArticle(articleId: string): Promise<Comment[]> {
    const { data, error } = await this.db
      .from('comments')
      .select('*')
      .eq('article_id', articleId)
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to list comments: ${error.message}`);
    return ((data ?? []) as CommentRow[]).map(rowToComment);
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('comments').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete comment: ${error.message}`);
  }
}
