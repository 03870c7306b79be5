/**
 * Comment data access interface.
 */

import type { Comment } from '../domain/Comment.js';

export interface ICommentRepository {
  save(comment: Comment): Promise<void>;

  /** Scoped to the article so a comment ID from another article never matches. */
  findById(articleId: string, commentId: string): Promise<Comment | null>;

  /** Oldest first. */
  findByArticle(articleId: string): Promise<Comment[]>;

  delete(id: string): Promise<void>;
}
