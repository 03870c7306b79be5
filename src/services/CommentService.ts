/**
 * Comments on articles.
 * A comment may be deleted by its author or by the author of the article.
 */

import type { IArticleRepository } from '../repositories/IArticleRepository.js';
import type { ICommentRepository } from '../repositories/ICommentRepository.js';
import type { ArticleQueryService } from './ArticleQueryService.js';
import type { Article, User } from '../domain/index.js';
import type { CommentResponse, MultipleCommentsResponse } from '../types/api.js';
import { Comment } from '../domain/Comment.js';
import { ForbiddenError, NotFoundError } from '../errors.js';

export class CommentService {
  constructor(
    private readonly commentRepo: ICommentRepository,
    private readonly articleRepo: IArticleRepository,
    private readonly queries: ArticleQueryService
  ) {}

  async add(slug: string, body: string, author: User): Promise<CommentResponse> {
    const article = await this.requireArticle(slug);
    const comment = Comment.create({ body, authorId: author.id, articleId: article.id });

    await this.commentRepo.save(comment);
    const [view] = await this.queries.toCommentViews([comment], author);
    return { comment: view };
  }

  async list(slug: string, viewer: User | null): Promise<MultipleCommentsResponse> {
    const article = await this.requireArticle(slug);
    const comments = await this.commentRepo.findByArticle(article.id);

    return { comments: await this.queries.toCommentViews(comments, viewer) };
  }

  async delete(slug: string, commentId: string, user: User): Promise<void> {
    const article = await this.requireArticle(slug);
    const comment = await this.commentRepo.findById(article.id, commentId);
    if (!comment) {
      throw new NotFoundError(`Comment "${commentId}" not found`);
    }

    if (comment.authorId !== user.id && !article.isAuthoredBy(user.id)) {
      throw new ForbiddenError('You can only delete your own comments or comments on your articles');
    }

    await this.commentRepo.delete(comment.id);
  }

  private async requireArticle(slug: string): Promise<Article> {
    const article = await this.articleRepo.findBySlug(slug);
    if (!article) {
      throw new NotFoundError(`Article "${slug}" not found`);
    }
    return article;
  }
}
