/**
 * Article write side: create, update, delete, favorite.
 * Only the author may update or delete; the entity itself enforces field
 * rules and timestamps.
 */

import type { IArticleRepository } from '../repositories/IArticleRepository.js';
import type { ArticleQueryService } from './ArticleQueryService.js';
import type { User } from '../domain/User.js';
import type {
  ArticleResponse,
  CreateArticleRequest,
  UpdateArticleRequest,
} from '../types/api.js';
import { Article } from '../domain/Article.js';
import { ForbiddenError, NotFoundError } from '../errors.js';

export class ArticleService {
  constructor(
    private readonly articleRepo: IArticleRepository,
    private readonly queries: ArticleQueryService
  ) {}

  async create(input: CreateArticleRequest, author: User): Promise<ArticleResponse> {
    const article = Article.create({
      title: input.title,
      description: input.description,
      body: input.body,
      tagList: input.tagList,
      authorId: author.id,
    });

    await this.articleRepo.save(article);
    return { article: await this.queries.toArticleView(article, author) };
  }

  async update(slug: string, input: UpdateArticleRequest, user: User): Promise<ArticleResponse> {
    const article = await this.requireArticle(slug);
    if (!article.isAuthoredBy(user.id)) {
      throw new ForbiddenError('You can only update your own articles');
    }

    article.update({
      title: input.title,
      description: input.description,
      body: input.body,
    });

    await this.articleRepo.save(article);
    return { article: await this.queries.toArticleView(article, user) };
  }

  async delete(slug: string, user: User): Promise<void> {
    const article = await this.requireArticle(slug);
    if (!article.isAuthoredBy(user.id)) {
      throw new ForbiddenError('You can only delete your own articles');
    }

    await this.articleRepo.delete(article.id);
  }

  async favorite(slug: string, user: User): Promise<ArticleResponse> {
    const article = await this.requireArticle(slug);

    await this.articleRepo.favorite(article.id, user.id);
    return { article: await this.queries.toArticleView(article, user) };
  }

  async unfavorite(slug: string, user: User): Promise<ArticleResponse> {
    const article = await this.requireArticle(slug);

    await this.articleRepo.unfavorite(article.id, user.id);
    return { article: await this.queries.toArticleView(article, user) };
  }

  private async requireArticle(slug: string): Promise<Article> {
    const article = await this.articleRepo.findBySlug(slug);
    if (!article) {
      throw new NotFoundError(`Article "${slug}" not found`);
    }
    return article;
  }
}
