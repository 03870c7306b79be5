/**
 * Read side: turns entities into the view objects the API returns.
 *
 * Views depend on who is looking (`following`, `favorited`), so every method
 * takes the viewer, or null for anonymous callers.
 */

import type { IArticleRepository } from '../repositories/IArticleRepository.js';
import type { IUserRepository } from '../repositories/IUserRepository.js';
import type { Article, Comment, User } from '../domain/index.js';
import type {
  ArticleResponse,
  ArticleView,
  CommentView,
  ListArticlesQuery,
  MultipleArticlesResponse,
  ProfileView,
  TagsResponse,
} from '../types/api.js';
import { DEFAULT_PAGE, MAX_PAGE_SIZE, type PaginationOptions } from '../types/common.js';
import { NotFoundError } from '../errors.js';

export class ArticleQueryService {
  constructor(
    private readonly articleRepo: IArticleRepository,
    private readonly userRepo: IUserRepository
  ) {}

  async getBySlug(slug: string, viewer: User | null): Promise<ArticleResponse> {
    const article = await this.articleRepo.findBySlug(slug);
    if (!article) {
      throw new NotFoundError(`Article "${slug}" not found`);
    }

    return { article: await this.toArticleView(article, viewer) };
  }

  async list(query: ListArticlesQuery, viewer: User | null): Promise<MultipleArticlesResponse> {
    const page = normalizePage(query);

    let authorId: string | undefined;
    if (query.author) {
      const author = await this.userRepo.findByUsername(query.author);
      if (!author) return { articles: [], articlesCount: 0 };
      authorId = author.id;
    }

    let favoritedBy: string | undefined;
    if (query.favorited) {
      const fan = await this.userRepo.findByUsername(query.favorited);
      if (!fan) return { articles: [], articlesCount: 0 };
      favoritedBy = fan.id;
    }

    const { articles, total } = await this.articleRepo.list({
      ...page,
      tag: query.tag || undefined,
      authorId,
      favoritedBy,
    });

    return {
      articles: await this.toArticleViews(articles, viewer),
      articlesCount: total,
    };
  }

  /** Articles by authors the viewer follows, newest first. */
  async feed(viewer: User, query: Partial<PaginationOptions> = {}): Promise<MultipleArticlesResponse> {
    const authorIds = await this.userRepo.followingIds(viewer.id);
    if (authorIds.length === 0) {
      return { articles: [], articlesCount: 0 };
    }

    const { articles, total } = await this.articleRepo.list({
      ...normalizePage(query),
      authorIds,
    });

    return {
      articles: await this.toArticleViews(articles, viewer),
      articlesCount: total,
    };
  }

  async listTags(): Promise<TagsResponse> {
    return { tags: await this.articleRepo.allTags() };
  }

  async toArticleView(article: Article, viewer: User | null): Promise<ArticleView> {
    const [view] = await this.toArticleViews([article], viewer);
    return view;
  }

  async toArticleViews(articles: Article[], viewer: User | null): Promise<ArticleView[]> {
    const ids = articles.map((a) => a.id);
    const [authors, counts, favorited] = await Promise.all([
      this.profilesById(articles.map((a) => a.authorId), viewer),
      this.articleRepo.favoritesCount(ids),
      viewer
        ? this.articleRepo.favoritedArticleIds(viewer.id, ids)
        : Promise.resolve(new Set<string>()),
    ]);

    return articles.map((article) => ({
      slug: article.slug,
      title: article.title,
      description: article.description,
      body: article.body,
      tagList: article.tagList,
      createdAt: article.createdAt.toISOString(),
      updatedAt: article.updatedAt.toISOString(),
      favorited: favorited.has(article.id),
      favoritesCount: counts.get(article.id) ?? 0,
      author: authorOrThrow(authors, article.authorId),
    }));
  }

  async toCommentViews(comments: Comment[], viewer: User | null): Promise<CommentView[]> {
    const authors = await this.profilesById(comments.map((c) => c.authorId), viewer);

    return comments.map((comment) => {
      const createdAt = comment.createdAt.toISOString();
      return {
        id: comment.id,
        body: comment.body,
        createdAt,
        // Comments are immutable
        updatedAt: createdAt,
        author: authorOrThrow(authors, comment.authorId),
      };
    });
  }

  async toProfileView(user: User, viewer: User | null): Promise<ProfileView> {
    const following = viewer && viewer.id !== user.id
      ? await this.userRepo.isFollowing(viewer.id, user.id)
      : false;

    return {
      username: user.username,
      bio: user.bio,
      image: user.image,
      following,
    };
  }

  // ── Private ──

  private async profilesById(
    userIds: string[],
    viewer: User | null
  ): Promise<Map<string, ProfileView>> {
    const unique = [...new Set(userIds)];
    const followed = viewer
      ? new Set(await this.userRepo.followingIds(viewer.id))
      : new Set<string>();

    const profiles = new Map<string, ProfileView>();
    const users = await Promise.all(unique.map((id) => this.userRepo.findById(id)));
    for (const user of users) {
      if (!user) continue;
      profiles.set(user.id, {
        username: user.username,
        bio: user.bio,
        image: user.image,
        following: followed.has(user.id),
      });
    }
    return profiles;
  }
}

function authorOrThrow(profiles: Map<string, ProfileView>, authorId: string): ProfileView {
  const profile = profiles.get(authorId);
  if (!profile) {
    // Users are never deleted through the API, so this is a data integrity fault
    throw new Error(`Author "${authorId}" not found`);
  }
  return profile;
}

function normalizePage(query: { limit?: number; offset?: number }): PaginationOptions {
  const { limit, offset } = query;
  return {
    limit: limit !== undefined && Number.isInteger(limit) && limit > 0
      ? Math.min(limit, MAX_PAGE_SIZE)
      : DEFAULT_PAGE.limit,
    offset: offset !== undefined && Number.isInteger(offset) && offset >= 0
      ? offset
      : DEFAULT_PAGE.offset,
  };
}
