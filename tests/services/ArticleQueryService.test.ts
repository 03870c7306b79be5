import { describe, it, expect, beforeEach } from 'vitest';
import { createTestContainer, type TestContainer } from '../mocks/testContainer.js';
import { Article } from '../../src/domain/Article.js';
import { User } from '../../src/domain/User.js';
import { NotFoundError } from '../../src/errors.js';

describe('ArticleQueryService', () => {
  let c: TestContainer;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    c = createTestContainer();
    alice = User.create({ email: 'alice@example.com', username: 'alice', passwordHash: 'hash' });
    bob = User.create({ email: 'bob@example.com', username: 'bob', passwordHash: 'hash' });
    await c.userRepo.save(alice);
    await c.userRepo.save(bob);
  });

  async function seed(title: string, author: User, tagList: string[], createdAt: string) {
    const article = Article.create(
      { title, description: 'desc', body: 'body', tagList, authorId: author.id },
      new Date(createdAt)
    );
    await c.articleRepo.save(article);
    return article;
  }

  // ── getBySlug ──

  describe('getBySlug', () => {
    it('should render the article with ISO timestamps', async () => {
      const article = await seed('Hello World', alice, ['b', 'a'], '2024-02-01T09:30:00.250Z');

      const result = await c.articleQueryService.getBySlug(article.slug, null);

      expect(result.article).toEqual({
        slug: article.slug,
        title: 'Hello World',
        description: 'desc',
        body: 'body',
        tagList: ['a', 'b'],
        createdAt: '2024-02-01T09:30:00.250Z',
        updatedAt: '2024-02-01T09:30:00.250Z',
        favorited: false,
        favoritesCount: 0,
        author: { username: 'alice', bio: '', image: '', following: false },
      });
    });

    it('should reflect the viewer\'s favorite and follow', async () => {
      const article = await seed('Hello World', alice, [], '2024-02-01T00:00:00.000Z');
      await c.articleRepo.favorite(article.id, bob.id);
      await c.userRepo.follow(bob.id, alice.id);

      const asBob = await c.articleQueryService.getBySlug(article.slug, bob);
      const anonymous = await c.articleQueryService.getBySlug(article.slug, null);

      expect(asBob.article.favorited).toBe(true);
      expect(asBob.article.author.following).toBe(true);
      expect(asBob.article.favoritesCount).toBe(1);
      expect(anonymous.article.favorited).toBe(false);
      expect(anonymous.article.author.following).toBe(false);
      expect(anonymous.article.favoritesCount).toBe(1);
    });

    it('should throw NotFoundError for an unknown slug', async () => {
      await expect(c.articleQueryService.getBySlug('nope', null)).rejects.toThrow(NotFoundError);
    });
  });

  // ── list ──

  describe('list', () => {
    beforeEach(async () => {
      await seed('Oldest', alice, ['dragons'], '2024-01-01T00:00:00.000Z');
      await seed('Middle', bob, ['dragons', 'training'], '2024-01-02T00:00:00.000Z');
      await seed('Newest', alice, ['training'], '2024-01-03T00:00:00.000Z');
    });

    it('should list all articles newest first with the total', async () => {
      const result = await c.articleQueryService.list({}, null);

      expect(result.articles.map((a) => a.title)).toEqual(['Newest', 'Middle', 'Oldest']);
      expect(result.articlesCount).toBe(3);
    });

    it('should filter by tag', async () => {
      const result = await c.articleQueryService.list({ tag: 'dragons' }, null);

      expect(result.articles.map((a) => a.title)).toEqual(['Middle', 'Oldest']);
      expect(result.articlesCount).toBe(2);
    });

    it('should filter by author', async () => {
      const result = await c.articleQueryService.list({ author: 'bob' }, null);

      expect(result.articles.map((a) => a.title)).toEqual(['Middle']);
    });

    it('should return nothing for an unknown author', async () => {
      const result = await c.articleQueryService.list({ author: 'nobody' }, null);

      expect(result).toEqual({ articles: [], articlesCount: 0 });
    });

    it('should filter by who favorited', async () => {
      const oldest = await c.articleRepo.list({ limit: 1, offset: 2 });
      await c.articleRepo.favorite(oldest.articles[0].id, bob.id);

      const result = await c.articleQueryService.list({ favorited: 'bob' }, null);

      expect(result.articles.map((a) => a.title)).toEqual(['Oldest']);
    });

    it('should page with limit and offset while reporting the full count', async () => {
      const result = await c.articleQueryService.list({ limit: 1, offset: 1 }, null);

      expect(result.articles.map((a) => a.title)).toEqual(['Middle']);
      expect(result.articlesCount).toBe(3);
    });

    it('should fall back to the default page for invalid paging', async () => {
      const result = await c.articleQueryService.list({ limit: -5, offset: -1 }, null);

      expect(result.articles).toHaveLength(3);
    });
  });

  // ── feed ──

  describe('feed', () => {
    it('should list only articles by followed authors', async () => {
      await seed('By Alice', alice, [], '2024-01-01T00:00:00.000Z');
      await seed('By Bob', bob, [], '2024-01-02T00:00:00.000Z');
      await c.userRepo.follow(bob.id, alice.id);

      const result = await c.articleQueryService.feed(bob);

      expect(result.articles.map((a) => a.title)).toEqual(['By Alice']);
      expect(result.articles[0].author.following).toBe(true);
      expect(result.articlesCount).toBe(1);
    });

    it('should be empty when following nobody', async () => {
      await seed('By Alice', alice, [], '2024-01-01T00:00:00.000Z');

      expect(await c.articleQueryService.feed(bob)).toEqual({ articles: [], articlesCount: 0 });
    });
  });

  // ── tags ──

  describe('listTags', () => {
    it('should return every distinct tag, sorted', async () => {
      await seed('One', alice, ['zeta', 'alpha'], '2024-01-01T00:00:00.000Z');
      await seed('Two', bob, ['alpha', 'mid'], '2024-01-02T00:00:00.000Z');

      expect(await c.articleQueryService.listTags()).toEqual({ tags: ['alpha', 'mid', 'zeta'] });
    });

    it('should be empty with no articles', async () => {
      expect(await c.articleQueryService.listTags()).toEqual({ tags: [] });
    });
  });
});
