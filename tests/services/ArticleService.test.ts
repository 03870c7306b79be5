import { describe, it, expect, beforeEach } from 'vitest';
import { createTestContainer, type TestContainer } from '../mocks/testContainer.js';
import { User } from '../../src/domain/User.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../../src/errors.js';

describe('ArticleService', () => {
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

  async function createHelloWorld() {
    const { article } = await c.articleService.create(
      { title: 'Hello World', description: 'desc', body: 'body', tagList: ['x'] },
      alice
    );
    return article;
  }

  // ── create ──

  describe('create', () => {
    it('should create an article authored by the caller', async () => {
      const article = await createHelloWorld();

      expect(article.slug).toMatch(/^hello-world-[0-9a-f]{8}$/);
      expect(article).toMatchObject({
        title: 'Hello World',
        description: 'desc',
        body: 'body',
        tagList: ['x'],
        favorited: false,
        favoritesCount: 0,
        author: { username: 'alice', bio: '', image: '', following: false },
      });
      expect(article.createdAt).toBe(article.updatedAt);
      expect(article.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
      expect(c.articleRepo.count()).toBe(1);
    });

    it('should persist the article under its slug', async () => {
      const article = await createHelloWorld();

      const stored = await c.articleRepo.findBySlug(article.slug);
      expect(stored!.authorId).toBe(alice.id);
      expect(stored!.tagList).toEqual(['x']);
    });

    it('should give two articles with the same title different slugs', async () => {
      const first = await createHelloWorld();
      const second = await createHelloWorld();

      expect(first.slug).not.toBe(second.slug);
      expect(c.articleRepo.count()).toBe(2);
    });

    it('should reject a blank body without saving', async () => {
      await expect(
        c.articleService.create({ title: 'T', description: 'D', body: ' ' }, alice)
      ).rejects.toThrow(ValidationError);
      expect(c.articleRepo.count()).toBe(0);
    });
  });

  // ── update ──

  describe('update', () => {
    it('should update the title, slug and updatedAt', async () => {
      const original = await createHelloWorld();

      const { article } = await c.articleService.update(
        original.slug,
        { title: 'Goodbye Moon' },
        alice
      );

      expect(article.title).toBe('Goodbye Moon');
      expect(article.slug).toMatch(/^goodbye-moon-[0-9a-f]{8}$/);
      expect(article.createdAt).toBe(original.createdAt);
      expect(Date.parse(article.updatedAt)).toBeGreaterThan(Date.parse(original.updatedAt));
      expect(await c.articleRepo.findBySlug(original.slug)).toBeNull();
      expect(await c.articleRepo.findBySlug(article.slug)).not.toBeNull();
    });

    it('should keep the slug when only the body changes', async () => {
      const original = await createHelloWorld();

      const { article } = await c.articleService.update(original.slug, { body: 'new body' }, alice);

      expect(article.slug).toBe(original.slug);
      expect(article.body).toBe('new body');
    });

    it('should still advance updatedAt for an empty update', async () => {
      const original = await createHelloWorld();

      const { article } = await c.articleService.update(original.slug, {}, alice);

      expect(Date.parse(article.updatedAt)).toBeGreaterThan(Date.parse(original.updatedAt));
      expect(article.title).toBe(original.title);
    });

    it('should forbid anyone but the author', async () => {
      const original = await createHelloWorld();

      await expect(
        c.articleService.update(original.slug, { title: 'Hijacked' }, bob)
      ).rejects.toThrow(ForbiddenError);

      const stored = await c.articleRepo.findBySlug(original.slug);
      expect(stored!.title).toBe('Hello World');
    });

    it('should throw NotFoundError for an unknown slug', async () => {
      await expect(c.articleService.update('missing', {}, alice)).rejects.toThrow(NotFoundError);
    });
  });

  // ── delete ──

  describe('delete', () => {
    it('should delete the article for its author', async () => {
      const article = await createHelloWorld();

      await c.articleService.delete(article.slug, alice);

      expect(c.articleRepo.count()).toBe(0);
    });

    it('should forbid anyone but the author', async () => {
      const article = await createHelloWorld();

      await expect(c.articleService.delete(article.slug, bob)).rejects.toThrow(
        'You can only delete your own articles'
      );
      expect(c.articleRepo.count()).toBe(1);
    });
  });

  // ── favorites ──

  describe('favorite', () => {
    it('should mark the article favorited and count it once', async () => {
      const article = await createHelloWorld();

      await c.articleService.favorite(article.slug, bob);
      const { article: view } = await c.articleService.favorite(article.slug, bob);

      expect(view.favorited).toBe(true);
      expect(view.favoritesCount).toBe(1);
    });

    it('should count favorites from several users', async () => {
      const article = await createHelloWorld();

      await c.articleService.favorite(article.slug, bob);
      const { article: view } = await c.articleService.favorite(article.slug, alice);

      expect(view.favoritesCount).toBe(2);
    });

    it('should unfavorite', async () => {
      const article = await createHelloWorld();
      await c.articleService.favorite(article.slug, bob);

      const { article: view } = await c.articleService.unfavorite(article.slug, bob);

      expect(view.favorited).toBe(false);
      expect(view.favoritesCount).toBe(0);
    });

    it('should throw NotFoundError for an unknown slug', async () => {
      await expect(c.articleService.favorite('missing', bob)).rejects.toThrow(
        'Article "missing" not found'
      );
    });
  });
});
