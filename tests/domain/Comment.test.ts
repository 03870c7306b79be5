import { describe, it, expect, afterEach, vi } from 'vitest';
import { Comment } from '../../src/domain/Comment.js';
import { ValidationError } from '../../src/errors.js';

describe('Comment', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create a comment stamped with the current time', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-05T12:00:00.000Z'));

    const comment = Comment.create({ body: 'Nice post', authorId: 'u1', articleId: 'a1' });

    expect(comment.body).toBe('Nice post');
    expect(comment.authorId).toBe('u1');
    expect(comment.articleId).toBe('a1');
    expect(comment.createdAt.toISOString()).toBe('2024-05-05T12:00:00.000Z');
    expect(comment.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should reject a blank body', () => {
    expect(() => Comment.create({ body: ' ', authorId: 'u1', articleId: 'a1' })).toThrow(
      ValidationError
    );
  });

  it('should require author and article references', () => {
    expect(() => Comment.create({ body: 'hi', authorId: '', articleId: 'a1' })).toThrow(
      'Comment must reference an author and an article'
    );
    expect(() => Comment.create({ body: 'hi', authorId: 'u1', articleId: '' })).toThrow(
      'Comment must reference an author and an article'
    );
  });

  it('should restore from persisted props', () => {
    const props = {
      id: 'c1',
      body: 'text',
      authorId: 'u1',
      articleId: 'a1',
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
    };

    expect(Comment.restore(props).toProps()).toEqual(props);
  });

  it('should not expose its timestamp for mutation', () => {
    const createdAt = new Date('2024-01-01T00:00:00.000Z');
    const comment = Comment.restore({ id: 'c1', body: 'text', authorId: 'u1', articleId: 'a1', createdAt });

    createdAt.setTime(0);
    comment.createdAt.setTime(0);

    expect(comment.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });
});
