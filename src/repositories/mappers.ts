/**
 * Row ↔ entity mapping. Timestamps travel as ISO-8601 strings with
 * millisecond precision.
 */

import { Article } from '../domain/Article.js';
import { Comment } from '../domain/Comment.js';
import { User } from '../domain/User.js';
import type {
  ArticleRow,
  ArticleWithTagsRow,
  CommentRow,
  UserRow,
} from '../types/database.js';

export function userToRow(user: User): UserRow {
  const props = user.toProps();
  return {
    id: props.id,
    email: props.email,
    username: props.username,
    password_hash: props.passwordHash,
    bio: props.bio,
    image: props.image,
  };
}

export function rowToUser(row: UserRow): User {
  return User.restore({
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.password_hash,
    bio: row.bio ?? '',
    image: row.image ?? '',
  });
}

export function articleToRow(article: Article): ArticleRow {
  const props = article.toProps();
  return {
    id: props.id,
    slug: props.slug,
    title: props.title,
    description: props.description,
    body: props.body,
    author_id: props.authorId,
    created_at: props.createdAt.toISOString(),
    updated_at: props.updatedAt.toISOString(),
  };
}

export function rowToArticle(row: ArticleWithTagsRow): Article {
  return Article.restore({
    id: row.id,
    slug: row.slug,
    title: row.title,
    description: row.description,
    body: row.body,
    tagList: row.tag_list ?? [],
    authorId: row.author_id,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  });
}

export function commentToRow(comment: Comment): CommentRow {
  return {
    id: comment.id,
    body: comment.body,
    author_id: comment.authorId,
    article_id: comment.articleId,
    created_at: comment.createdAt.toISOString(),
  };
}

export function rowToComment(row: CommentRow): Comment {
  return Comment.restore({
    id: row.id,
    body: row.body,
    authorId: row.author_id,
    articleId: row.article_id,
    createdAt: new Date(row.created_at),
  });
}
