/**
 * Comment entity. Immutable once posted; there is no update path.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors.js';

export interface CommentProps {
  id: string;
  body: string;
  authorId: string;
  articleId: string;
  createdAt: Date;
}

export interface NewComment {
  body: string;
  authorId: string;
  articleId: string;
}

export class Comment {
  readonly id: string;
  readonly body: string;
  readonly authorId: string;
  readonly articleId: string;
  private readonly _createdAt: Date;

  private constructor(props: CommentProps) {
    this.id = props.id;
    this.body = props.body;
    this.authorId = props.authorId;
    this.articleId = props.articleId;
    this._createdAt = new Date(props.createdAt.getTime());
  }

  static create(input: NewComment): Comment {
    if (!input.body || input.body.trim().length === 0) {
      throw new ValidationError('body is required', { field: 'body' });
    }
    if (!input.authorId || !input.articleId) {
      throw new ValidationError('Comment must reference an author and an article');
    }

    return new Comment({
      id: randomUUID(),
      body: input.body,
      authorId: input.authorId,
      articleId: input.articleId,
      createdAt: new Date(),
    });
  }

  static restore(props: CommentProps): Comment {
    return new Comment(props);
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  toProps(): CommentProps {
    return {
      id: this.id,
      body: this.body,
      authorId: this.authorId,
      articleId: this.articleId,
      createdAt: this.createdAt,
    };
  }
}
