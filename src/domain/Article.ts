/**
 * Article entity.
 * Owns slug derivation and the timestamp invariants:
 *   createdAt <= updatedAt, and every update strictly advances updatedAt.
 */

import { randomBytes, randomUUID } from 'node:crypto';
import { ValidationError } from '../errors.js';

const SLUG_SUFFIX_BYTES = 4;

export interface ArticleProps {
  id: string;
  slug: string;
  title: string;
  description: string;
  body: string;
  /** Distinct, sorted. */
  tagList: string[];
  authorId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewArticle {
  title: string;
  description: string;
  body: string;
  tagList?: string[];
  authorId: string;
}

/** Fields an update may replace. `null` and `undefined` both mean "leave as is". */
export interface ArticleChanges {
  title?: string | null;
  description?: string | null;
  body?: string | null;
}

export class Article {
  readonly id: string;
  readonly authorId: string;
  private readonly _createdAt: Date;
  private _slug: string;
  private _title: string;
  private _description: string;
  private _body: string;
  private _tagList: string[];
  private _updatedAt: Date;

  private constructor(props: ArticleProps) {
    this.id = props.id;
    this.authorId = props.authorId;
    this._createdAt = new Date(props.createdAt.getTime());
    this._slug = props.slug;
    this._title = props.title;
    this._description = props.description;
    this._body = props.body;
    this._tagList = props.tagList;
    this._updatedAt = new Date(props.updatedAt.getTime());
  }

  /**
   * Create a new article. `createdAt` overrides the clock for backfills;
   * both timestamps start equal.
   */
  static create(input: NewArticle, createdAt?: Date): Article {
    requireText('title', input.title);
    requireText('description', input.description);
    requireText('body', input.body);
    requireText('authorId', input.authorId);

    if (createdAt && Number.isNaN(createdAt.getTime())) {
      throw new ValidationError('createdAt must be a valid date', { field: 'createdAt' });
    }
    const now = createdAt ? new Date(createdAt.getTime()) : new Date();

    return new Article({
      id: randomUUID(),
      slug: Article.toSlug(input.title),
      title: input.title,
      description: input.description,
      body: input.body,
      tagList: normalizeTags(input.tagList ?? []),
      authorId: input.authorId,
      createdAt: now,
      updatedAt: new Date(now.getTime()),
    });
  }

  /** Rebuild an article from persisted state. No validation, no new identity. */
  static restore(props: ArticleProps): Article {
    return new Article({ ...props, tagList: [...props.tagList] });
  }

  /**
   * Derive a URL-safe slug: lower-cased, whitespace runs become one hyphen,
   * any other non-alphanumeric character is dropped, and a random hex suffix
   * is appended.
   */
  static toSlug(title: string, suffix: string = randomBytes(SLUG_SUFFIX_BYTES).toString('hex')): string {
    const base = title
      .toLowerCase()
      .trim()
      .replace(/\s+/g, '-')
      .replace(/[^a-z0-9-]/g, '')
      .replace(/-+/g, '-')
      .replace(/^-|-$/g, '');

    return base ? `${base}-${suffix}` : suffix;
  }

  get slug(): string {
    return this._slug;
  }

  get title(): string {
    return this._title;
  }

  get description(): string {
    return this._description;
  }

  get body(): string {
    return this._body;
  }

  get tagList(): string[] {
    return [...this._tagList];
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  get updatedAt(): Date {
    return new Date(this._updatedAt.getTime());
  }

  /**
   * Apply changes in place. Validation runs before anything is written, so a
   * rejected update leaves the article untouched. updatedAt advances even
   * when nothing changed.
   */
  update(changes: ArticleChanges = {}): void {
    const { title, description, body } = changes;
    if (title != null) requireText('title', title);
    if (description != null) requireText('description', description);
    if (body != null) requireText('body', body);

    if (title != null && title !== this._title) {
      this._title = title;
      this._slug = Article.toSlug(title);
    }
    if (description != null) this._description = description;
    if (body != null) this._body = body;

    this.touch();
  }

  isAuthoredBy(userId: string): boolean {
    return this.authorId === userId;
  }

  toProps(): ArticleProps {
    return {
      id: this.id,
      slug: this._slug,
      title: this._title,
      description: this._description,
      body: this._body,
      tagList: [...this._tagList],
      authorId: this.authorId,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  // Millisecond clocks can repeat; never let updatedAt stand still or go back.
  private touch(): void {
    const next = Math.max(Date.now(), this._updatedAt.getTime() + 1);
    this._updatedAt = new Date(next);
  }
}

function requireText(field: string, value: string): void {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`, { field });
  }
}

function normalizeTags(tags: string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen].sort();
}
