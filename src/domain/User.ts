/**
 * User entity.
 * The password hash lives here for the repository's sake; no view or
 * response type ever carries it.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors.js';

export interface UserProps {
  id: string;
  email: string;
  username: string;
  passwordHash: string;
  bio: string;
  image: string;
}

export interface NewUser {
  email: string;
  username: string;
  passwordHash: string;
  bio?: string;
  image?: string;
}

export interface UserChanges {
  email?: string;
  username?: string;
  passwordHash?: string;
  bio?: string;
  image?: string;
}

export class User {
  readonly id: string;
  private props: Omit<UserProps, 'id'>;

  private constructor(props: UserProps) {
    const { id, ...rest } = props;
    this.id = id;
    this.props = rest;
  }

  static create(input: NewUser): User {
    requireText('email', input.email);
    requireText('username', input.username);
    requireText('password', input.passwordHash);

    return new User({
      id: randomUUID(),
      email: input.email.trim(),
      username: input.username.trim(),
      passwordHash: input.passwordHash,
      bio: input.bio ?? '',
      image: input.image ?? '',
    });
  }

  static restore(props: UserProps): User {
    return new User({ ...props });
  }

  get email(): string {
    return this.props.email;
  }

  get username(): string {
    return this.props.username;
  }

  get passwordHash(): string {
    return this.props.passwordHash;
  }

  get bio(): string {
    return this.props.bio;
  }

  get image(): string {
    return this.props.image;
  }

  /** Profile update. Only supplied fields change. */
  update(changes: UserChanges): void {
    if (changes.email !== undefined) requireText('email', changes.email);
    if (changes.username !== undefined) requireText('username', changes.username);
    if (changes.passwordHash !== undefined) requireText('password', changes.passwordHash);

    this.props = {
      email: changes.email?.trim() ?? this.props.email,
      username: changes.username?.trim() ?? this.props.username,
      passwordHash: changes.passwordHash ?? this.props.passwordHash,
      bio: changes.bio ?? this.props.bio,
      image: changes.image ?? this.props.image,
    };
  }

  toProps(): UserProps {
    return { id: this.id, ...this.props };
  }
}

function requireText(field: string, value: string): void {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`, { field });
  }
}
