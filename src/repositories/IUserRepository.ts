/**
 * User data access interface. Also owns the follow relation.
 */

import type { User } from '../domain/User.js';

export interface IUserRepository {
  /** Insert or update the user. */
  save(user: User): Promise<void>;

  findById(id: string): Promise<User | null>;

  findByUsername(username: string): Promise<User | null>;

  findByEmail(email: string): Promise<User | null>;

  /** Idempotent: following twice is not an error. */
  follow(followerId: string, followeeId: string): Promise<void>;

  unfollow(followerId: string, followeeId: string): Promise<void>;

  isFollowing(followerId: string, followeeId: string): Promise<boolean>;

  /** IDs of every user the follower follows. */
  followingIds(followerId: string): Promise<string[]>;
}
