/**
 * Supabase implementation of IUserRepository.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import type { IUserRepository } from './IUserRepository.js';
import type { User } from '../domain/User.js';
import type { FollowRow, UserRow } from '../types/database.js';
import { rowToUser, userToRow } from './mappers.js';
import { ConflictError } from '../errors.js';

const UNIQUE_VIOLATION = '23505';

export class SupabaseUserRepository implements IUserRepository {
  constructor(private readonly db: SupabaseClient) {}

  async save(user: User): Promise<void> {
    const { error } = await this.db
      .from('users')
      .upsert(userToRow(user), { onConflict: 'id' });

    if (error) throw saveError(error);
  }

  async findById(id: string): Promise<User | null> {
    return this.findOneBy('id', id);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOneBy('username', username);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOneBy('email', email);
  }

  async follow(followerId: string, followeeId: string): Promise<void> {
    const row: FollowRow = { follower_id: followerId, followee_id: followeeId };
    const { error } = await this.db
      .from('follows')
      .upsert(row, { onConflict: 'follower_id,followee_id', ignoreDuplicates: true });

    if (error) throw new Error(`Failed to follow user: ${error.message}`);
  }

  async unfollow(followerId: string, followeeId: string): Promise<void> {
    const { error } = await this.db
      .from('follows')
      .delete()
      .eq('follower_id', followerId)
      .eq('followee_id', followeeId);

    if (error) throw new Error(`Failed to unfollow user: ${error.message}`);
  }

  async isFollowing(followerId: string, followeeId: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('follows')
      .select('*', { count: 'exact', head: true })
      .eq('follower_id', followerId)
      .eq('followee_id', followeeId);

    if (error) throw new Error(`Failed to check follow: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async followingIds(followerId: string): Promise<string[]> {
    const { data, error } = await this.db
      .from('follows')
      .select('followee_id')
      .eq('follower_id', followerId);

    if (error) throw new Error(`Failed to list follows: ${error.message}`);
    return ((data ?? []) as Pick<FollowRow, 'followee_id'>[]).map((r) => r.followee_id);
  }

  private async findOneBy(column: 'id' | 'username' | 'email', value: string): Promise<User | null> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .eq(column, value)
      .maybeSingle();

    if (error) throw new Error(`Failed to find user by ${column}: ${error.message}`);
    return data ? rowToUser(data as UserRow) : null;
  }
}

// A registration racing another for the same email or username gets past the
// service's availability check and lands here.
function saveError(error: PostgrestError): Error {
  if (error.code !== UNIQUE_VIOLATION) {
    return new Error(`Failed to save user: ${error.message}`);
  }
  return /users_username_key/.test(error.message)
    ? new ConflictError('Username is already taken', { field: 'username' })
    : new ConflictError('Email is already registered', { field: 'email' });
}
