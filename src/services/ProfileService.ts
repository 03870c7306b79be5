/**
 * Public profiles and the follow relation.
 */

import type { IUserRepository } from '../repositories/IUserRepository.js';
import type { ArticleQueryService } from './ArticleQueryService.js';
import type { User } from '../domain/User.js';
import type { ProfileResponse } from '../types/api.js';
import { NotFoundError, ValidationError } from '../errors.js';

export class ProfileService {
  constructor(
    private readonly userRepo: IUserRepository,
    private readonly queries: ArticleQueryService
  ) {}

  async getProfile(username: string, viewer: User | null): Promise<ProfileResponse> {
    const user = await this.requireUser(username);
    return { profile: await this.queries.toProfileView(user, viewer) };
  }

  async follow(username: string, follower: User): Promise<ProfileResponse> {
    const target = await this.requireUser(username);
    if (target.id === follower.id) {
      throw new ValidationError('You cannot follow yourself');
    }

    await this.userRepo.follow(follower.id, target.id);
    return { profile: await this.queries.toProfileView(target, follower) };
  }

  async unfollow(username: string, follower: User): Promise<ProfileResponse> {
    const target = await this.requireUser(username);

    await this.userRepo.unfollow(follower.id, target.id);
    return { profile: await this.queries.toProfileView(target, follower) };
  }

  private async requireUser(username: string): Promise<User> {
    const user = await this.userRepo.findByUsername(username);
    if (!user) {
      throw new NotFoundError(`Profile "${username}" not found`);
    }
    return user;
  }
}
