/**
 * Registration, login, current-user profile, and token → user resolution.
 */

import type { IUserRepository } from '../repositories/IUserRepository.js';
import type { TokenService } from './TokenService.js';
import type {
  LoginRequest,
  RegisterRequest,
  UpdateUserRequest,
  UserResponse,
} from '../types/api.js';
import { User, type UserChanges } from '../domain/User.js';
import { hashPassword, verifyPassword } from './passwords.js';
import {
  ConflictError,
  UnauthorizedError,
  ValidationError,
} from '../errors.js';

const MAX_USERNAME_LENGTH = 64;
const MIN_PASSWORD_LENGTH = 8;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class UserService {
  constructor(
    private readonly userRepo: IUserRepository,
    private readonly tokens: TokenService
  ) {}

  async register(input: RegisterRequest): Promise<UserResponse> {
    this.validateEmail(input.email);
    this.validateUsername(input.username);
    this.validatePassword(input.password);

    await this.ensureAvailable(input.email, input.username, null);

    const user = User.create({
      email: input.email,
      username: input.username,
      passwordHash: await hashPassword(input.password),
    });
    await this.userRepo.save(user);

    return this.toResponse(user);
  }

  async login(input: LoginRequest): Promise<UserResponse> {
    const user = await this.userRepo.findByEmail(input.email.trim());

    // Same error for unknown email and wrong password
    if (!user || !(await verifyPassword(input.password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid email or password');
    }

    return this.toResponse(user);
  }

  async getCurrent(user: User): Promise<UserResponse> {
    return this.toResponse(user);
  }

  async update(user: User, input: UpdateUserRequest): Promise<UserResponse> {
    const email = input.email ?? undefined;
    const username = input.username ?? undefined;
    const password = input.password ?? undefined;

    if (email !== undefined) this.validateEmail(email);
    if (username !== undefined) this.validateUsername(username);
    if (password !== undefined) this.validatePassword(password);

    await this.ensureAvailable(email, username, user.id);

    const changes: UserChanges = {
      email,
      username,
      bio: input.bio ?? undefined,
      image: input.image ?? undefined,
    };
    if (password !== undefined) {
      changes.passwordHash = await hashPassword(password);
    }

    user.update(changes);
    await this.userRepo.save(user);

    return this.toResponse(user);
  }

  /**
   * Resolve a raw bearer credential to a user. Null for a missing, invalid or
   * expired token, and for a token whose user no longer exists.
   */
  async authenticate(token: string | null): Promise<User | null> {
    const userId = await this.tokens.validate(token);
    if (!userId) return null;

    return this.userRepo.findById(userId);
  }

  // ── Private ──

  private async toResponse(user: User): Promise<UserResponse> {
    return {
      user: {
        email: user.email,
        token: await this.tokens.issue(user),
        username: user.username,
        bio: user.bio,
        image: user.image,
      },
    };
  }

  private async ensureAvailable(
    email: string | undefined,
    username: string | undefined,
    selfId: string | null
  ): Promise<void> {
    if (email !== undefined) {
      const existing = await this.userRepo.findByEmail(email.trim());
      if (existing && existing.id !== selfId) {
        throw new ConflictError('Email is already registered', { field: 'email' });
      }
    }

    if (username !== undefined) {
      const existing = await this.userRepo.findByUsername(username.trim());
      if (existing && existing.id !== selfId) {
        throw new ConflictError('Username is already taken', { field: 'username' });
      }
    }
  }

  private validateEmail(email: string): void {
    if (!EMAIL_PATTERN.test(email.trim())) {
      throw new ValidationError('email must be a valid email address', { field: 'email' });
    }
  }

  private validateUsername(username: string): void {
    const trimmed = username.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('username is required', { field: 'username' });
    }
    if (trimmed.length > MAX_USERNAME_LENGTH) {
      throw new ValidationError(
        `username must be ${MAX_USERNAME_LENGTH} characters or less`,
        { field: 'username' }
      );
    }
    if (/\s/.test(trimmed)) {
      throw new ValidationError('username must not contain whitespace', { field: 'username' });
    }
  }

  private validatePassword(password: string): void {
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(
        `password must be at least ${MIN_PASSWORD_LENGTH} characters`,
        { field: 'password' }
      );
    }
  }
}
