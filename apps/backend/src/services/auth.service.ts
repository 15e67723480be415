import * as argon2 from 'argon2';
import { eq, or } from 'drizzle-orm';
import type { RegisterInput, UserProfile } from '@bookledger/shared';
import { config } from '../config/index.js';
import { db } from '../db/index.js';
import type { Database } from '../db/index.js';
import { users } from '../db/schema/index.js';
import { createLogger } from '../utils/logger.js';
import { conflict, unauthorized } from '../utils/errors.js';
import { isUniqueViolation } from '../utils/pg-errors.js';
import { toUserProfile } from './user.service.js';

const logger = createLogger('AuthService');

const SESSION_TOKEN = /^(\d+)\.(\d+)$/;

export class AuthService {
  constructor(
    private readonly database: Database,
    private readonly sessionTtlMs: number = config.sessionTtlMinutes * 60_000,
  ) {}

  /** Self-service sign-up. Always creates a regular account. */
  async register(input: RegisterInput): Promise<UserProfile> {
    return this.createUser(input, 'regular');
  }

  async createUser(input: RegisterInput, role: UserProfile['role']): Promise<UserProfile> {
    const email = input.email.toLowerCase();

    const [existing] = await this.database
      .select({ username: users.username, email: users.email })
      .from(users)
      .where(or(eq(users.username, input.username), eq(users.email, email)))
      .limit(1);

    if (existing) {
      throw existing.username === input.username
        ? conflict(`Username ${input.username} is already taken`)
        : conflict(`A user with email ${email} already exists`);
    }

    const passwordHash = await argon2.hash(input.password);

    try {
      const [created] = await this.database
        .insert(users)
        .values({
          username: input.username,
          email,
          fullName: input.fullName ?? null,
          passwordHash,
          role,
        })
        .returning();

      logger.info(
        { service: 'AuthService', userId: created.id, role },
        'User created',
      );

      return toUserProfile(created);
    } catch (err) {
      // Lost a race against a concurrent sign-up with the same name or email
      if (isUniqueViolation(err)) {
        throw conflict('Username or email is already in use');
      }
      throw err;
    }
  }

  async authenticate(username: string, password: string): Promise<UserProfile> {
    const [user] = await this.database
      .select()
      .from(users)
      .where(eq(users.username, username))
      .limit(1);

    if (!user) {
      // Consistent timing, still hash to avoid user enumeration
      await argon2.hash(password);
      throw unauthorized('Invalid username or password');
    }

    const valid = await argon2.verify(user.passwordHash, password);
    if (!valid) {
      throw unauthorized('Invalid username or password');
    }

    if (!user.isActive) {
      logger.warn({ service: 'AuthService', userId: user.id }, 'Login attempt on inactive account');
      throw unauthorized('Account is inactive');
    }

    return toUserProfile(user);
  }

  /** Cookie value for a new session: `<userId>.<issuedAtMs>`. The cookie signature covers both. */
  createSessionToken(userId: number, issuedAt: number = Date.now()): string {
    return `${userId}.${issuedAt}`;
  }

  async validateSession(sessionToken: string, now: number = Date.now()): Promise<UserProfile> {
    const match = SESSION_TOKEN.exec(sessionToken);
    if (!match) {
      throw unauthorized('Session is invalid or expired');
    }

    const userId = Number(match[1]);
    const issuedAt = Number(match[2]);
    if (userId <= 0 || issuedAt > now || now - issuedAt >= this.sessionTtlMs) {
      throw unauthorized('Session is invalid or expired');
    }

    const [user] = await this.database
      .select()
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);

    if (!user || !user.isActive) {
      throw unauthorized('Session is invalid or expired');
    }

    return toUserProfile(user);
  }
}

export const authService = new AuthService(db);
