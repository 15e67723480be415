import * as argon2 from 'argon2';
import { and, count, desc, eq, ne } from 'drizzle-orm';
import type {
  ChangePasswordInput,
  Page,
  UpdateUserInput,
  User,
  UserListParamsInput,
  UserProfile,
  UserRole,
} from '@bookledger/shared';
import { db } from '../db/index.js';
import type { Database } from '../db/index.js';
import { transactions, users } from '../db/schema/index.js';
import type { User as UserRow, NewUser } from '../db/schema/index.js';
import { createLogger } from '../utils/logger.js';
import { conflict, notFound, validationError } from '../utils/errors.js';
import { isUniqueViolation } from '../utils/pg-errors.js';
import { isAdmin } from '../utils/permissions.js';

const logger = createLogger('UserService');

export function toUserProfile(row: UserRow): UserProfile {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    fullName: row.fullName,
    role: row.role,
    isActive: row.isActive,
  };
}

export function toUser(row: UserRow): User {
  return {
    ...toUserProfile(row),
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export class UserService {
  constructor(private readonly database: Database) {}

  async listUsers(params: UserListParamsInput): Promise<Page<User>> {
    const where = and(
      params.role ? eq(users.role, params.role) : undefined,
      params.isActive !== undefined ? eq(users.isActive, params.isActive) : undefined,
    );

    const [{ value: total }] = await this.database
      .select({ value: count() })
      .from(users)
      .where(where);

    const rows = await this.database
      .select()
      .from(users)
      .where(where)
      .orderBy(desc(users.createdAt), desc(users.id))
      .limit(params.limit)
      .offset(params.skip);

    return {
      items: rows.map(toUser),
      total: Number(total),
      skip: params.skip,
      limit: params.limit,
    };
  }

  async getUser(userId: number): Promise<User> {
    return toUser(await this._requireUser(userId));
  }

  /**
   * Apply a sparse update. Role-based field filtering happens before this is
   * called, so everything in `updates` is written.
   */
  async updateUser(userId: number, updates: UpdateUserInput): Promise<User> {
    const user = await this._requireUser(userId);

    const patch: Partial<NewUser> = { updatedAt: new Date() };

    if (updates.fullName !== undefined) {
      patch.fullName = updates.fullName;
    }
    if (updates.isActive !== undefined) {
      patch.isActive = updates.isActive;
    }
    if (updates.role !== undefined) {
      patch.role = updates.role;
    }

    if (updates.email !== undefined) {
      const email = updates.email.toLowerCase();
      if (email !== user.email) {
        const [taken] = await this.database
          .select({ id: users.id })
          .from(users)
          .where(and(eq(users.email, email), ne(users.id, userId)))
          .limit(1);
        if (taken) {
          throw conflict(`Email ${email} is already in use`);
        }
        patch.email = email;
      }
    }

    try {
      const [updated] = await this.database
        .update(users)
        .set(patch)
        .where(eq(users.id, userId))
        .returning();

      if (!updated) {
        throw notFound(`User with ID ${userId} not found`);
      }

      return toUser(updated);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw conflict(`Email ${updates.email ?? ''} is already in use`);
      }
      throw err;
    }
  }

  /** Owners must confirm their current password; admins may reset anyone's. */
  async changePassword(
    userId: number,
    input: ChangePasswordInput,
    actor: UserProfile,
  ): Promise<void> {
    const user = await this._requireUser(userId);

    const resetByAdmin = isAdmin(actor) && actor.id !== userId;
    if (!resetByAdmin) {
      if (!input.currentPassword) {
        throw validationError(
          'Current password is required when setting a new password',
          'currentPassword',
        );
      }
      const valid = await argon2.verify(user.passwordHash, input.currentPassword);
      if (!valid) {
        throw validationError('Current password is incorrect', 'currentPassword');
      }
    }

    const passwordHash = await argon2.hash(input.newPassword);
    await this.database
      .update(users)
      .set({ passwordHash, updatedAt: new Date() })
      .where(eq(users.id, userId));

    logger.info(
      { service: 'UserService', userId, actorId: actor.id, resetByAdmin },
      'Password changed',
    );
  }

  async setRole(userId: number, role: UserRole): Promise<User> {
    await this._requireUser(userId);

    const [updated] = await this.database
      .update(users)
      .set({ role, updatedAt: new Date() })
      .where(eq(users.id, userId))
      .returning();

    if (!updated) {
      throw notFound(`User with ID ${userId} not found`);
    }

    logger.info({ service: 'UserService', userId, role }, 'User role changed');

    return toUser(updated);
  }

  /** Refused while the user holds an open loan; closed history goes with the user. */
  async deleteUser(userId: number): Promise<void> {
    await this.database.transaction(async (tx) => {
      const [user] = await tx
        .select({ id: users.id })
        .from(users)
        .where(eq(users.id, userId))
        .for('update');

      if (!user) {
        throw notFound(`User with ID ${userId} not found`);
      }

      const [openLoan] = await tx
        .select({ id: transactions.id })
        .from(transactions)
        .where(and(eq(transactions.userId, userId), eq(transactions.isReturned, false)))
        .limit(1);

      if (openLoan) {
        throw conflict('Cannot delete a user who has books on loan');
      }

      await tx.delete(users).where(eq(users.id, userId));
    });

    logger.info({ service: 'UserService', userId }, 'User deleted');
  }

  private async _requireUser(userId: number): Promise<UserRow> {
    const [user] = await this.database
      .select()
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);

    if (!user) {
      throw notFound(`User with ID ${userId} not found`);
    }

    return user;
  }
}

export const userService = new UserService(db);
