import type { UpdateUserInput, UserProfile, UserRole } from '@bookledger/shared';
import { forbidden } from './errors.js';

/**
 * Copy only the allowed keys of a sparse update. Keys outside the list are
 * dropped rather than rejected, so a regular user sending `role` simply has
 * it ignored.
 */
export function pickAllowedFields<T extends object>(
  input: T,
  allowed: ReadonlyArray<keyof T>,
): Partial<T> {
  const result: Partial<T> = {};
  for (const key of allowed) {
    if (input[key] !== undefined) {
      result[key] = input[key];
    }
  }
  return result;
}

const USER_UPDATE_FIELDS: Record<UserRole, ReadonlyArray<keyof UpdateUserInput>> = {
  admin: ['email', 'fullName', 'isActive', 'role'],
  regular: ['email', 'fullName'],
};

export function filterUserUpdate(actor: UserProfile, input: UpdateUserInput): UpdateUserInput {
  return pickAllowedFields(input, USER_UPDATE_FIELDS[actor.role]);
}

export function isAdmin(actor: UserProfile): boolean {
  return actor.role === 'admin';
}

export function assertSelfOrAdmin(actor: UserProfile, ownerId: number, message: string): void {
  if (actor.id !== ownerId && !isAdmin(actor)) {
    throw forbidden(message);
  }
}
