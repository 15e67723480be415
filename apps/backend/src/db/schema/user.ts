import { sql } from 'drizzle-orm';
import { pgTable, serial, varchar, text, boolean, timestamp, index, check } from 'drizzle-orm/pg-core';
import { USER_ROLES } from '@bookledger/shared';

// Users table: library members and staff.
// ON DELETE: a user's transactions cascade; the service refuses deletion while
// the user still holds an open loan.
export const users = pgTable(
  'users',
  {
    id: serial('id').primaryKey(),
    username: varchar('username', { length: 50 }).notNull().unique(),
    // Stored lower-cased
    email: varchar('email', { length: 254 }).notNull().unique(),
    fullName: varchar('full_name', { length: 200 }),
    passwordHash: text('password_hash').notNull(),
    role: varchar('role', { length: 20, enum: USER_ROLES }).notNull().default('regular'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    // Admin user listing filters
    index('users_role_idx').on(table.role),
    index('users_is_active_idx').on(table.isActive),
    check('users_role_check', sql`${table.role} IN ('admin', 'regular')`),
  ],
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
