import { sql } from 'drizzle-orm';
import {
  pgTable,
  serial,
  integer,
  boolean,
  timestamp,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { users } from './user.js';
import { books } from './book.js';

export const OPEN_LOAN_INDEX = 'transactions_open_book_idx';

// Transactions table: the borrow ledger. Availability is derived from the
// open rows here; there is no stored counter to keep in sync.
export const transactions = pgTable(
  'transactions',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    bookId: integer('book_id')
      .notNull()
      .references(() => books.id, { onDelete: 'cascade' }),
    borrowDate: timestamp('borrow_date', { withTimezone: true }).defaultNow().notNull(),
    returnDate: timestamp('return_date', { withTimezone: true }),
    isReturned: boolean('is_returned').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('transactions_user_id_idx').on(table.userId),
    index('transactions_book_id_idx').on(table.bookId),
    index('transactions_borrow_date_idx').on(table.borrowDate),
    // At most one open loan per copy. A borrow that loses a race fails here.
    uniqueIndex(OPEN_LOAN_INDEX).on(table.bookId).where(sql`${table.isReturned} = false`),
    // Open rows have no return date; closed rows always have one.
    check(
      'transactions_return_state',
      sql`(${table.isReturned} AND ${table.returnDate} IS NOT NULL) OR (NOT ${table.isReturned} AND ${table.returnDate} IS NULL)`,
    ),
  ],
);

export type Transaction = typeof transactions.$inferSelect;
export type NewTransaction = typeof transactions.$inferInsert;
