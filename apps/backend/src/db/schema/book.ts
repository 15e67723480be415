import { sql } from 'drizzle-orm';
import { pgTable, serial, varchar, text, integer, timestamp, index, check } from 'drizzle-orm/pg-core';
import { authors } from './author.js';

// Books table: one row per physical copy. Copies of the same title share an
// ISBN; the ISBN group is the unit availability is computed over.
export const books = pgTable(
  'books',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: 200 }).notNull(),
    isbn: varchar('isbn', { length: 20 }).notNull(),
    publishedYear: integer('published_year'),
    // SET NULL: deleting an author keeps their books in the catalog
    authorId: integer('author_id').references(() => authors.id, { onDelete: 'set null' }),
    description: text('description'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    // ISBN group lookups: availability aggregation and copy locking
    index('books_isbn_idx').on(table.isbn),
    index('books_author_id_idx').on(table.authorId),
    index('books_title_idx').on(table.title),
    check('books_isbn_not_blank', sql`btrim(${table.isbn}) <> ''`),
  ],
);

export type Book = typeof books.$inferSelect;
export type NewBook = typeof books.$inferInsert;
