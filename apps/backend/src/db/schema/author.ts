import { pgTable, serial, varchar, text, date, timestamp, index } from 'drizzle-orm/pg-core';

export const authors = pgTable(
  'authors',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 200 }).notNull(),
    // Optional, but unique when present (NULLs never collide)
    email: varchar('email', { length: 254 }).unique(),
    bio: text('bio'),
    birthDate: date('birth_date', { mode: 'string' }),
    nationality: varchar('nationality', { length: 100 }),
    website: varchar('website', { length: 500 }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('authors_name_idx').on(table.name),
    index('authors_nationality_idx').on(table.nationality),
  ],
);

export type Author = typeof authors.$inferSelect;
export type NewAuthor = typeof authors.$inferInsert;
