// Re-export all schema tables for the db module and the Drizzle relational query builder.
export * from './user.js';
export * from './author.js';
export * from './book.js';
export * from './transaction.js';
