export * from './constants/index.js';

export * from './types/api.js';
export * from './types/auth.js';
export * from './types/author.js';
export * from './types/book.js';
export * from './types/transaction.js';

export * from './validation/common.js';
export * from './validation/auth.js';
export * from './validation/author.js';
export * from './validation/book.js';
export * from './validation/transaction.js';
