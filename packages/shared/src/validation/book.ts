import { z } from 'zod';
import { MAX_COPIES_PER_REQUEST } from '../constants/index.js';
import { idSchema, pageParamsSchema, queryBoolean } from './common.js';

const MIN_PUBLISHED_YEAR = 1000;

// Copies of one title share an ISBN, so it is required but not unique.
export const isbnSchema = z
  .string()
  .trim()
  .min(1, 'ISBN is required')
  .max(20, 'ISBN must be at most 20 characters');

const bookFields = {
  title: z.string().trim().min(1, 'Title is required').max(200),
  isbn: isbnSchema,
  publishedYear: z
    .number()
    .int()
    .min(MIN_PUBLISHED_YEAR)
    .max(new Date().getFullYear() + 1)
    .nullable()
    .optional(),
  authorId: z.number().int().positive().nullable().optional(),
  description: z.string().max(1000).nullable().optional(),
};

export const createBookSchema = z.object({
  ...bookFields,
  copies: z.number().int().min(1).max(MAX_COPIES_PER_REQUEST).default(1),
});

export const updateBookSchema = z
  .object({
    ...bookFields,
    title: bookFields.title.optional(),
    isbn: bookFields.isbn.optional(),
  })
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  });

export const bookListParamsSchema = pageParamsSchema.extend({
  search: z.string().trim().min(1).max(200).optional(),
  authorId: idSchema.optional(),
  availableOnly: queryBoolean.default('false'),
});

export const isbnParamsSchema = z.object({
  isbn: isbnSchema,
});

export type CreateBookInput = z.infer<typeof createBookSchema>;
export type UpdateBookInput = z.infer<typeof updateBookSchema>;
export type BookListParamsInput = z.infer<typeof bookListParamsSchema>;
