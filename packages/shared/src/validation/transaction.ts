import { z } from 'zod';
import { idSchema, isoDateSchema, pageParamsSchema, queryBoolean } from './common.js';

export const borrowSchema = z.object({
  userId: z.number().int().positive().optional(),
  bookId: z.number().int().positive(),
  borrowDate: isoDateSchema.optional(),
});

export const updateTransactionSchema = z
  .object({
    borrowDate: isoDateSchema.optional(),
    returnDate: isoDateSchema.nullable().optional(),
    isReturned: z.boolean().optional(),
  })
  .strict()
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  });

export const transactionListParamsSchema = pageParamsSchema.extend({
  isReturned: queryBoolean.optional(),
});

export const userIdParamsSchema = z.object({
  userId: idSchema,
});

export const bookIdParamsSchema = z.object({
  bookId: idSchema,
});

export type BorrowInput = z.infer<typeof borrowSchema>;
export type UpdateTransactionInput = z.infer<typeof updateTransactionSchema>;
export type TransactionListParamsInput = z.infer<typeof transactionListParamsSchema>;
