import { z } from 'zod';
import { pageParamsSchema } from './common.js';

const authorFields = {
  name: z.string().trim().min(1, 'Name is required').max(200),
  email: z.string().email('Invalid email address').max(254).nullable().optional(),
  bio: z.string().max(2000).nullable().optional(),
  // Calendar date, e.g. 1950-04-12
  birthDate: z
    .string()
    .date('Expected a date in YYYY-MM-DD format')
    .nullable()
    .optional(),
  nationality: z.string().max(100).nullable().optional(),
  website: z.string().url('Invalid URL').max(500).nullable().optional(),
};

export const createAuthorSchema = z.object(authorFields);

export const updateAuthorSchema = z
  .object({
    ...authorFields,
    name: authorFields.name.optional(),
  })
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  });

export const authorListParamsSchema = pageParamsSchema.extend({
  search: z.string().trim().min(1).max(200).optional(),
  nationality: z.string().trim().min(1).max(100).optional(),
});

export type CreateAuthorInput = z.infer<typeof createAuthorSchema>;
export type UpdateAuthorInput = z.infer<typeof updateAuthorSchema>;
export type AuthorListParamsInput = z.infer<typeof authorListParamsSchema>;
