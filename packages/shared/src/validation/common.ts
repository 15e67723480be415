import { z } from 'zod';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../constants/index.js';

// Query strings arrive as text; z.coerce.boolean() would turn "false" into true.
export const queryBoolean = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const idSchema = z.coerce.number().int().positive();

export const idParamsSchema = z.object({
  id: idSchema,
});

export const pageParamsSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export const isoDateSchema = z
  .string()
  .datetime({ offset: true, message: 'Expected an ISO 8601 date-time' })
  .transform((value) => new Date(value));

export type PageParamsInput = z.infer<typeof pageParamsSchema>;
