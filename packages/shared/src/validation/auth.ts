import { z } from 'zod';
import { USER_ROLES } from '../constants/index.js';
import { pageParamsSchema, queryBoolean } from './common.js';

const username = z
  .string()
  .min(3, 'Username must be at least 3 characters')
  .max(50)
  .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, dots, dashes and underscores');

const password = z.string().min(8, 'Password must be at least 8 characters').max(100);

export const loginSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const registerSchema = z.object({
  username,
  email: z.string().email('Invalid email address').max(254),
  password,
  fullName: z.string().max(200).optional(),
});

export const updateUserSchema = z
  .object({
    email: z.string().email('Invalid email address').max(254).optional(),
    fullName: z.string().max(200).nullable().optional(),
    isActive: z.boolean().optional(),
    role: z.enum(USER_ROLES).optional(),
  })
  .strict();

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1).optional(),
  newPassword: password,
});

export const changeRoleSchema = z.object({
  role: z.enum(USER_ROLES),
});

export const userListParamsSchema = pageParamsSchema.extend({
  role: z.enum(USER_ROLES).optional(),
  isActive: queryBoolean.optional(),
});

export type LoginInput = z.infer<typeof loginSchema>;
export type RegisterInput = z.infer<typeof registerSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
export type UserListParamsInput = z.infer<typeof userListParamsSchema>;
