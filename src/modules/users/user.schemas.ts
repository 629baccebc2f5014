/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Request validation for admin user management.
 *
 * RULES:
 * - Text fields are trimmed; the password is not.
 * - role defaults to operator.
 */

import { z } from 'zod';
import { USER_ROLES, USER_UNITS } from './user.types';

export const MIN_PASSWORD_LENGTH = 4;

export const createUserSchema = z.object({
  username: z
    .string({ required_error: 'All fields are required' })
    .trim()
    .min(1, 'All fields are required')
    .max(100, 'Username must be at most 100 characters'),
  password: z
    .string({ required_error: 'All fields are required' })
    .min(1, 'All fields are required')
    .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`)
    .max(200, 'Password must be at most 200 characters'),
  fullName: z
    .string({ required_error: 'All fields are required' })
    .trim()
    .min(1, 'All fields are required')
    .max(200, 'Full name must be at most 200 characters'),
  unit: z.enum(USER_UNITS, {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined || ctx.data === '' ? 'All fields are required' : 'invalid unit',
    }),
  }),
  role: z.enum(USER_ROLES, { errorMap: () => ({ message: 'invalid role' }) }).default('operator'),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;

export const setUserActiveSchema = z.object({
  isActive: z.boolean({ required_error: 'isActive is required' }),
});

export const userIdParamsSchema = z.object({
  id: z.string().uuid(),
});
