/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - Register takes exactly the fields of POST /users.
 * - Login does not check email format: a malformed email is just "Invalid credentials".
 */

import { z } from 'zod';
import { createUserSchema } from '../users';

export const registerSchema = createUserSchema;

export const loginSchema = z.object({
  email: z
    .string({ required_error: 'Email is required', invalid_type_error: 'Email is required' })
    .trim()
    .min(1, 'Email is required')
    .transform((email) => email.toLowerCase()),
  password: z
    .string({ required_error: 'Password is required', invalid_type_error: 'Password is required' })
    .min(1, 'Password is required'),
});
