/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Also reused by POST /register (same fields).
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Messages name the missing field; the first one becomes the 400 message.
 * - Emails are trimmed and lower-cased here so every write stores one spelling.
 */

import { z } from 'zod';

function requiredText(message: string) {
  return z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message);
}

export const usernameField = requiredText('Username is required').max(
  100,
  'Username is too long',
);

export const emailField = requiredText('Email is required')
  .email('Invalid email address')
  .transform((email) => email.toLowerCase());

// Passwords are not trimmed: whitespace is part of the secret.
export const passwordField = z
  .string({ required_error: 'Password is required', invalid_type_error: 'Password is required' })
  .min(1, 'Password is required');

export const createUserSchema = z.object({
  username: usernameField,
  email: emailField,
  password: passwordField,
});

export const updateUserSchema = z
  .object({
    username: usernameField.optional(),
    email: emailField.optional(),
    password: passwordField.optional(),
  })
  .refine(
    (body) =>
      body.username !== undefined || body.email !== undefined || body.password !== undefined,
    { message: 'At least one of username, email or password is required' },
  );
