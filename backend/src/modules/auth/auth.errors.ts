/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: error messages never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, hashes, or session ids in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: unknown email, inactive account or wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.badRequest('INVALID_CREDENTIALS', 'Invalid credentials', meta);
  },

  /** Register: the caller already holds a valid session. */
  alreadyAuthenticated(meta?: AppErrorMeta) {
    return AppError.badRequest('ALREADY_AUTHENTICATED', 'Already logged in', meta);
  },

  /** Session points at a user that no longer exists. */
  accountGone(meta?: AppErrorMeta) {
    return AppError.unauthenticated('Authentication required', meta);
  },
} as const;
