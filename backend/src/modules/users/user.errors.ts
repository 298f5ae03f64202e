/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  /** The unique index on users.email rejected the write. */
  duplicateEmail(meta?: AppErrorMeta) {
    return AppError.badRequest('DUPLICATE_EMAIL', 'Email already exists', meta);
  },

  /** USERS_REQUIRE_SELF: caller is signed in as someone else. */
  notSelf(meta?: AppErrorMeta) {
    return AppError.unauthorized('Unauthorized', meta);
  },
} as const;
