/**
 * backend/src/modules/inboxes/inbox.errors.ts
 *
 * WHY:
 * - Inboxes module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Existence is reported before ownership: a missing inbox is 404 for everyone.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const InboxErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Inbox not found', meta);
  },

  /** The unique constraint on (user_id, name) rejected the write. */
  duplicateName(meta?: AppErrorMeta) {
    return AppError.badRequest('DUPLICATE_NAME', 'Inbox already exists', meta);
  },

  /** Signed in, but the inbox (or the message's inbox) belongs to someone else. */
  notOwner(meta?: AppErrorMeta) {
    return AppError.unauthorized('Unauthorized', meta);
  },
} as const;
