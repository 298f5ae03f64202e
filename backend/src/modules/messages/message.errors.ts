/**
 * backend/src/modules/messages/message.errors.ts
 *
 * Messages module error factories. Ownership failures come from the inbox policy.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MessageErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Message not found', meta);
  },
} as const;
