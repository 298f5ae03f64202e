/**
 * backend/src/modules/users/user.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Users module.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - Never include passwords or hashes in metadata (only which fields changed).
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { User } from './user.types';

export function auditUserCreated(writer: AuditWriter, user: User): Promise<void> {
  return writer.append('user.created', {
    userId: user.id,
    email: user.email,
  });
}

export function auditUserUpdated(
  writer: AuditWriter,
  data: { userId: string; fields: string[] },
): Promise<void> {
  return writer.append('user.updated', {
    userId: data.userId,
    fields: data.fields,
  });
}

export function auditUserDeleted(
  writer: AuditWriter,
  data: { userId: string; email: string; inboxes: number; messages: number },
): Promise<void> {
  return writer.append('user.deleted', data);
}
