/**
 * backend/src/modules/inboxes/inbox.audit.ts
 *
 * Typed audit helpers for the Inboxes module (one action per function).
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Inbox } from './inbox.types';

export function auditInboxCreated(writer: AuditWriter, inbox: Inbox): Promise<void> {
  return writer.append('inbox.created', {
    inboxId: inbox.id,
    ownerId: inbox.userId,
    name: inbox.name,
  });
}

export function auditInboxUpdated(
  writer: AuditWriter,
  data: { inboxId: string; previousName: string; name: string },
): Promise<void> {
  return writer.append('inbox.updated', data);
}

export function auditInboxDeleted(
  writer: AuditWriter,
  data: { inboxId: string; ownerId: string; messages: number },
): Promise<void> {
  return writer.append('inbox.deleted', data);
}
