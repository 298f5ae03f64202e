/**
 * backend/src/modules/messages/message.audit.ts
 *
 * Message creation is anonymous and high-volume, so only deletions are audited.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Message } from './message.types';

export function auditMessageDeleted(writer: AuditWriter, message: Message): Promise<void> {
  return writer.append('message.deleted', {
    messageId: message.id,
    inboxId: message.inboxId,
  });
}
