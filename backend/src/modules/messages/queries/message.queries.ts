/**
 * backend/src/modules/messages/queries/message.queries.ts
 *
 * Read-only; shapes message rows into domain types. No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectMessageByIdSql, selectMessagesByInboxSql } from '../dal/message.query-sql';
import type { MessageRow } from '../dal/message.query-sql';
import type { Message } from '../message.types';

export function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    inboxId: row.inbox_id,
    subject: row.subject,
    body: row.body,
    read: row.is_read,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getMessageById(
  db: DbExecutor,
  messageId: string,
): Promise<Message | undefined> {
  const row = await selectMessageByIdSql(db, messageId);
  return row ? toMessage(row) : undefined;
}

export async function listMessagesForInbox(db: DbExecutor, inboxId: string): Promise<Message[]> {
  const rows = await selectMessagesByInboxSql(db, inboxId);
  return rows.map(toMessage);
}
