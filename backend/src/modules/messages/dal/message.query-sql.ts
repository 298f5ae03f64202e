/**
 * backend/src/modules/messages/dal/message.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for messages.
 *
 * RULES:
 * - No AppError.
 * - Lists are ordered by created_at, then id.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MessagesTable } from '../../../shared/db/db.schema';

export type MessageRow = Selectable<MessagesTable>;

export async function selectMessageByIdSql(
  db: DbExecutor,
  messageId: string,
): Promise<MessageRow | undefined> {
  return db.selectFrom('messages').selectAll().where('id', '=', messageId).executeTakeFirst();
}

export async function selectMessagesByInboxSql(
  db: DbExecutor,
  inboxId: string,
): Promise<MessageRow[]> {
  return db
    .selectFrom('messages')
    .selectAll()
    .where('inbox_id', '=', inboxId)
    .orderBy('created_at', 'asc')
    .orderBy('id', 'asc')
    .execute();
}
