/**
 * backend/src/modules/messages/dal/message.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for messages.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { MessageRow } from './message.query-sql';

export class MessageRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): MessageRepo {
    return new MessageRepo(db);
  }

  async insertMessage(params: {
    inboxId: string;
    subject: string;
    body: string;
  }): Promise<MessageRow> {
    return this.db
      .insertInto('messages')
      .values({
        inbox_id: params.inboxId,
        subject: params.subject,
        body: params.body,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async setRead(messageId: string, read: boolean, now: Date): Promise<MessageRow | undefined> {
    return this.db
      .updateTable('messages')
      .set({ is_read: read, updated_at: now })
      .where('id', '=', messageId)
      .returningAll()
      .executeTakeFirst();
  }

  async deleteMessage(messageId: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom('messages')
      .where('id', '=', messageId)
      .executeTakeFirst();
    return Number(result.numDeletedRows) > 0;
  }
}
