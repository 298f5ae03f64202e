/**
 * backend/src/modules/inboxes/dal/inbox.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for inboxes.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError: unique violations propagate; the service maps them.
 * - Supports withDb() for transaction binding.
 * - Deleting an inbox locks it FOR UPDATE, then deletes its messages first
 *   (FK is ON DELETE RESTRICT). Call inside a transaction.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { InboxRow } from './inbox.query-sql';

export class InboxRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): InboxRepo {
    return new InboxRepo(db);
  }

  async insertInbox(params: { userId: string; name: string }): Promise<InboxRow> {
    return this.db
      .insertInto('inboxes')
      .values({
        user_id: params.userId,
        name: params.name,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async renameInbox(inboxId: string, name: string, now: Date): Promise<InboxRow | undefined> {
    return this.db
      .updateTable('inboxes')
      .set({ name, updated_at: now })
      .where('id', '=', inboxId)
      .returningAll()
      .executeTakeFirst();
  }

  async deleteInboxCascade(inboxId: string): Promise<{ deleted: boolean; messages: number }> {
    // Blocks concurrent message posts (their FK check) until commit.
    await this.db.selectFrom('inboxes').select('id').where('id', '=', inboxId).forUpdate().execute();

    const messages = await this.db
      .deleteFrom('messages')
      .where('inbox_id', '=', inboxId)
      .executeTakeFirst();

    const inbox = await this.db.deleteFrom('inboxes').where('id', '=', inboxId).executeTakeFirst();

    return {
      deleted: Number(inbox.numDeletedRows) > 0,
      messages: Number(messages.numDeletedRows),
    };
  }
}
