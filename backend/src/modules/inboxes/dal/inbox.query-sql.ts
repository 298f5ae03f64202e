/**
 * backend/src/modules/inboxes/dal/inbox.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for inboxes.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Lists are ordered by created_at, then id (stable across equal timestamps).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { InboxesTable } from '../../../shared/db/db.schema';

export type InboxRow = Selectable<InboxesTable>;

export async function selectInboxByIdSql(
  db: DbExecutor,
  inboxId: string,
): Promise<InboxRow | undefined> {
  return db.selectFrom('inboxes').selectAll().where('id', '=', inboxId).executeTakeFirst();
}

export async function selectInboxesByUserSql(
  db: DbExecutor,
  userId: string,
): Promise<InboxRow[]> {
  return db
    .selectFrom('inboxes')
    .selectAll()
    .where('user_id', '=', userId)
    .orderBy('created_at', 'asc')
    .orderBy('id', 'asc')
    .execute();
}
