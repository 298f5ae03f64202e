/**
 * backend/src/modules/inboxes/queries/inbox.queries.ts
 *
 * WHY:
 * - Shape inbox rows into domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectInboxByIdSql, selectInboxesByUserSql } from '../dal/inbox.query-sql';
import type { InboxRow } from '../dal/inbox.query-sql';
import type { Inbox } from '../inbox.types';

export function toInbox(row: InboxRow): Inbox {
  return {
    id: row.id,
    name: row.name,
    userId: row.user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getInboxById(db: DbExecutor, inboxId: string): Promise<Inbox | undefined> {
  const row = await selectInboxByIdSql(db, inboxId);
  return row ? toInbox(row) : undefined;
}

export async function listInboxesForUser(db: DbExecutor, userId: string): Promise<Inbox[]> {
  const rows = await selectInboxesByUserSql(db, userId);
  return rows.map(toInbox);
}
