/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Read-only and side-effect free.
 * - Shape DB rows into Users domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserByEmailSql, selectUserByIdSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User, UserCredentials } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  return row ? toUser(row) : undefined;
}

export async function getUserCredentialsByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;

  return { user: toUser(row), passwordHash: row.password_hash };
}
