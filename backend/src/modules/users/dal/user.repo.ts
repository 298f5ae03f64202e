/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError: unique violations propagate; the service maps them.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - Deleting a user deletes its inboxes and their messages first
 *   (FKs are ON DELETE RESTRICT). Call inside a transaction: the parent rows are
 *   locked FOR UPDATE first.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.query-sql';

export type UserPatch = {
  username?: string;
  email?: string;
  passwordHash?: string;
};

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user. Email must be globally unique (enforced by users_email_unique).
   */
  async insertUser(params: {
    username: string;
    email: string;
    passwordHash: string;
  }): Promise<UserRow> {
    return this.db
      .insertInto('users')
      .values({
        username: params.username,
        email: params.email.toLowerCase(),
        password_hash: params.passwordHash,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Applies only the provided fields. Returns undefined when the user does not exist.
   */
  async updateUser(userId: string, patch: UserPatch, now: Date): Promise<UserRow | undefined> {
    return this.db
      .updateTable('users')
      .set({
        ...(patch.username !== undefined ? { username: patch.username } : {}),
        ...(patch.email !== undefined ? { email: patch.email.toLowerCase() } : {}),
        ...(patch.passwordHash !== undefined ? { password_hash: patch.passwordHash } : {}),
        updated_at: now,
      })
      .where('id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }

  async deleteUserCascade(
    userId: string,
  ): Promise<{ deleted: boolean; inboxes: number; messages: number }> {
    // Row locks block new inboxes (FK on users) and new messages (FK on inboxes)
    // until commit, so no child can appear between the deletes below.
    await this.db.selectFrom('users').select('id').where('id', '=', userId).forUpdate().execute();
    await this.db
      .selectFrom('inboxes')
      .select('id')
      .where('user_id', '=', userId)
      .forUpdate()
      .execute();

    const messages = await this.db
      .deleteFrom('messages')
      .where('inbox_id', 'in', (qb) =>
        qb.selectFrom('inboxes').select('inboxes.id').where('inboxes.user_id', '=', userId),
      )
      .executeTakeFirst();

    const inboxes = await this.db
      .deleteFrom('inboxes')
      .where('user_id', '=', userId)
      .executeTakeFirst();

    const user = await this.db.deleteFrom('users').where('id', '=', userId).executeTakeFirst();

    return {
      deleted: Number(user.numDeletedRows) > 0,
      inboxes: Number(inboxes.numDeletedRows),
      messages: Number(messages.numDeletedRows),
    };
  }
}
