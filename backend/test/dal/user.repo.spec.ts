import { afterAll, beforeAll, describe, it, expect } from 'vitest';

import type { Db } from '../../src/shared/db/db';
import { isUniqueViolation } from '../../src/shared/db/pg-errors';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import {
  selectUserByEmailSql,
  selectUserByIdSql,
} from '../../src/modules/users/dal/user.query-sql';
import { InboxRepo } from '../../src/modules/inboxes/dal/inbox.repo';
import { MessageRepo } from '../../src/modules/messages/dal/message.repo';
import { USERS_EMAIL_UNIQUE } from '../../src/modules/users';
import { createTestDb } from '../helpers/build-test-app';

describe('UserRepo', () => {
  let db: Db;
  let users: UserRepo;

  beforeAll(async () => {
    db = await createTestDb();
    users = new UserRepo(db);
  });

  afterAll(async () => {
    await db.destroy();
  });

  it('inserts a user with a lower-cased email and defaults', async () => {
    const row = await users.insertUser({
      username: 'alice',
      email: 'Alice@Example.com',
      passwordHash: 'hash-1',
    });

    expect(row.email).toBe('alice@example.com');
    expect(row.is_active).toBe(true);
    expect(row.created_at).toBeInstanceOf(Date);

    const byEmail = await selectUserByEmailSql(db, 'ALICE@example.COM');
    expect(byEmail?.id).toBe(row.id);
  });

  it('rejects a second user with the same email on users_email_unique', async () => {
    await users.insertUser({ username: 'bob', email: 'bob@example.com', passwordHash: 'h' });

    const err = await users
      .insertUser({ username: 'bob-2', email: 'BOB@example.com', passwordHash: 'h' })
      .then(
        () => null,
        (e: unknown) => e,
      );

    expect(isUniqueViolation(err, USERS_EMAIL_UNIQUE)).toBe(true);
  });

  it('updates only the provided fields', async () => {
    const row = await users.insertUser({
      username: 'carol',
      email: 'carol@example.com',
      passwordHash: 'hash-1',
    });
    const now = new Date('2030-01-01T00:00:00.000Z');

    const updated = await users.updateUser(row.id, { username: 'caroline' }, now);

    expect(updated?.username).toBe('caroline');
    expect(updated?.email).toBe('carol@example.com');
    expect(updated?.password_hash).toBe('hash-1');
    expect(updated?.updated_at.toISOString()).toBe('2030-01-01T00:00:00.000Z');
  });

  it('returns undefined when updating a missing user', async () => {
    const missing = await users.updateUser(
      '3f2b8f7e-8b3c-4a8e-9d55-0c6a2f1b7e10',
      { username: 'x' },
      new Date(),
    );
    expect(missing).toBeUndefined();
  });

  it('deleteUserCascade removes the user, its inboxes and their messages', async () => {
    const owner = await users.insertUser({
      username: 'dave',
      email: 'dave@example.com',
      passwordHash: 'h',
    });
    const other = await users.insertUser({
      username: 'erin',
      email: 'erin@example.com',
      passwordHash: 'h',
    });

    const inboxes = new InboxRepo(db);
    const messages = new MessageRepo(db);

    const i1 = await inboxes.insertInbox({ userId: owner.id, name: 'one' });
    const i2 = await inboxes.insertInbox({ userId: owner.id, name: 'two' });
    const keep = await inboxes.insertInbox({ userId: other.id, name: 'one' });

    await messages.insertMessage({ inboxId: i1.id, subject: 's', body: 'b1' });
    await messages.insertMessage({ inboxId: i1.id, subject: 's', body: 'b2' });
    await messages.insertMessage({ inboxId: i2.id, subject: '', body: 'b3' });
    const kept = await messages.insertMessage({ inboxId: keep.id, subject: '', body: 'b4' });

    const result = await db
      .transaction()
      .execute(async (trx) => users.withDb(trx).deleteUserCascade(owner.id));

    expect(result).toEqual({ deleted: true, inboxes: 2, messages: 3 });
    expect(await selectUserByIdSql(db, owner.id)).toBeUndefined();

    const remaining = await db.selectFrom('messages').select('id').execute();
    expect(remaining.map((r) => r.id)).toContain(kept.id);
    expect(
      await db.selectFrom('inboxes').selectAll().where('user_id', '=', owner.id).execute(),
    ).toEqual([]);
  });

  it('deleteUserCascade reports deleted=false for a missing user', async () => {
    const result = await users.deleteUserCascade('3f2b8f7e-8b3c-4a8e-9d55-0c6a2f1b7e10');
    expect(result).toEqual({ deleted: false, inboxes: 0, messages: 0 });
  });
});
