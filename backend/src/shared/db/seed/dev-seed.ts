/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - a demo user (if missing, matched by email)
 * - one inbox for that user (if missing, matched by name)
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Stores only the bcrypt hash; the plaintext password comes from config.
 * - Writes go straight to the tables (no audit): this is not a user action.
 */

import type { DbExecutor } from '../db';
import type { PasswordHasher } from '../../security/password-hasher';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  username: string;
  email: string;
  password: string;
  inboxName: string;
};

type DevSeedResult = {
  userId: string;
  inboxId: string;
  createdUser: boolean;
  createdInbox: boolean;
};

export async function runDevSeed(opts: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<DevSeedResult> {
  const { db, passwordHasher, options } = opts;

  const flow = 'seed.dev';
  const email = options.email.toLowerCase();

  // Hash before the transaction (bcrypt is slow); unused when the user exists.
  const passwordHash = await passwordHasher.hash(options.password);

  return db.transaction().execute(async (trx) => {
    // 1) Ensure user exists
    const existingUser = await trx
      .selectFrom('users')
      .select(['id'])
      .where('email', '=', email)
      .executeTakeFirst();

    let userId: string;
    const createdUser = !existingUser;

    if (!existingUser) {
      const inserted = await trx
        .insertInto('users')
        .values({
          username: options.username,
          email,
          password_hash: passwordHash,
        })
        .returning(['id'])
        .executeTakeFirstOrThrow();

      userId = inserted.id;
      logger.info('seed.user.created', { flow, userId, username: options.username });
    } else {
      userId = existingUser.id;
      logger.info('seed.user.exists', { flow, userId });
    }

    // 2) Ensure inbox exists
    const existingInbox = await trx
      .selectFrom('inboxes')
      .select(['id'])
      .where('user_id', '=', userId)
      .where('name', '=', options.inboxName)
      .executeTakeFirst();

    if (existingInbox) {
      logger.info('seed.inbox.exists', { flow, inboxId: existingInbox.id });
      return { userId, inboxId: existingInbox.id, createdUser, createdInbox: false };
    }

    const inbox = await trx
      .insertInto('inboxes')
      .values({ user_id: userId, name: options.inboxName })
      .returning(['id'])
      .executeTakeFirstOrThrow();

    logger.info('seed.inbox.created', { flow, inboxId: inbox.id, name: options.inboxName });

    return { userId, inboxId: inbox.id, createdUser, createdInbox: true };
  });
}
