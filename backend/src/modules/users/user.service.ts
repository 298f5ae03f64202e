/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates user CRUD.
 * - Only place in the users module allowed to start transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Passwords are hashed before the transaction opens (bcrypt is slow; keep tx short).
 * - Duplicate emails are detected by the unique index, never by a prior lookup.
 * - Audit meaningful actions inside the same transaction.
 * - Deleting a user revokes every session of that user after the commit.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { AuditContext } from '../../shared/audit/audit.types';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { SessionStore } from '../../shared/session/session.store';
import type { Identity } from '../../shared/http/require-auth-context';
import { AppError } from '../../shared/http/errors';
import { isUniqueViolation } from '../../shared/db/pg-errors';

import type { UserRepo, UserPatch } from './dal/user.repo';
import { getUserById, toUser } from './queries/user.queries';
import { UserErrors } from './user.errors';
import { auditUserCreated, auditUserDeleted, auditUserUpdated } from './user.audit';
import type { CreateUserInput, User, UserUpdate } from './user.types';

export const USERS_EMAIL_UNIQUE = 'users_email_unique';

const USER_UPDATE_FIELDS = ['username', 'email', 'password'] as const;

export type UserWriteParams<T> = T & {
  audit: AuditContext;
  caller: Identity | null;
};

export class UserService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      passwordHasher: PasswordHasher;
      userRepo: UserRepo;
      auditRepo: AuditRepo;
      sessionStore: SessionStore;
      requireSelf: boolean;
    },
  ) {}

  async getUser(userId: string): Promise<User> {
    const user = await getUserById(this.deps.db, userId);
    if (!user) throw UserErrors.notFound({ userId });
    return user;
  }

  async createUser(params: CreateUserInput & { audit: AuditContext }): Promise<User> {
    const passwordHash = await this.deps.passwordHasher.hash(params.password);

    this.deps.logger.info({
      msg: 'users.create.start',
      flow: 'users.create',
      requestId: params.audit.requestId,
    });

    const user = await this.withDuplicateEmailMapping(() =>
      this.deps.db.transaction().execute(async (trx) => {
        const row = await this.deps.userRepo.withDb(trx).insertUser({
          username: params.username,
          email: params.email,
          passwordHash,
        });
        const created = toUser(row);

        const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), params.audit);
        await auditUserCreated(audit, created);

        return created;
      }),
    );

    this.deps.logger.info({
      msg: 'users.create.success',
      flow: 'users.create',
      requestId: params.audit.requestId,
      userId: user.id,
    });

    return user;
  }

  async updateUser(params: UserWriteParams<{ userId: string; update: UserUpdate }>): Promise<User> {
    const { userId, update } = params;

    const patch: UserPatch = {
      username: update.username,
      email: update.email,
      passwordHash:
        update.password !== undefined
          ? await this.deps.passwordHasher.hash(update.password)
          : undefined,
    };

    const user = await this.withDuplicateEmailMapping(() =>
      this.deps.db.transaction().execute(async (trx) => {
        const existing = await getUserById(trx, userId);
        if (!existing) throw UserErrors.notFound({ userId });
        this.assertMayModify(params.caller, userId);

        const row = await this.deps.userRepo.withDb(trx).updateUser(userId, patch, new Date());
        if (!row) throw UserErrors.notFound({ userId });
        const updated = toUser(row);

        const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), params.audit);
        await auditUserUpdated(audit, {
          userId,
          fields: USER_UPDATE_FIELDS.filter((field) => update[field] !== undefined),
        });

        return updated;
      }),
    );

    this.deps.logger.info({
      msg: 'users.update.success',
      flow: 'users.update',
      requestId: params.audit.requestId,
      userId,
    });

    return user;
  }

  async deleteUser(params: UserWriteParams<{ userId: string }>): Promise<void> {
    const { userId } = params;

    const result = await this.deps.db.transaction().execute(async (trx) => {
      const existing = await getUserById(trx, userId);
      if (!existing) throw UserErrors.notFound({ userId });
      this.assertMayModify(params.caller, userId);

      const removed = await this.deps.userRepo.withDb(trx).deleteUserCascade(userId);
      if (!removed.deleted) throw UserErrors.notFound({ userId });

      const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), params.audit);
      await auditUserDeleted(audit, {
        userId,
        email: existing.email,
        inboxes: removed.inboxes,
        messages: removed.messages,
      });

      return removed;
    });

    await this.deps.sessionStore.destroyAllForUser(userId);

    this.deps.logger.info({
      msg: 'users.delete.success',
      flow: 'users.delete',
      requestId: params.audit.requestId,
      userId,
      inboxes: result.inboxes,
      messages: result.messages,
    });
  }

  /**
   * Off by default (any caller may modify any user).
   * With requireSelf: no session -> 401 UNAUTHENTICATED, someone else -> 401 UNAUTHORIZED.
   */
  private assertMayModify(caller: Identity | null, userId: string): void {
    if (!this.deps.requireSelf) return;
    if (!caller) throw AppError.unauthenticated();
    if (caller.userId !== userId) throw UserErrors.notSelf({ userId });
  }

  private async withDuplicateEmailMapping<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (isUniqueViolation(err, USERS_EMAIL_UNIQUE)) throw UserErrors.duplicateEmail();
      throw err;
    }
  }
}
