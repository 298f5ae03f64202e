/**
 * backend/src/modules/inboxes/inbox.service.ts
 *
 * WHY:
 * - Orchestrates inbox CRUD and the ownership check in front of it.
 * - Only place in the inboxes module allowed to start transactions.
 *
 * RULES:
 * - Existence before ownership: load, 404 if missing, then authorize.
 * - Duplicate names are detected by the (user_id, name) constraint, never by a prior lookup.
 * - Code inside a transaction uses `trx` only.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { AuditContext } from '../../shared/audit/audit.types';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Identity } from '../../shared/http/require-auth-context';
import { isUniqueViolation } from '../../shared/db/pg-errors';

import { getUserById, UserErrors } from '../users';

import type { InboxRepo } from './dal/inbox.repo';
import { getInboxById, listInboxesForUser, toInbox } from './queries/inbox.queries';
import { assertAuthorized } from './policies/inbox-access.policy';
import { InboxErrors } from './inbox.errors';
import { auditInboxCreated, auditInboxDeleted, auditInboxUpdated } from './inbox.audit';
import type { Inbox } from './inbox.types';

export const INBOXES_USER_NAME_UNIQUE = 'inboxes_user_name_unique';

/**
 * Loads an inbox and checks that `identity` owns it.
 * 404 when missing (for everyone), 401 UNAUTHORIZED when owned by someone else.
 */
export async function loadOwnedInbox(
  db: DbExecutor,
  inboxId: string,
  identity: Identity,
): Promise<Inbox> {
  const inbox = await getInboxById(db, inboxId);
  if (!inbox) throw InboxErrors.notFound({ inboxId });
  assertAuthorized(identity, { kind: 'inbox', inbox });
  return inbox;
}

export class InboxService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      inboxRepo: InboxRepo;
      auditRepo: AuditRepo;
    },
  ) {}

  async listForUser(userId: string): Promise<Inbox[]> {
    const user = await getUserById(this.deps.db, userId);
    if (!user) throw UserErrors.notFound({ userId });
    return listInboxesForUser(this.deps.db, userId);
  }

  async createForUser(params: { userId: string; name: string; audit: AuditContext }): Promise<Inbox> {
    const { userId, name } = params;

    const inbox = await this.withDuplicateNameMapping(() =>
      this.deps.db.transaction().execute(async (trx) => {
        const owner = await getUserById(trx, userId);
        if (!owner) throw UserErrors.notFound({ userId });

        const row = await this.deps.inboxRepo.withDb(trx).insertInbox({ userId, name });
        const created = toInbox(row);

        const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), params.audit);
        await auditInboxCreated(audit, created);

        return created;
      }),
    );

    this.deps.logger.info({
      msg: 'inboxes.create.success',
      flow: 'inboxes.create',
      requestId: params.audit.requestId,
      inboxId: inbox.id,
      ownerId: userId,
    });

    return inbox;
  }

  async getInbox(params: { inboxId: string; identity: Identity }): Promise<Inbox> {
    return loadOwnedInbox(this.deps.db, params.inboxId, params.identity);
  }

  async renameInbox(params: {
    inboxId: string;
    name: string;
    identity: Identity;
    audit: AuditContext;
  }): Promise<Inbox> {
    const inbox = await this.withDuplicateNameMapping(() =>
      this.deps.db.transaction().execute(async (trx) => {
        const existing = await loadOwnedInbox(trx, params.inboxId, params.identity);

        const row = await this.deps.inboxRepo
          .withDb(trx)
          .renameInbox(existing.id, params.name, new Date());
        if (!row) throw InboxErrors.notFound({ inboxId: existing.id });

        const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), params.audit);
        await auditInboxUpdated(audit, {
          inboxId: existing.id,
          previousName: existing.name,
          name: params.name,
        });

        return toInbox(row);
      }),
    );

    this.deps.logger.info({
      msg: 'inboxes.update.success',
      flow: 'inboxes.update',
      requestId: params.audit.requestId,
      inboxId: inbox.id,
    });

    return inbox;
  }

  async deleteInbox(params: {
    inboxId: string;
    identity: Identity;
    audit: AuditContext;
  }): Promise<void> {
    const messages = await this.deps.db.transaction().execute(async (trx) => {
      const existing = await loadOwnedInbox(trx, params.inboxId, params.identity);

      const removed = await this.deps.inboxRepo.withDb(trx).deleteInboxCascade(existing.id);
      if (!removed.deleted) throw InboxErrors.notFound({ inboxId: existing.id });

      const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), params.audit);
      await auditInboxDeleted(audit, {
        inboxId: existing.id,
        ownerId: existing.userId,
        messages: removed.messages,
      });

      return removed.messages;
    });

    this.deps.logger.info({
      msg: 'inboxes.delete.success',
      flow: 'inboxes.delete',
      requestId: params.audit.requestId,
      inboxId: params.inboxId,
      messages,
    });
  }

  private async withDuplicateNameMapping<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (isUniqueViolation(err, INBOXES_USER_NAME_UNIQUE)) throw InboxErrors.duplicateName();
      throw err;
    }
  }
}
