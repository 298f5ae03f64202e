/**
 * backend/src/modules/messages/message.service.ts
 *
 * WHY:
 * - Orchestrates message posting (open to anyone who knows the inbox id)
 *   and owner-only reads/updates/deletes.
 * - Only place in the messages module allowed to start transactions.
 *
 * RULES:
 * - A message is authorized through its inbox (the inbox owner owns its messages).
 * - Existence before ownership: missing message/inbox -> 404 for everyone.
 * - Code inside a transaction uses `trx` only.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { AuditContext } from '../../shared/audit/audit.types';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Identity } from '../../shared/http/require-auth-context';

import { assertAuthorized, getInboxById, InboxErrors, loadOwnedInbox } from '../inboxes';

import type { MessageRepo } from './dal/message.repo';
import { getMessageById, listMessagesForInbox, toMessage } from './queries/message.queries';
import { MessageErrors } from './message.errors';
import { auditMessageDeleted } from './message.audit';
import type { Message } from './message.types';

/**
 * Loads a message and checks that `identity` owns its inbox.
 */
async function loadOwnedMessage(
  db: DbExecutor,
  messageId: string,
  identity: Identity,
): Promise<Message> {
  const message = await getMessageById(db, messageId);
  if (!message) throw MessageErrors.notFound({ messageId });

  const inbox = await getInboxById(db, message.inboxId);
  if (!inbox) throw InboxErrors.notFound({ inboxId: message.inboxId });

  assertAuthorized(identity, { kind: 'message', message, inbox });
  return message;
}

export class MessageService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      messageRepo: MessageRepo;
      auditRepo: AuditRepo;
    },
  ) {}

  async postMessage(params: {
    inboxId: string;
    subject: string;
    body: string;
    requestId: string;
  }): Promise<Message> {
    const message = await this.deps.db.transaction().execute(async (trx) => {
      const inbox = await getInboxById(trx, params.inboxId);
      if (!inbox) throw InboxErrors.notFound({ inboxId: params.inboxId });

      const row = await this.deps.messageRepo.withDb(trx).insertMessage({
        inboxId: inbox.id,
        subject: params.subject,
        body: params.body,
      });
      return toMessage(row);
    });

    this.deps.logger.info({
      msg: 'messages.create.success',
      flow: 'messages.create',
      requestId: params.requestId,
      inboxId: message.inboxId,
      messageId: message.id,
    });

    return message;
  }

  async listForInbox(params: { inboxId: string; identity: Identity }): Promise<Message[]> {
    const inbox = await loadOwnedInbox(this.deps.db, params.inboxId, params.identity);
    return listMessagesForInbox(this.deps.db, inbox.id);
  }

  async getMessage(params: { messageId: string; identity: Identity }): Promise<Message> {
    return loadOwnedMessage(this.deps.db, params.messageId, params.identity);
  }

  async markRead(params: {
    messageId: string;
    read: boolean;
    identity: Identity;
  }): Promise<Message> {
    return this.deps.db.transaction().execute(async (trx) => {
      const existing = await loadOwnedMessage(trx, params.messageId, params.identity);

      const row = await this.deps.messageRepo
        .withDb(trx)
        .setRead(existing.id, params.read, new Date());
      if (!row) throw MessageErrors.notFound({ messageId: existing.id });

      return toMessage(row);
    });
  }

  async deleteMessage(params: {
    messageId: string;
    identity: Identity;
    audit: AuditContext;
  }): Promise<void> {
    await this.deps.db.transaction().execute(async (trx) => {
      const existing = await loadOwnedMessage(trx, params.messageId, params.identity);

      const deleted = await this.deps.messageRepo.withDb(trx).deleteMessage(existing.id);
      if (!deleted) throw MessageErrors.notFound({ messageId: existing.id });

      const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), params.audit);
      await auditMessageDeleted(audit, existing);
    });

    this.deps.logger.info({
      msg: 'messages.delete.success',
      flow: 'messages.delete',
      requestId: params.audit.requestId,
      messageId: params.messageId,
    });
  }
}
