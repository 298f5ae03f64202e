/**
 * backend/src/modules/inboxes/inbox.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for /users/:id/inboxes and /inboxes/:id.
 *
 * RULES:
 * - No DB access here.
 * - Owner-only routes call requireSession() before anything else.
 * - Serialization adds the derived URL (publicBaseUrl comes from config via DI).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseBody, readIdParam } from '../../shared/http/parse-input';
import { auditContextOf } from '../../shared/http/audit-context';
import { requireSession } from '../../shared/http/require-auth-context';

import { UserErrors } from '../users';

import { createInboxSchema, updateInboxSchema } from './inbox.schemas';
import { InboxErrors } from './inbox.errors';
import { toInboxResponse } from './inbox.presenter';
import type { InboxService } from './inbox.service';

export class InboxController {
  constructor(
    private readonly inboxService: InboxService,
    private readonly publicBaseUrl: string,
  ) {}

  async listForUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = readIdParam(req.params);
    if (!userId) throw UserErrors.notFound();

    const inboxes = await this.inboxService.listForUser(userId);
    return reply.status(200).send(inboxes.map((inbox) => toInboxResponse(inbox, this.publicBaseUrl)));
  }

  async createForUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = readIdParam(req.params);
    if (!userId) throw UserErrors.notFound();

    const body = parseBody(createInboxSchema, req.body);

    const inbox = await this.inboxService.createForUser({
      userId,
      name: body.name,
      audit: auditContextOf(req),
    });

    return reply.status(201).send(toInboxResponse(inbox, this.publicBaseUrl));
  }

  async getInbox(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const inboxId = this.requireInboxId(req);

    const inbox = await this.inboxService.getInbox({ inboxId, identity });
    return reply.status(200).send(toInboxResponse(inbox, this.publicBaseUrl));
  }

  async updateInbox(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const inboxId = this.requireInboxId(req);
    const body = parseBody(updateInboxSchema, req.body);

    const inbox = await this.inboxService.renameInbox({
      inboxId,
      name: body.name,
      identity,
      audit: auditContextOf(req),
    });

    return reply.status(200).send(toInboxResponse(inbox, this.publicBaseUrl));
  }

  async deleteInbox(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const inboxId = this.requireInboxId(req);

    await this.inboxService.deleteInbox({
      inboxId,
      identity,
      audit: auditContextOf(req),
    });

    return reply.status(204).send();
  }

  private requireInboxId(req: FastifyRequest): string {
    const inboxId = readIdParam(req.params);
    if (!inboxId) throw InboxErrors.notFound();
    return inboxId;
  }
}
