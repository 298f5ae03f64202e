/**
 * backend/src/modules/messages/message.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for /inboxes/:id/messages and /messages/:id.
 *
 * RULES:
 * - Posting a message needs no session; everything else is owner-only.
 * - The caller's identity always comes from the session, never from a header.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseBody, readIdParam } from '../../shared/http/parse-input';
import { auditContextOf } from '../../shared/http/audit-context';
import { requireSession } from '../../shared/http/require-auth-context';

import { InboxErrors } from '../inboxes';

import { createMessageSchema, updateMessageSchema } from './message.schemas';
import { MessageErrors } from './message.errors';
import { toMessageResponse } from './message.presenter';
import type { MessageService } from './message.service';

export class MessageController {
  constructor(private readonly messageService: MessageService) {}

  async listForInbox(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const inboxId = this.requireInboxId(req);

    const messages = await this.messageService.listForInbox({ inboxId, identity });
    return reply.status(200).send(messages.map(toMessageResponse));
  }

  async postMessage(req: FastifyRequest, reply: FastifyReply) {
    const inboxId = this.requireInboxId(req);
    const body = parseBody(createMessageSchema, req.body);

    const message = await this.messageService.postMessage({
      inboxId,
      subject: body.subject,
      body: body.body,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(toMessageResponse(message));
  }

  async getMessage(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const messageId = this.requireMessageId(req);

    const message = await this.messageService.getMessage({ messageId, identity });
    return reply.status(200).send(toMessageResponse(message));
  }

  async updateMessage(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const messageId = this.requireMessageId(req);
    const body = parseBody(updateMessageSchema, req.body);

    const message = await this.messageService.markRead({
      messageId,
      read: body.read,
      identity,
    });

    return reply.status(200).send(toMessageResponse(message));
  }

  async deleteMessage(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const messageId = this.requireMessageId(req);

    await this.messageService.deleteMessage({
      messageId,
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

  private requireMessageId(req: FastifyRequest): string {
    const messageId = readIdParam(req.params);
    if (!messageId) throw MessageErrors.notFound();
    return messageId;
  }
}
