/**
 * backend/src/modules/inboxes/inbox.routes.ts
 *
 * WHY:
 * - Declares Inboxes module endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { InboxController } from './inbox.controller';

export function registerInboxRoutes(app: FastifyInstance, controller: InboxController) {
  app.get('/users/:id/inboxes', controller.listForUser.bind(controller));
  app.post('/users/:id/inboxes', controller.createForUser.bind(controller));

  app.get('/inboxes/:id', controller.getInbox.bind(controller));
  app.put('/inboxes/:id', controller.updateInbox.bind(controller));
  app.delete('/inboxes/:id', controller.deleteInbox.bind(controller));
}
