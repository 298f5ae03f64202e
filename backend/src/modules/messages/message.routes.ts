/**
 * backend/src/modules/messages/message.routes.ts
 *
 * WHY:
 * - Declares Messages module endpoints.
 */

import type { FastifyInstance } from 'fastify';
import type { MessageController } from './message.controller';

export function registerMessageRoutes(app: FastifyInstance, controller: MessageController) {
  app.get('/inboxes/:id/messages', controller.listForInbox.bind(controller));
  app.post('/inboxes/:id/messages', controller.postMessage.bind(controller));

  app.get('/messages/:id', controller.getMessage.bind(controller));
  app.put('/messages/:id', controller.updateMessage.bind(controller));
  app.delete('/messages/:id', controller.deleteMessage.bind(controller));
}
