/**
 * backend/src/modules/messages/message.module.ts
 *
 * WHY:
 * - Encapsulates Messages module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import { MessageRepo } from './dal/message.repo';
import { MessageService } from './message.service';
import { MessageController } from './message.controller';
import { registerMessageRoutes } from './message.routes';

export type MessageModule = ReturnType<typeof createMessageModule>;

export function createMessageModule(deps: { db: DbExecutor; logger: Logger; auditRepo: AuditRepo }) {
  const messageRepo = new MessageRepo(deps.db);

  const messageService = new MessageService({
    db: deps.db,
    logger: deps.logger,
    messageRepo,
    auditRepo: deps.auditRepo,
  });

  const controller = new MessageController(messageService);

  return {
    messageRepo,
    messageService,
    registerRoutes(app: FastifyInstance) {
      registerMessageRoutes(app, controller);
    },
  };
}
