/**
 * backend/src/modules/inboxes/inbox.module.ts
 *
 * WHY:
 * - Encapsulates Inboxes module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import { InboxRepo } from './dal/inbox.repo';
import { InboxService } from './inbox.service';
import { InboxController } from './inbox.controller';
import { registerInboxRoutes } from './inbox.routes';

export type InboxModule = ReturnType<typeof createInboxModule>;

export function createInboxModule(deps: {
  db: DbExecutor;
  logger: Logger;
  auditRepo: AuditRepo;
  publicBaseUrl: string;
}) {
  const inboxRepo = new InboxRepo(deps.db);

  const inboxService = new InboxService({
    db: deps.db,
    logger: deps.logger,
    inboxRepo,
    auditRepo: deps.auditRepo,
  });

  const controller = new InboxController(inboxService, deps.publicBaseUrl);

  return {
    inboxRepo,
    inboxService,
    registerRoutes(app: FastifyInstance) {
      registerInboxRoutes(app, controller);
    },
  };
}
