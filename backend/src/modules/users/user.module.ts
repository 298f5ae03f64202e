/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Exposes userRepo for the auth module (register writes a user in its own tx).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { SessionStore } from '../../shared/session/session.store';

import { UserRepo } from './dal/user.repo';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  db: DbExecutor;
  logger: Logger;
  passwordHasher: PasswordHasher;
  auditRepo: AuditRepo;
  sessionStore: SessionStore;
  requireSelf: boolean;
}) {
  const userRepo = new UserRepo(deps.db);

  const userService = new UserService({
    db: deps.db,
    logger: deps.logger,
    passwordHasher: deps.passwordHasher,
    userRepo,
    auditRepo: deps.auditRepo,
    sessionStore: deps.sessionStore,
    requireSelf: deps.requireSelf,
  });

  const controller = new UserController(userService);

  return {
    userRepo,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
