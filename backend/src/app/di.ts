/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Tests inject an in-process db and cache through `infra`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';
import { SessionStore } from '../shared/session/session.store';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createInboxModule } from '../modules/inboxes/inbox.module';
import type { InboxModule } from '../modules/inboxes/inbox.module';

import { createMessageModule } from '../modules/messages/message.module';
import type { MessageModule } from '../modules/messages/message.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  auditRepo: AuditRepo;
  sessionStore: SessionStore;

  // modules
  users: UserModule;
  inboxes: InboxModule;
  messages: MessageModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

/** Pre-built infra clients (tests pass in-process stand-ins). */
export type AppInfra = {
  db?: Db;
  cache?: Cache;
};

export async function buildDeps(config: AppConfig, infra: AppInfra = {}): Promise<AppDeps> {
  const db = infra.db ?? createDb(config.databaseUrl);

  // Redis is mandatory outside tests
  const cache: Cache = infra.cache ?? (await RedisCache.connect(config.redisUrl));

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // shared repos / stores
  const auditRepo = new AuditRepo(db);
  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds);

  // modules (no HTTP / no business logic here)
  const users = createUserModule({
    db,
    logger,
    passwordHasher,
    auditRepo,
    sessionStore,
    requireSelf: config.users.requireSelf,
  });

  const inboxes = createInboxModule({
    db,
    logger,
    auditRepo,
    publicBaseUrl: config.publicBaseUrl,
  });

  const messages = createMessageModule({ db, logger, auditRepo });

  const auth = createAuthModule({
    db,
    tokenHasher,
    passwordHasher,
    logger,
    rateLimiter,
    auditRepo,
    sessionStore,
    userRepo: users.userRepo,
    isProduction: config.nodeEnv === 'production',
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    auditRepo,
    sessionStore,
    users,
    inboxes,
    messages,
    auth,
    close: async () => {
      await cache.close();
      await db.destroy();
    },
  };
}
