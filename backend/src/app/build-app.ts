/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 * - Runs the dev-only seed.
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { AppInfra } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, infra: AppInfra = {}) {
  const deps = await buildDeps(config, infra);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow, username: config.seed.username });

      await runDevSeed({
        db: deps.db,
        passwordHasher: deps.passwordHasher,
        options: {
          username: config.seed.username,
          email: config.seed.email,
          password: config.seed.password,
          inboxName: config.seed.inboxName,
        },
      });

      logger.info('seed.done', { flow, username: config.seed.username });
    }
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
