/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER MATTERS:
 * - requestContext -> authContext -> session (session hook fills authContext).
 * - Form bodies (application/x-www-form-urlencoded) are parsed like JSON ones.
 */

import Fastify from 'fastify';
import formbody from '@fastify/formbody';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  await app.register(formbody);

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.sessionStore);

  registerErrorHandler(app);

  // Basic request logging (after the session hook, so userId is known)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      userId: req.authContext.userId,
    });
    done();
  });

  return app;
}
