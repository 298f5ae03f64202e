/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication state must be readable by every controller in the same shape.
 * - Populated by the session middleware from the server-side session.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets stub (all null) on every request.
 * 2. Session middleware overwrites with real values if a valid cookie exists.
 * 3. Controllers read req.authContext (through requireSession) to determine identity.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  userId: string | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      userId: null,
      sessionId: null,
    };

    done();
  });
}
