/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads the session cookie on every request (identity resolution).
 * - If a valid session exists, populates req.authContext (userId, sessionId).
 * - Does NOT throw if no session; endpoints decide if auth is required (requireSession).
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Best-effort: missing / malformed / unknown / expired cookie leaves authContext empty.
 * - No business logic (just session → authContext mapping).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME, SESSION_ID_RE } from './session.types';

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

/** Returns the session id carried by the request, or null when absent/malformed. */
export function readSessionId(req: FastifyRequest): string | null {
  const sessionId = parseCookies(req.headers.cookie)[SESSION_COOKIE_NAME];
  if (!sessionId || !SESSION_ID_RE.test(sessionId)) return null;
  return sessionId;
}

export function registerSessionMiddleware(app: FastifyInstance, sessionStore: SessionStore): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const sessionId = readSessionId(req);
    if (!sessionId) return;

    const session = await sessionStore.get(sessionId);
    if (!session) return;

    req.authContext = {
      userId: session.userId,
      sessionId,
    };
  });
}
