/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

/** The authenticated caller: a user id resolved from a live session. */
export type Identity = Readonly<{
  sessionId: string;
  userId: string;
}>;

/**
 * Controller guard: requires a session.
 * No session (absent, malformed, unknown or expired cookie) -> 401 UNAUTHENTICATED.
 */
export function requireSession(req: FastifyRequest): Identity {
  const ctx = req.authContext;
  if (!ctx || !ctx.sessionId || !ctx.userId) {
    throw AppError.unauthenticated('Authentication required');
  }

  return { sessionId: ctx.sessionId, userId: ctx.userId };
}

/** Returns the caller's identity when a session is present, null otherwise. */
export function optionalSession(req: FastifyRequest): Identity | null {
  const ctx = req.authContext;
  if (!ctx || !ctx.sessionId || !ctx.userId) return null;
  return { sessionId: ctx.sessionId, userId: ctx.userId };
}
