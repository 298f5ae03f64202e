/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Login sets and logout clears the same cookie with the same flags;
 *   HttpOnly / SameSite=Strict / Secure (prod) are defined in one place.
 *
 * RULES:
 * - No business logic here.
 * - Receives isProduction from the caller (injected at construction time in the controller).
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  opts: { isProduction: boolean; maxAgeSeconds: number },
): void {
  const parts = [
    `${SESSION_COOKIE_NAME}=${sessionId}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Strict',
    `Max-Age=${opts.maxAgeSeconds}`,
  ];

  if (opts.isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}

export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  const parts = [`${SESSION_COOKIE_NAME}=`, 'Path=/', 'HttpOnly', 'SameSite=Strict', 'Max-Age=0'];

  if (isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}
