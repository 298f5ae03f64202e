/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Types shared by the auth flows, service and controller.
 *
 * RULES:
 * - Never include raw passwords, hashes, or session ids in response types.
 *   The session id travels only in the Set-Cookie header.
 */

import type { AuditContext } from '../../shared/audit/audit.types';
import type { User } from '../users';

/** Transport fields every auth flow needs for logs, audits and rate limits. */
export type AuthRequestMeta = {
  requestId: string;
  ip: string;
  userAgent: string | null;
};

export type LoginParams = AuthRequestMeta & {
  email: string;
  password: string;
};

export type RegisterParams = AuthRequestMeta & {
  username: string;
  email: string;
  password: string;
};

/** Result of a successful login: the signed-in user and the new session. */
export type AuthSessionResult = {
  user: User;
  sessionId: string;
  maxAgeSeconds: number;
};

export function toAuditContext(meta: AuthRequestMeta, userId: string | null): AuditContext {
  return {
    userId,
    requestId: meta.requestId,
    ip: meta.ip,
    userAgent: meta.userAgent,
  };
}
