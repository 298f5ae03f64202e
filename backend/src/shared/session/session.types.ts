/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in Redis (via Cache) with a TTL; the client only holds the opaque id.
 * - Each session belongs to exactly one user and has a FIXED lifetime set at login
 *   (no sliding renewal).
 *
 * RULES:
 * - Session data must be JSON-serializable (stored in Redis as JSON string).
 * - Session cookie is HttpOnly, Secure (prod), SameSite=Strict.
 * - Never store passwords or hashes in session data.
 */

import { z } from 'zod';

export const SessionDataSchema = z.object({
  userId: z.string().min(1),
  createdAt: z.string().datetime(), // ISO string (JSON-safe)
  expiresAt: z.string().datetime(),
});

export type SessionData = z.infer<typeof SessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/** Session ids are UUIDs; anything else in the cookie is treated as malformed. */
export const SESSION_ID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Session prefix in Redis. Full key: `session:{sessionId}`.
 */
export const SESSION_KEY_PREFIX = 'session';

/**
 * User-sessions index prefix in Redis. Full key: `session:user:{userId}`.
 * A Redis SET per user listing active session ids; used by destroyAllForUser()
 * when the user is deleted.
 */
export const SESSION_USER_INDEX_PREFIX = 'session:user';
