/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session management via Redis (through Cache interface).
 * - Sessions are instantly revocable via del(); no token revocation lists.
 * - Expiry is enforced twice: Redis TTL, and `expiresAt` checked on every read.
 *
 * USER-SESSION INDEX (destroyAllForUser):
 * - On create(): SADD session:user:{userId} {sessionId} with TTL refresh.
 * - On destroy(): SREM removes the session ID from the user index, then DELs the session.
 * - On destroyAllForUser(): SMEMBERS reads all session IDs → DEL each → DEL the index.
 *
 * RULES:
 * - Depends only on Cache interface (DIP). Works with Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (cookie handling lives in middleware).
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import type { SessionData } from './session.types';
import {
  SESSION_KEY_PREFIX,
  SESSION_USER_INDEX_PREFIX,
  SessionDataSchema,
} from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  private userIndexKey(userId: string): string {
    return `${SESSION_USER_INDEX_PREFIX}:${userId}`;
  }

  get sessionTtlSeconds(): number {
    return this.ttlSeconds;
  }

  /**
   * Creates a new session bound to `userId` and returns its id.
   * The caller is responsible for setting the cookie.
   */
  async create(params: { userId: string; now: Date }): Promise<{ sessionId: string; data: SessionData }> {
    const sessionId = randomUUID();
    const data: SessionData = {
      userId: params.userId,
      createdAt: params.now.toISOString(),
      expiresAt: new Date(params.now.getTime() + this.ttlSeconds * 1000).toISOString(),
    };

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    await this.cache.sadd(this.userIndexKey(data.userId), sessionId, {
      ttlSeconds: this.ttlSeconds,
    });

    return { sessionId, data };
  }

  /**
   * Loads session data by ID. Returns null if missing, corrupted or past `expiresAt`
   * (the latter two are deleted on the way).
   */
  async get(sessionId: string, now: Date = new Date()): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    const data = parseSessionData(raw);
    if (!data) {
      await this.destroy(sessionId);
      return null;
    }

    if (Date.parse(data.expiresAt) <= now.getTime()) {
      await this.destroy(sessionId);
      return null;
    }

    return data;
  }

  /**
   * Destroys a single session. Idempotent: unknown ids are a no-op.
   */
  async destroy(sessionId: string): Promise<void> {
    const raw = await this.cache.get(this.key(sessionId));
    const data = raw ? parseSessionData(raw) : null;
    if (data) {
      await this.cache.srem(this.userIndexKey(data.userId), sessionId);
    }

    await this.cache.del(this.key(sessionId));
  }

  /**
   * Destroys ALL sessions for a user (account deletion).
   * Stale ids in the index are harmless: DEL on a missing key is a no-op.
   */
  async destroyAllForUser(userId: string): Promise<void> {
    const indexKey = this.userIndexKey(userId);
    const sessionIds = await this.cache.smembers(indexKey);

    await Promise.all(sessionIds.map((id) => this.cache.del(this.key(id))));

    await this.cache.del(indexKey);
  }
}

function parseSessionData(raw: string): SessionData | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = SessionDataSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
