/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Rate-limit keys are derived from emails; raw emails must not end up in Redis keys.
 * - Callers depend on an abstraction (DIP); today it is SHA-256.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
