/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * CONTRACT:
 * - hash() produces a salted one-way digest.
 * - verify() resolves false on mismatch AND on a malformed digest; it never rejects
 *   because of bad input.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
