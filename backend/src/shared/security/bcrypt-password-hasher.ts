/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - We encapsulate bcrypt behind PasswordHasher so the rest of the app stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

// $2a$ / $2b$ / $2y$, two-digit cost, 22 chars salt + 31 chars digest
const BCRYPT_DIGEST_RE = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export function isBcryptDigest(value: string): boolean {
  return BCRYPT_DIGEST_RE.test(value);
}

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    if (!isBcryptDigest(hash)) return false;
    return bcrypt.compare(plain, hash);
  }
}
