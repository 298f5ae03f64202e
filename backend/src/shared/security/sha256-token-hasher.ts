/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Concrete TokenHasher implementation using SHA-256 (hex digest).
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
