import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimitError, RateLimiter } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter', () => {
  it('allows up to the limit and rejects the next hit', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const hit = () => limiter.hitOrThrow({ key: 'login:ip:1.2.3.4', limit: 2, windowSeconds: 900 });

    await hit();
    await hit();

    const err = await hit().then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toMatchObject({ key: 'rl:login:ip:1.2.3.4', limit: 2, windowSeconds: 900 });
  });

  it('does nothing when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });

    for (let i = 0; i < 5; i++) {
      await limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 60 });
    }
  });
});
