import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter, RateLimitError } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter', () => {
  it('allows up to the limit and rejects the next hit', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const hit = () => limiter.hitOrThrow({ key: 'login:ip:1.2.3.4', limit: 2, windowSeconds: 60 });

    await hit();
    await hit();

    const err = await hit().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toMatchObject({ key: 'rl:login:ip:1.2.3.4', limit: 2, windowSeconds: 60 });
  });

  it('starts counting again once the window has passed', async () => {
    let nowMs = 0;
    const limiter = new RateLimiter(new InMemCache(() => nowMs));
    const hit = () => limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 10 });

    await hit();
    await expect(hit()).rejects.toBeInstanceOf(RateLimitError);

    nowMs += 10_001;
    await expect(hit()).resolves.toBeUndefined();
  });

  it('never throws when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });
    for (let i = 0; i < 5; i += 1) {
      await limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 10 });
    }
  });
});
