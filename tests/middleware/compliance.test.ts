import {
  clearRateLimiters,
  getApiRateLimiter,
  isAuthWallResponse,
  isServiceUnavailableResponse,
  isSuccessResponse,
} from '../../src/middleware/compliance';

const LIMITS = { maxConcurrentRequests: 2, rateLimitMs: 0 };

afterEach(async () => {
  await clearRateLimiters();
});

describe('status helpers', () => {
  it('classifies status codes', () => {
    expect([401, 403, 404].map(isAuthWallResponse)).toEqual([true, true, false]);
    expect([429, 500, 503, 404].map(isServiceUnavailableResponse)).toEqual([true, true, true, false]);
    expect([200, 204, 302].map(isSuccessResponse)).toEqual([true, true, false]);
  });
});

describe('getApiRateLimiter', () => {
  it('shares one limiter per host', () => {
    const first = getApiRateLimiter('service.test', LIMITS);

    expect(getApiRateLimiter('service.test', LIMITS)).toBe(first);
    expect(getApiRateLimiter('auth.test', LIMITS)).not.toBe(first);
  });

  it('caps concurrent jobs per host', async () => {
    const limiter = getApiRateLimiter('service.test', LIMITS);
    let running = 0;
    let peak = 0;
    const job = async (): Promise<void> => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running -= 1;
    };

    await Promise.all([1, 2, 3, 4].map(() => limiter.schedule(job)));

    expect(peak).toBeLessThanOrEqual(2);
  });

  it('hands out a fresh limiter after clearing', async () => {
    const first = getApiRateLimiter('service.test', LIMITS);
    await clearRateLimiters();

    expect(getApiRateLimiter('service.test', LIMITS)).not.toBe(first);
  });
});
