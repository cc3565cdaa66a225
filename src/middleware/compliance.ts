/**
 * compliance.ts — Being a polite client of the registration service.
 *
 * 1. **Rate limiting**: Per-host Bottleneck limiters shared by every account
 *    pipeline in the process, so N concurrent accounts never translate into
 *    an unbounded burst against one host.
 * 2. **Status helpers**: Small predicates the client and the executor use
 *    to read HTTP status codes the same way.
 */

import Bottleneck from 'bottleneck';
import type { EngineConfig } from '../core/config';

// ─── Status helpers ─────────────────────────────────────────

/** 401 / 403: credentials or session not accepted. */
export function isAuthWallResponse(statusCode: number): boolean {
  return statusCode === 401 || statusCode === 403;
}

/** 429 and 5xx: the service is overloaded or down, try again later. */
export function isServiceUnavailableResponse(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

export function isSuccessResponse(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

// ─── Rate limiter (Bottleneck) ──────────────────────────────

const limiters = new Map<string, Bottleneck>();

/**
 * Create or retrieve the limiter for one host.
 *
 * `maxConcurrentRequests` caps in-flight calls per host; `rateLimitMs`
 * spaces their start times.
 */
export function getApiRateLimiter(
  hostname: string,
  config: Pick<EngineConfig, 'maxConcurrentRequests' | 'rateLimitMs'>,
): Bottleneck {
  const existing = limiters.get(hostname);
  if (existing) {
    return existing;
  }

  const limiter = new Bottleneck({
    maxConcurrent: config.maxConcurrentRequests,
    minTime: config.rateLimitMs,
  });

  limiters.set(hostname, limiter);
  return limiter;
}

/** Drop all limiters (between CLI runs, and in tests). */
export async function clearRateLimiters(): Promise<void> {
  const pending = [...limiters.values()].map((limiter) => limiter.disconnect());
  limiters.clear();
  await Promise.all(pending);
}
