/**
 * middleware/index.ts — Barrel export for the request-level layer.
 */

// ── Fetch layer ─────────────────────────────────────────────
export { lightFetch, toTransportError, redactPath } from './lightFetcher';
export type {
  HttpMethod,
  HttpTransport,
  LightFetchOptions,
  LightFetchResult,
} from './lightFetcher';

// ── Compliance ──────────────────────────────────────────────
export {
  isAuthWallResponse,
  isServiceUnavailableResponse,
  isSuccessResponse,
  getApiRateLimiter,
  clearRateLimiters,
} from './compliance';
