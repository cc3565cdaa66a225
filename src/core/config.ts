/**
 * config.ts — Engine configuration read from environment variables.
 *
 * Every knob has a default so a bare `loadEngineConfig()` works in tests.
 * Secrets (Supabase key, encryption key) stay optional here; the services
 * that need them throw when they are missing.
 */

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  jitterMs: number;
  maxDelayMs: number;
}

export interface EngineConfig {
  // Remote service
  authBaseUrl: string;
  serviceBaseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  dropFlag: string;

  // Per-host request throttling
  rateLimitMs: number;
  maxConcurrentRequests: number;

  // Retry
  retry: RetrySettings;

  // Orchestration
  concurrencyLimit: number;
  accountLaunchSpacingMs: number;
  /** Re-read the KRS after a run with at least one success. */
  verifyEnrollment: boolean;

  // Storage / secrets
  supabaseUrl?: string;
  supabaseKey?: string;
  encryptionKey?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36';

/** Build an EngineConfig from `env` (defaults to process.env). */
export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  return {
    authBaseUrl:
      env.SIRAMA_AUTH_URL ?? 'https://auth-v2.telkomuniversity.ac.id',
    serviceBaseUrl:
      env.SIRAMA_SERVICE_URL ?? 'https://service-v2.telkomuniversity.ac.id',
    userAgent: env.USER_AGENT ?? DEFAULT_USER_AGENT,
    requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS ?? '30000', 10),
    dropFlag: env.DROP_FLAG ?? '1',

    rateLimitMs: parseInt(env.RATE_LIMIT_MS ?? '0', 10),
    maxConcurrentRequests: parseInt(env.MAX_CONCURRENT_REQUESTS ?? '8', 10),

    retry: {
      maxAttempts: parseInt(env.RETRY_MAX_ATTEMPTS ?? '3', 10),
      baseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS ?? '1000', 10),
      multiplier: parseFloat(env.RETRY_MULTIPLIER ?? '2'),
      jitterMs: parseInt(env.RETRY_JITTER_MS ?? '250', 10),
      maxDelayMs: parseInt(env.RETRY_MAX_DELAY_MS ?? '15000', 10),
    },

    concurrencyLimit: parseInt(env.CONCURRENCY_LIMIT ?? '4', 10),
    accountLaunchSpacingMs: parseInt(env.ACCOUNT_LAUNCH_SPACING_MS ?? '0', 10),
    verifyEnrollment: (env.VERIFY_ENROLLMENT ?? 'false').toLowerCase() === 'true',

    supabaseUrl: env.SUPABASE_URL,
    supabaseKey: env.SUPABASE_KEY,
    encryptionKey: env.ENCRYPTION_KEY,
  };
}
