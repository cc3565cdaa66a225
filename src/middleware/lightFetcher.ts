/**
 * lightFetcher.ts — Browser-like HTTP client for the registration service.
 *
 * got-scraping sends a Chrome-grade TLS handshake and header set, which the
 * registration portal's API accepts the same way it accepts the web app.
 * Non-2xx statuses come back as values; only calls that never produced a
 * response throw, and they throw `TransportError` so callers can tell a
 * timeout from any other network failure.
 */

import { Logger } from '../core/logger';
import { TransportError } from '../core/errors';

const logger = new Logger('LightFetcher');

// Loaded on first request so importing the client stays cheap.
let gotScrapingModule: typeof import('got-scraping') | null = null;

async function getGotScraping(): Promise<typeof import('got-scraping')> {
  if (!gotScrapingModule) {
    gotScrapingModule = await import('got-scraping');
  }
  return gotScrapingModule;
}

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface LightFetchOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded. */
  form?: Record<string, string>;
  /** Per-call timeout; defaults to 30 s. */
  timeout?: number;
}

export interface LightFetchResult {
  body: string;
  statusCode: number;
}

/** Signature shared by `lightFetch` and the fakes used in tests. */
export type HttpTransport = (
  url: string,
  options?: LightFetchOptions,
) => Promise<LightFetchResult>;

/**
 * Issue one HTTP request.
 *
 * @throws TransportError `timeout` when the per-call timeout elapsed,
 *   `network` for DNS, connection and TLS failures.
 */
export const lightFetch: HttpTransport = async (url, options) => {
  const method = options?.method ?? 'GET';
  logger.info(`${method} ${redactPath(url)}`);

  const { gotScraping } = await getGotScraping();

  const headers: Record<string, string> = { ...options?.headers };
  let body: string | undefined;
  if (options?.form) {
    body = new URLSearchParams(options.form).toString();
    headers['content-type'] = 'application/x-www-form-urlencoded';
  }

  try {
    const response = await gotScraping({
      url,
      method,
      headers,
      body,
      timeout: { request: options?.timeout ?? 30_000 },
      throwHttpErrors: false,
      responseType: 'text',
    });

    return {
      body: typeof response.body === 'string' ? response.body : '',
      statusCode: response.statusCode,
    };
  } catch (err) {
    throw toTransportError(err, url);
  }
};

/** Map got's error classes onto the two transport failure kinds. */
export function toTransportError(err: unknown, url: string): TransportError {
  if (err instanceof TransportError) return err;

  const isTimeout =
    err instanceof Error &&
    (err.name === 'TimeoutError' || ('code' in err && err.code === 'ETIMEDOUT'));

  const detail = err instanceof Error ? err.message : 'unknown failure';
  return isTimeout
    ? new TransportError('timeout', `Request to ${redactPath(url)} timed out`)
    : new TransportError('network', `Request to ${redactPath(url)} failed: ${detail}`);
}

/**
 * Keep origin + first two path segments.  Transaction URLs embed the
 * enrollment hash and the student id further down the path.
 */
export function redactPath(url: string): string {
  try {
    const parsed = new URL(url);
    const segments = parsed.pathname.split('/').filter(Boolean);
    const shown = segments.slice(0, 2).join('/');
    const suffix = segments.length > 2 ? '/…' : '';
    return `${parsed.origin}/${shown}${suffix}`;
  } catch {
    return '<invalid url>';
  }
}
