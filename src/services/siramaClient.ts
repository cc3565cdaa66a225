/**
 * siramaClient.ts — Adapter for the university registration service (SIRAMA).
 *
 * The engine talks to the remote side only through the `RegistrationService`
 * port declared here.  `SiramaClient` is the production implementation; tests
 * substitute a fake port or a fake `HttpTransport`.
 *
 * Endpoints
 * ─────────
 *   POST   {auth}/api/oauth/issueauth                              login
 *   GET    {service}/read/api/read/issueprofile                    profile
 *   GET    {service}/read/api/read/<enrolled-courses-id>/          current KRS
 *   POST   {service}/trans/api/transaction/{hash}                  add course
 *   DELETE {service}/trans/api/transaction/{hash}/{course}/{student}/{flag}
 *
 * The client holds no per-account state: tokens and student ids travel in
 * the `Session` value the caller passes in.
 */

import type { EngineConfig } from '../core/config';
import { AuthError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Session } from '../core/types';
import {
  getApiRateLimiter,
  isAuthWallResponse,
  isSuccessResponse,
} from '../middleware/compliance';
import {
  lightFetch,
  type HttpTransport,
  type LightFetchOptions,
  type LightFetchResult,
} from '../middleware/lightFetcher';

const logger = new Logger('SiramaClient');

const ENROLLED_COURSES_READ_ID = '87ec6ce42c5f860413f696957c33d9f3ee70acf2';

// ─── Port ───────────────────────────────────────────────────

export interface LoginResult {
  token: string;
  /** Raw `expires` / `expires_in` value, when present. */
  expires?: number;
}

export interface StudentProfile {
  studentId: string;
  fullName?: string;
}

/** A transaction endpoint's reply, not yet classified. */
export interface RemoteResponse {
  statusCode: number;
  /** Parsed JSON, or undefined when the body was not JSON. */
  payload: unknown;
  rawBody: string;
}

export interface RegistrationService {
  /** @throws AuthError */
  login(username: string, password: string): Promise<LoginResult>;
  /** @throws AuthError */
  getProfile(token: string): Promise<StudentProfile>;
  /** @throws TransportError */
  addCourse(session: Session, courseId: string, enrollmentHash: string): Promise<RemoteResponse>;
  /** @throws TransportError */
  dropCourse(session: Session, courseId: string, enrollmentHash: string): Promise<RemoteResponse>;
  /** @throws TransportError, or Error on a non-2xx reply */
  getEnrolledCourses(session: Session): Promise<unknown[]>;
}

// ─── Helpers ────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function metaOf(payload: Record<string, unknown>): { status?: number; message?: string } {
  const meta = payload.meta;
  if (!isRecord(meta)) return {};
  return {
    status: readNumber(meta.status),
    message: typeof meta.message === 'string' ? meta.message : undefined,
  };
}

// ─── Client ─────────────────────────────────────────────────

export class SiramaClient implements RegistrationService {
  private readonly config: EngineConfig;
  private readonly transport: HttpTransport;

  /**
   * @param transport - Defaults to `lightFetch`; tests inject a fake.
   */
  constructor(config: EngineConfig, transport: HttpTransport = lightFetch) {
    this.config = config;
    this.transport = transport;
  }

  // ── Authentication ───────────────────────────────────────

  async login(username: string, password: string): Promise<LoginResult> {
    let response: LightFetchResult;
    try {
      response = await this.request(`${this.config.authBaseUrl}/api/oauth/issueauth`, {
        method: 'POST',
        headers: { ...this.defaultHeaders(), 'accept-language': 'id' },
        form: { username, password },
      });
    } catch (err) {
      throw new AuthError('network_unreachable', `Login request failed: ${describeError(err)}`);
    }

    const payload = parseJson(response.body);
    const serverMessage = isRecord(payload) ? metaOf(payload).message : undefined;

    if (response.statusCode === 400 || isAuthWallResponse(response.statusCode)) {
      throw new AuthError(
        'invalid_credentials',
        serverMessage ?? `Login rejected (HTTP ${response.statusCode})`,
      );
    }
    if (!isSuccessResponse(response.statusCode)) {
      throw new AuthError(
        'service_unavailable',
        `Login endpoint answered HTTP ${response.statusCode}`,
      );
    }
    if (!isRecord(payload)) {
      throw new AuthError('service_unavailable', 'Login endpoint returned a non-JSON body');
    }

    if (typeof payload.token === 'string' && metaOf(payload).status === 200) {
      return { token: payload.token, expires: readNumber(payload.expires) };
    }
    // Older response shape.
    if (typeof payload.access_token === 'string') {
      return { token: payload.access_token, expires: readNumber(payload.expires_in) };
    }

    throw new AuthError(
      'invalid_credentials',
      serverMessage ?? 'Invalid response from server',
    );
  }

  async getProfile(token: string): Promise<StudentProfile> {
    let response: LightFetchResult;
    try {
      response = await this.request(
        `${this.config.serviceBaseUrl}/read/api/read/issueprofile`,
        { headers: this.authorizedHeaders(token) },
      );
    } catch (err) {
      throw new AuthError('network_unreachable', `Profile request failed: ${describeError(err)}`);
    }

    if (!isSuccessResponse(response.statusCode)) {
      throw new AuthError(
        'service_unavailable',
        `Profile endpoint answered HTTP ${response.statusCode}`,
      );
    }

    const payload = parseJson(response.body);
    const numberId = isRecord(payload) ? payload.numberid : undefined;
    if (typeof numberId !== 'string' && typeof numberId !== 'number') {
      throw new AuthError('service_unavailable', 'Profile response has no student id');
    }

    const fullName = isRecord(payload) && typeof payload.fullname === 'string'
      ? payload.fullname
      : undefined;
    return { studentId: String(numberId), fullName };
  }

  // ── Transactions ─────────────────────────────────────────

  async addCourse(
    session: Session,
    courseId: string,
    enrollmentHash: string,
  ): Promise<RemoteResponse> {
    const url = `${this.config.serviceBaseUrl}/trans/api/transaction/${encodeURIComponent(enrollmentHash)}`;
    const response = await this.request(url, {
      method: 'POST',
      headers: this.authorizedHeaders(session.token),
      form: { studentid: session.studentId, courseid: courseId },
    });
    return toRemoteResponse(response);
  }

  async dropCourse(
    session: Session,
    courseId: string,
    enrollmentHash: string,
  ): Promise<RemoteResponse> {
    const path = [
      enrollmentHash,
      courseId,
      session.studentId,
      this.config.dropFlag,
    ].map(encodeURIComponent).join('/');

    const response = await this.request(
      `${this.config.serviceBaseUrl}/trans/api/transaction/${path}`,
      { method: 'DELETE', headers: this.authorizedHeaders(session.token) },
    );
    return toRemoteResponse(response);
  }

  async getEnrolledCourses(session: Session): Promise<unknown[]> {
    const response = await this.request(
      `${this.config.serviceBaseUrl}/read/api/read/${ENROLLED_COURSES_READ_ID}/`,
      { headers: this.authorizedHeaders(session.token) },
    );

    if (!isSuccessResponse(response.statusCode)) {
      throw new Error(`Enrolled-courses endpoint answered HTTP ${response.statusCode}`);
    }

    const payload = parseJson(response.body);
    if (!Array.isArray(payload)) {
      logger.warn(`Enrolled courses for ${session.nim}: expected an array, got ${typeof payload}`);
      return [];
    }
    return payload;
  }

  // ── Internals ────────────────────────────────────────────

  private request(url: string, options: LightFetchOptions): Promise<LightFetchResult> {
    const limiter = getApiRateLimiter(new URL(url).hostname, this.config);
    return limiter.schedule(() =>
      this.transport(url, { ...options, timeout: this.config.requestTimeoutMs }),
    );
  }

  private defaultHeaders(): Record<string, string> {
    return {
      accept: 'application/json',
      'accept-language': 'id',
      origin: 'https://sirama.telkomuniversity.ac.id',
      referer: 'https://sirama.telkomuniversity.ac.id/',
      'user-agent': this.config.userAgent,
    };
  }

  private authorizedHeaders(token: string): Record<string, string> {
    return { ...this.defaultHeaders(), authorization: `Bearer ${token}` };
  }
}

function toRemoteResponse(response: LightFetchResult): RemoteResponse {
  return {
    statusCode: response.statusCode,
    payload: parseJson(response.body),
    rawBody: response.body,
  };
}
