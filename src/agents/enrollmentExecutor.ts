/**
 * enrollmentExecutor.ts — One add/drop call for one target, classified.
 *
 * The executor never retries and never writes to the outcome log.  It maps
 * (session, target, hash) to exactly one `AttemptOutcome`, and that mapping
 * goes through a single closed classification step:
 *
 *   thrown TransportError(timeout)        → timeout          (retryable)
 *   thrown TransportError(network)        → network_error    (retryable)
 *   HTTP 401 / 403                        → service_unavailable (retryable)
 *   HTTP 404                              → invalid_hash
 *   HTTP 429 / 5xx                        → service_unavailable (retryable)
 *   body not a JSON object                → unknown
 *   status "Success"                      → success
 *   message: full / penuh / kuota         → class_full
 *   message: already / terdaftar          → already_enrolled
 *   message: hash / tidak valid           → invalid_hash
 *   anything else                         → unknown (message kept verbatim)
 *
 * 401/403 after a successful login means the session stopped being accepted
 * mid-run.  The engine does not re-authenticate; the attempt is retried as a
 * transient failure.
 */

import { EnrollmentError, TransportError, describeError } from '../core/errors';
import type {
  AttemptOutcome,
  CourseTarget,
  EnrollmentAction,
  Session,
  SuccessReason,
} from '../core/types';
import { isServiceUnavailableResponse, isAuthWallResponse } from '../middleware/compliance';
import { isRecord, type RegistrationService, type RemoteResponse } from '../services/siramaClient';

// ─── Classification ─────────────────────────────────────────

export type EnrollmentVerdict =
  | { kind: 'success'; reason: SuccessReason; message: string }
  | { kind: 'failure'; error: EnrollmentError };

// Checked before ALREADY_ENROLLED: "sudah penuh" means "already full".
const CLASS_FULL = /\b(full|penuh|kuota|quota|capacity)\b/i;
const ALREADY_ENROLLED = /already|duplicate|terdaftar|sudah diambil/i;
const INVALID_HASH = /hash|transaction not found|tidak valid/i;

const RAW_BODY_LIMIT = 200;

const SUCCESS_MESSAGES: Record<EnrollmentAction, string> = {
  add: 'Success record registration',
  drop: 'Berhasil menghapus data registration',
};

function failure(reason: EnrollmentError['reason'], message: string): EnrollmentVerdict {
  return { kind: 'failure', error: new EnrollmentError(reason, message) };
}

/** Classify a reply from the add/drop endpoint. */
export function classifyEnrollmentResponse(
  response: RemoteResponse,
  action: EnrollmentAction = 'add',
): EnrollmentVerdict {
  const { statusCode, payload } = response;

  if (isAuthWallResponse(statusCode)) {
    return failure('service_unavailable', `Session rejected by the service (HTTP ${statusCode})`);
  }
  if (statusCode === 404) {
    return failure('invalid_hash', 'Transaction endpoint not found for this enrollment hash (HTTP 404)');
  }
  if (isServiceUnavailableResponse(statusCode)) {
    return failure('service_unavailable', `Service unavailable (HTTP ${statusCode})`);
  }

  if (!isRecord(payload)) {
    const raw = response.rawBody.slice(0, RAW_BODY_LIMIT);
    return failure('unknown', `Unrecognised response (HTTP ${statusCode}): ${raw}`);
  }

  const status = typeof payload.status === 'string' ? payload.status : '';
  const message = typeof payload.message === 'string' ? payload.message : '';

  if (status.toLowerCase() === 'success') {
    return {
      kind: 'success',
      reason: action === 'add' ? 'enrolled' : 'dropped',
      message: message || SUCCESS_MESSAGES[action],
    };
  }

  if (CLASS_FULL.test(message)) return failure('class_full', message);
  if (ALREADY_ENROLLED.test(message)) return failure('already_enrolled', message);
  if (INVALID_HASH.test(message)) return failure('invalid_hash', message);

  return failure(
    'unknown',
    message || `Unrecognised response (HTTP ${statusCode}): ${response.rawBody.slice(0, RAW_BODY_LIMIT)}`,
  );
}

/** Classify something thrown while the call was in flight. */
export function classifyThrown(err: unknown): EnrollmentError {
  if (err instanceof EnrollmentError) return err;
  if (err instanceof TransportError) {
    return err.kind === 'timeout'
      ? new EnrollmentError('timeout', err.message)
      : new EnrollmentError('network_error', err.message);
  }
  return new EnrollmentError('unknown', describeError(err));
}

// ─── Executor ───────────────────────────────────────────────

export class EnrollmentExecutor {
  private readonly client: RegistrationService;
  private readonly now: () => Date;

  constructor(client: RegistrationService, now: () => Date = () => new Date()) {
    this.client = client;
    this.now = now;
  }

  /**
   * Single try.  `attemptNumber` is always 1 here; the Retry Controller
   * stamps the real number.
   */
  async attempt(
    session: Session,
    target: CourseTarget,
    enrollmentHash: string,
  ): Promise<AttemptOutcome> {
    const action = target.action ?? 'add';

    let verdict: EnrollmentVerdict;
    try {
      const response = action === 'add'
        ? await this.client.addCourse(session, target.courseId, enrollmentHash)
        : await this.client.dropCourse(session, target.courseId, enrollmentHash);
      verdict = classifyEnrollmentResponse(response, action);
    } catch (err) {
      verdict = { kind: 'failure', error: classifyThrown(err) };
    }

    const base = {
      accountId: session.accountId,
      courseId: target.courseId,
      courseName: target.courseName,
      action,
      attemptNumber: 1,
      timestamp: this.now().toISOString(),
    };

    return verdict.kind === 'success'
      ? { ...base, status: 'success', reason: verdict.reason, message: verdict.message }
      : { ...base, status: 'failed', reason: verdict.error.reason, message: verdict.error.message };
  }
}
