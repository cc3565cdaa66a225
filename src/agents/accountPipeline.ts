/**
 * accountPipeline.ts — Drive one account's targets, strictly in order.
 *
 * PIPELINE
 * ────────
 *   1. RESOLVE       → ordered auto-enroll targets (no network)
 *   2. AUTHENTICATE  → Session Manager, wrapped in the Retry Controller
 *   3. ATTEMPT       → for each target: Retry Controller(Executor)
 *   4. RECORD        → every outcome goes to the Outcome Logger as produced
 *
 * Targets of one account never run concurrently: they share the session and
 * the remote side's per-account state (credit limits, the KRS itself).
 *
 * Early stops:
 *   • login failed              → every target gets the login failure
 *   • `invalid_hash`            → remaining targets `skipped: invalid_hash`
 *   • signal aborted            → remaining targets `skipped: cancelled`
 *                                  (the attempt in flight always finishes)
 */

import { AuthError, OrchestrationError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  Account,
  AttemptOutcome,
  AuthFailureReason,
  CourseTarget,
  RunState,
  RunSummary,
  Session,
  SkipReason,
} from '../core/types';
import type { OutcomeLogger } from '../services/outcomeLogger';
import type { RegistrationService } from '../services/siramaClient';
import type { EnrollmentExecutor } from './enrollmentExecutor';
import { executeWithRetry, type RetryPolicy } from './retryController';
import type { SessionManager } from './sessionManager';
import { resolveTargets } from './targetResolver';

const logger = new Logger('AccountPipeline');

type AuthAttempt =
  | { status: 'success'; reason: 'authenticated'; attemptNumber: number; session: Session }
  | { status: 'failed'; reason: AuthFailureReason; attemptNumber: number; message: string };

export interface AccountPipelineDeps {
  sessionManager: SessionManager;
  executor: EnrollmentExecutor;
  outcomeLogger: OutcomeLogger;
  policy: RetryPolicy;
  /** Needed only when `verifyEnrollment` is on. */
  client?: RegistrationService;
  verifyEnrollment?: boolean;
  now?: () => Date;
}

/** Count outcomes into a summary; `already_enrolled` counts as a success. */
export function buildSummary(
  account: Pick<Account, 'id' | 'nim'>,
  state: RunState,
  outcomes: readonly AttemptOutcome[],
  durationMs: number,
  extra: { skipReason?: 'inactive'; needsAttention?: boolean } = {},
): RunSummary {
  const alreadyEnrolled = outcomes.filter((o) => o.reason === 'already_enrolled').length;
  const succeeded = outcomes.filter((o) => o.status === 'success').length;
  const failed = outcomes.filter((o) => o.status === 'failed').length;

  return {
    accountId: account.id,
    nim: account.nim,
    state,
    skipReason: extra.skipReason,
    success: succeeded + alreadyEnrolled,
    failed: failed - alreadyEnrolled,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    alreadyEnrolled,
    needsAttention: extra.needsAttention ?? false,
    durationMs,
    outcomes,
  };
}

export class AccountPipeline {
  private readonly deps: AccountPipelineDeps;
  private readonly now: () => Date;

  constructor(deps: AccountPipelineDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  /** Run every resolved target of `account` once (with retries). */
  async run(
    account: Account,
    enrollmentHash: string,
    signal?: AbortSignal,
  ): Promise<RunSummary> {
    const startedAt = Date.now();
    const targets = resolveTargets(account);
    const outcomes: AttemptOutcome[] = [];
    const elapsed = (): number => Date.now() - startedAt;

    if (signal?.aborted) {
      return this.skipAll(account, cancelledBeforeStart(), startedAt);
    }
    if (targets.length === 0) {
      logger.info(`${account.nim}: no auto-enroll targets, nothing to do`);
      return buildSummary(account, 'completed', outcomes, elapsed());
    }

    // ── Stage 2: AUTHENTICATE ──────────────────────────────
    const auth = await executeWithRetry(
      () => this.tryAuthenticate(account),
      this.deps.policy,
      signal,
    );

    if (auth.status === 'failed' && signal?.aborted) {
      logger.warn(`${account.nim}: run cancelled while logging in`);
      this.skipRemaining(
        outcomes,
        account.id,
        targets,
        'cancelled',
        'Skipped: run was cancelled during login',
      );
      return buildSummary(account, 'cancelled', outcomes, elapsed());
    }

    if (auth.status === 'failed') {
      const needsAttention = auth.reason === 'invalid_credentials';
      logger.warn(
        `${account.nim}: login failed (${auth.reason}) after ${auth.attemptNumber} attempt(s)` +
          (needsAttention ? ': credentials need attention' : ''),
      );
      for (const target of targets) {
        this.push(outcomes, {
          ...this.baseOutcome(account.id, target),
          status: 'failed',
          reason: auth.reason,
          message: `Login failed: ${auth.message}`,
          attemptNumber: auth.attemptNumber,
        });
      }
      return buildSummary(account, 'completed', outcomes, elapsed(), { needsAttention });
    }

    // ── Stage 3: ATTEMPT, in priority order ────────────────
    let state: RunState = 'completed';
    for (let i = 0; i < targets.length; i++) {
      const target = targets[i];

      if (signal?.aborted) {
        const cancelled = new OrchestrationError('cancelled', 'Skipped: run was cancelled before this target');
        this.skipRemaining(outcomes, account.id, targets.slice(i), 'cancelled', cancelled.message);
        state = 'cancelled';
        break;
      }

      const outcome = await this.attemptTarget(auth.session, target, enrollmentHash, signal);
      this.push(outcomes, outcome);
      logger.info(
        `${account.nim}: ${outcome.action} ${target.courseId} → ${outcome.status}` +
          (outcome.status === 'success' ? '' : ` (${outcome.reason})`) +
          ` after ${outcome.attemptNumber} attempt(s)`,
      );

      if (outcome.reason === 'invalid_hash') {
        this.skipRemaining(
          outcomes,
          account.id,
          targets.slice(i + 1),
          'invalid_hash',
          'Skipped: enrollment hash was rejected on an earlier target',
        );
        break;
      }
    }

    const summary = buildSummary(account, state, outcomes, elapsed());
    if (this.deps.verifyEnrollment && summary.success > 0) {
      await this.verify(auth.session);
    }
    return summary;
  }

  /**
   * Skip every resolved target without touching the network.  Used for
   * inactive accounts and for runs cancelled before this account started.
   */
  skipAll(
    account: Account,
    error: OrchestrationError,
    startedAt: number = Date.now(),
  ): RunSummary {
    const outcomes: AttemptOutcome[] = [];
    const inactive = error.reason === 'inactive_account_skipped';
    this.skipRemaining(
      outcomes,
      account.id,
      resolveTargets(account),
      inactive ? 'inactive' : 'cancelled',
      error.message,
    );

    return inactive
      ? buildSummary(account, 'skipped', outcomes, Date.now() - startedAt, { skipReason: 'inactive' })
      : buildSummary(account, 'cancelled', outcomes, Date.now() - startedAt);
  }

  // ── Internals ────────────────────────────────────────────

  private async tryAuthenticate(account: Account): Promise<AuthAttempt> {
    try {
      const session = await this.deps.sessionManager.authenticate(account);
      return { status: 'success', reason: 'authenticated', attemptNumber: 1, session };
    } catch (err) {
      if (err instanceof AuthError) {
        return { status: 'failed', reason: err.reason, attemptNumber: 1, message: err.message };
      }
      return {
        status: 'failed',
        reason: 'service_unavailable',
        attemptNumber: 1,
        message: describeError(err),
      };
    }
  }

  private async attemptTarget(
    session: Session,
    target: CourseTarget,
    enrollmentHash: string,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    try {
      return await executeWithRetry(
        () => this.deps.executor.attempt(session, target, enrollmentHash),
        this.deps.policy,
        signal,
      );
    } catch (err) {
      logger.error(`${session.nim}: unexpected failure on ${target.courseId}`, err);
      return {
        ...this.baseOutcome(session.accountId, target),
        status: 'failed',
        reason: 'unknown',
        message: describeError(err),
        attemptNumber: 1,
      };
    }
  }

  private skipRemaining(
    outcomes: AttemptOutcome[],
    accountId: string,
    targets: readonly CourseTarget[],
    reason: SkipReason,
    message: string,
  ): void {
    for (const target of targets) {
      this.push(outcomes, {
        ...this.baseOutcome(accountId, target),
        status: 'skipped',
        reason,
        message,
        attemptNumber: 0,
      });
    }
  }

  private push(outcomes: AttemptOutcome[], outcome: AttemptOutcome): void {
    outcomes.push(outcome);
    this.deps.outcomeLogger.record(outcome);
  }

  private baseOutcome(
    accountId: string,
    target: CourseTarget,
  ): Pick<AttemptOutcome, 'accountId' | 'courseId' | 'courseName' | 'action' | 'timestamp'> {
    return {
      accountId,
      courseId: target.courseId,
      courseName: target.courseName,
      action: target.action ?? 'add',
      timestamp: this.now().toISOString(),
    };
  }

  private async verify(session: Session): Promise<void> {
    if (!this.deps.client) return;
    try {
      const courses = await this.deps.client.getEnrolledCourses(session);
      logger.info(`${session.nim}: KRS now lists ${courses.length} course(s)`);
    } catch (err) {
      logger.warn(`${session.nim}: could not re-read KRS: ${describeError(err)}`);
    }
  }
}

export function cancelledBeforeStart(): OrchestrationError {
  return new OrchestrationError('cancelled', 'Skipped: run was cancelled before this account started');
}
