/**
 * agents/index.ts — Barrel export for the enrollment layer.
 *
 * `middleware/` holds stateless request-level concerns (fetch, throttling,
 * response checks).  `agents/` holds the modules that reason about one
 * account's run as a whole:
 *   • Target Resolver   : which courses, in which order
 *   • Session Manager   : credential decryption + login
 *   • Enrollment Executor: one attempt, one classified outcome
 *   • Retry Controller  : backoff around attempts and logins
 *   • Account Pipeline  : the per-account sequence
 */

export { resolveTargets } from './targetResolver';

export { SessionManager, resolveExpiry } from './sessionManager';

export {
  EnrollmentExecutor,
  classifyEnrollmentResponse,
  classifyThrown,
} from './enrollmentExecutor';
export type { EnrollmentVerdict } from './enrollmentExecutor';

export {
  executeWithRetry,
  createRetryPolicy,
  zeroDelayPolicy,
  computeBackoff,
  classifyReason,
  sleep,
} from './retryController';
export type { RetryPolicy, FailureClass, Attempt } from './retryController';

export { AccountPipeline, buildSummary, cancelledBeforeStart } from './accountPipeline';
export type { AccountPipelineDeps } from './accountPipeline';
