/**
 * types.ts — Shared type definitions for the enrollment engine.
 *
 * Every layer (remote client, agents, log store, orchestrator) agrees on the
 * shapes defined here.  Storage rows are snake_case and get mapped to these
 * camelCase shapes inside `services/supabaseService.ts`.
 */

// ─── Account ───────────────────────────────────────────────

export type AccountStatus = 'active' | 'inactive';

/**
 * Read-only view of a student account for one run.
 *
 * `credential` is the encrypted password exactly as stored.  It is only
 * decrypted inside the Session Manager.
 */
export interface Account {
  readonly id: string;
  /** Student ID (NIM), also the login username. */
  readonly nim: string;
  readonly name?: string;
  readonly credential: string;
  readonly status: AccountStatus;
  /** Stored targets in insertion order. */
  readonly targets: readonly CourseTarget[];
}

// ─── Course target ─────────────────────────────────────────

export type EnrollmentAction = 'add' | 'drop';

export interface CourseTarget {
  readonly id?: string;
  readonly accountId: string;
  readonly courseId: string;
  readonly courseName: string;
  /** Lower value = attempted earlier. */
  readonly priority: number;
  readonly autoEnroll: boolean;
  /** Defaults to `add` when absent. */
  readonly action?: EnrollmentAction;
}

// ─── Session ───────────────────────────────────────────────

/**
 * Authenticated session owned by exactly one account pipeline invocation.
 * Never cached or shared across accounts.
 */
export interface Session {
  readonly accountId: string;
  readonly nim: string;
  readonly token: string;
  /** Numeric student id the transaction endpoints expect. */
  readonly studentId: string;
  /** ISO timestamp. */
  readonly issuedAt: string;
  /** ISO timestamp, when the service told us. */
  readonly expiresAt?: string;
}

// ─── Outcome reasons ───────────────────────────────────────

export type AuthFailureReason =
  | 'invalid_credentials'
  | 'network_unreachable'
  | 'service_unavailable';

export type EnrollmentFailureReason =
  | 'already_enrolled'
  | 'class_full'
  | 'invalid_hash'
  | 'network_error'
  | 'timeout'
  | 'service_unavailable'
  | 'unknown';

export type SkipReason = 'inactive' | 'cancelled' | 'invalid_hash';

export type SuccessReason = 'enrolled' | 'dropped';

export type OutcomeReason =
  | SuccessReason
  | AuthFailureReason
  | EnrollmentFailureReason
  | SkipReason;

export type OutcomeStatus = 'success' | 'failed' | 'skipped';

// ─── Attempt outcome ───────────────────────────────────────

/** One immutable log record: a single attempt, failure or skip for a target. */
export interface AttemptOutcome {
  readonly accountId: string;
  readonly courseId: string;
  readonly courseName: string;
  readonly action: EnrollmentAction;
  readonly status: OutcomeStatus;
  readonly reason: OutcomeReason;
  /** Human-readable explanation, shown on the dashboard. */
  readonly message: string;
  /** 1-based; 0 when no call was made (skips). */
  readonly attemptNumber: number;
  /** ISO timestamp. */
  readonly timestamp: string;
}

// ─── Run summary ───────────────────────────────────────────

export type RunState = 'completed' | 'skipped' | 'cancelled';

export interface RunSummary {
  readonly accountId: string;
  readonly nim: string;
  readonly state: RunState;
  readonly skipReason?: 'inactive';
  /** Includes `already_enrolled` outcomes. */
  readonly success: number;
  readonly failed: number;
  readonly skipped: number;
  readonly alreadyEnrolled: number;
  /** Set when the service rejected the stored credentials. */
  readonly needsAttention: boolean;
  readonly durationMs: number;
  /** Outcomes in the order they were produced. */
  readonly outcomes: readonly AttemptOutcome[];
}

// ─── Log store ─────────────────────────────────────────────

/** An `AttemptOutcome` once persisted. */
export interface EnrollmentLogEntry extends AttemptOutcome {
  readonly id: string;
}

export interface LogQuery {
  accountId?: string;
  status?: OutcomeStatus;
  /** Defaults to 100. */
  limit?: number;
  /** Entries to skip from the newest end. */
  offset?: number;
}

export interface LogStatistics {
  total: number;
  success: number;
  failed: number;
  skipped: number;
  alreadyEnrolled: number;
  addActions: number;
  dropActions: number;
  /** 0.0 – 1.0 over non-skipped entries. */
  successRate: number;
}
