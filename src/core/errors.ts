/**
 * errors.ts — Error taxonomy of the enrollment engine.
 *
 * Only `TransportError` and `AuthError` are ever thrown across module
 * boundaries.  `EnrollmentError` and `OrchestrationError` are carried as
 * values and end up as recorded outcomes; a run never rejects because of them.
 */

import type { AuthFailureReason, EnrollmentFailureReason } from './types';

export type TransportFailureKind = 'timeout' | 'network';

/** The HTTP call never produced a response. */
export class TransportError extends Error {
  public readonly kind: TransportFailureKind;

  constructor(kind: TransportFailureKind, message: string) {
    super(message);
    this.name = 'TransportError';
    this.kind = kind;
  }
}

export class AuthError extends Error {
  public readonly reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, message: string) {
    super(message);
    this.name = 'AuthError';
    this.reason = reason;
  }
}

export class EnrollmentError extends Error {
  public readonly reason: EnrollmentFailureReason;

  constructor(reason: EnrollmentFailureReason, message: string) {
    super(message);
    this.name = 'EnrollmentError';
    this.reason = reason;
  }
}

export type OrchestrationFailureReason = 'cancelled' | 'inactive_account_skipped';

export class OrchestrationError extends Error {
  public readonly reason: OrchestrationFailureReason;

  constructor(reason: OrchestrationFailureReason, message: string) {
    super(message);
    this.name = 'OrchestrationError';
    this.reason = reason;
  }
}

/** Best-effort message extraction for values caught from `unknown`. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}
