/**
 * enrollmentOrchestrator.ts — Run enrollment for many accounts at once.
 *
 * ARCHITECTURE OVERVIEW
 * ─────────────────────
 *   Orchestrator ── Bottleneck(maxConcurrent = concurrencyLimit)
 *        │
 *        ├─ AccountPipeline(account A) ─ SessionManager → RetryController(Executor) …
 *        ├─ AccountPipeline(account B) ─ …
 *        └─ …
 *                        every outcome → OutcomeLogger → LogStore (Supabase)
 *
 * Accounts are independent: each pipeline owns its session, and the only
 * thing they share is the append-only outcome log.  One account failing to
 * log in, or the hash being rejected for it, never changes another's result.
 *
 * Inactive accounts are reported as `skipped: inactive` without a single
 * network call.  `cancel()` (or an aborted caller signal) lets in-flight
 * attempts finish and records the rest as `skipped: cancelled`.
 */

import Bottleneck from 'bottleneck';
import {
  AccountPipeline,
  EnrollmentExecutor,
  SessionManager,
  buildSummary,
  createRetryPolicy,
  resolveTargets,
  type RetryPolicy,
} from './agents';
import { loadEngineConfig, type EngineConfig } from './core/config';
import { AesGcmCipher, type CredentialCipher } from './core/credentialCipher';
import { OrchestrationError, describeError } from './core/errors';
import { Logger } from './core/logger';
import type { Account, AttemptOutcome, RunSummary } from './core/types';
import { clearRateLimiters } from './middleware';
import { OutcomeLogger, type LogStore } from './services/outcomeLogger';
import { SiramaClient, type RegistrationService } from './services/siramaClient';
import { SupabaseService } from './services/supabaseService';

const logger = new Logger('Orchestrator');

export interface RunAllOptions {
  /** Caller-side cancellation (timeout, shutdown). */
  signal?: AbortSignal;
}

export class EnrollmentOrchestrator {
  private readonly pipeline: AccountPipeline;
  private readonly outcomeLogger: OutcomeLogger;
  private readonly launchSpacingMs: number;
  private readonly inFlight = new Set<AbortController>();

  /**
   * @param launchSpacingMs - Minimum gap between two pipeline starts.
   */
  constructor(pipeline: AccountPipeline, outcomeLogger: OutcomeLogger, launchSpacingMs = 0) {
    this.pipeline = pipeline;
    this.outcomeLogger = outcomeLogger;
    this.launchSpacingMs = Number.isFinite(launchSpacingMs) ? Math.max(0, launchSpacingMs) : 0;
  }

  /**
   * Run every active account's pipeline, at most `concurrencyLimit` at once.
   *
   * Always resolves, with one summary per input account (keyed by account
   * id, in input order), after every launched pipeline has finished and
   * every outcome has been handed to the log store.  Account ids must be
   * unique: a repeated id is ignored after its first entry.
   */
  async runAll(
    accounts: readonly Account[],
    enrollmentHash: string,
    concurrencyLimit: number,
    options: RunAllOptions = {},
  ): Promise<Map<string, RunSummary>> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }
    this.inFlight.add(controller);

    const limit = normalizeConcurrency(concurrencyLimit);
    const limiter = new Bottleneck({ maxConcurrent: limit, minTime: this.launchSpacingMs });

    const unique = firstById(accounts);
    const active = unique.filter((a) => a.status === 'active');
    logger.info(
      `Launching ${active.length} account pipeline(s) with concurrency ${limit} ` +
        `(${unique.length - active.length} inactive skipped)`,
    );

    try {
      const settled = await Promise.allSettled(
        active.map((account) =>
          limiter.schedule(() => this.pipeline.run(account, enrollmentHash, controller.signal)),
        ),
      );

      const byId = new Map<string, RunSummary>();
      settled.forEach((result, i) => {
        const account = active[i];
        byId.set(
          account.id,
          result.status === 'fulfilled' ? result.value : this.crashed(account, result.reason),
        );
      });

      const summaries = new Map<string, RunSummary>();
      for (const account of unique) {
        const summary = byId.get(account.id) ?? this.pipeline.skipAll(
          account,
          new OrchestrationError('inactive_account_skipped', 'Skipped: account is inactive'),
        );
        summaries.set(account.id, summary);
      }

      await this.outcomeLogger.flush();
      logRunTotals(summaries, controller.signal.aborted);
      return summaries;
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
      this.inFlight.delete(controller);
      await limiter.disconnect();
    }
  }

  /** Cooperatively cancel every run currently in progress. */
  cancel(): void {
    if (this.inFlight.size > 0) {
      logger.warn(`Cancelling ${this.inFlight.size} run(s)…`);
    }
    for (const controller of this.inFlight) {
      controller.abort();
    }
  }

  /** A pipeline rejected (should not happen): fail its targets as `unknown`. */
  private crashed(account: Account, reason: unknown): RunSummary {
    logger.error(`Pipeline for ${account.nim} crashed`, reason);
    const outcomes = resolveTargets(account).map((target): AttemptOutcome => ({
      accountId: account.id,
      courseId: target.courseId,
      courseName: target.courseName,
      action: target.action ?? 'add',
      status: 'failed',
      reason: 'unknown',
      message: `Pipeline crashed: ${describeError(reason)}`,
      attemptNumber: 0,
      timestamp: new Date().toISOString(),
    }));
    outcomes.forEach((outcome) => this.outcomeLogger.record(outcome));
    return buildSummary(account, 'completed', outcomes, 0);
  }
}

function firstById(accounts: readonly Account[]): Account[] {
  const seen = new Set<string>();
  return accounts.filter((account) => {
    if (seen.has(account.id)) {
      logger.warn(`Account ${account.id} (${account.nim}) is listed more than once, ignoring the repeat`);
      return false;
    }
    seen.add(account.id);
    return true;
  });
}

/** At least 1; anything that is not a finite number runs one at a time. */
export function normalizeConcurrency(concurrencyLimit: number): number {
  if (!Number.isFinite(concurrencyLimit)) {
    logger.warn(`Concurrency limit ${concurrencyLimit} is not a number, running one account at a time`);
    return 1;
  }
  return Math.max(1, Math.floor(concurrencyLimit));
}

function logRunTotals(summaries: Map<string, RunSummary>, cancelled: boolean): void {
  let success = 0;
  let failed = 0;
  let skipped = 0;
  for (const summary of summaries.values()) {
    success += summary.success;
    failed += summary.failed;
    skipped += summary.skipped;
  }
  logger.info(
    `Run ${cancelled ? 'cancelled' : 'complete'}: ${summaries.size} account(s), ` +
      `${success} success, ${failed} failed, ${skipped} skipped`,
  );
}

// ─── Wiring ────────────────────────────────────────────────

export interface EngineOverrides {
  client?: RegistrationService;
  cipher?: CredentialCipher;
  store?: LogStore;
  policy?: RetryPolicy;
}

export interface Engine {
  orchestrator: EnrollmentOrchestrator;
  outcomeLogger: OutcomeLogger;
}

/** Build the full engine from config; any collaborator can be swapped. */
export function createEnrollmentEngine(
  config: EngineConfig,
  overrides: EngineOverrides = {},
): Engine {
  const client = overrides.client ?? new SiramaClient(config);
  const cipher = overrides.cipher ?? AesGcmCipher.fromKey(config.encryptionKey);
  const store = overrides.store ?? new SupabaseService();
  const outcomeLogger = new OutcomeLogger(store);

  const pipeline = new AccountPipeline({
    sessionManager: new SessionManager(client, cipher),
    executor: new EnrollmentExecutor(client),
    outcomeLogger,
    policy: overrides.policy ?? createRetryPolicy(config.retry),
    client,
    verifyEnrollment: config.verifyEnrollment,
  });

  return {
    orchestrator: new EnrollmentOrchestrator(pipeline, outcomeLogger, config.accountLaunchSpacingMs),
    outcomeLogger,
  };
}

// ─── CLI entry point ───────────────────────────────────────
//   node dist/src/enrollmentOrchestrator.js <ENROLLMENT_HASH> [CONCURRENCY] [USER_ID]

async function main(argv: string[]): Promise<number> {
  const [enrollmentHash, concurrencyArg, userId] = argv;
  if (!enrollmentHash) {
    console.error(
      'Usage: node dist/src/enrollmentOrchestrator.js <ENROLLMENT_HASH> [CONCURRENCY] [USER_ID]',
    );
    return 1;
  }

  const config = loadEngineConfig();
  const supabase = new SupabaseService();
  const { orchestrator } = createEnrollmentEngine(config, { store: supabase });

  const stop = (): void => orchestrator.cancel();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const accounts = await supabase.loadAccounts(userId);
    const parsed = concurrencyArg ? parseInt(concurrencyArg, 10) : NaN;
    const concurrency = Number.isFinite(parsed) ? parsed : config.concurrencyLimit;
    const summaries = await orchestrator.runAll(accounts, enrollmentHash, concurrency);

    const report = [...summaries.values()].map(({ outcomes, ...summary }) => ({
      ...summary,
      attempts: outcomes.length,
    }));
    console.log(JSON.stringify(report, null, 2));
    return 0;
  } finally {
    process.removeListener('SIGINT', stop);
    process.removeListener('SIGTERM', stop);
    await clearRateLimiters();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('Enrollment run failed', err);
      process.exitCode = 1;
    });
}
