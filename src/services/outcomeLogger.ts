/**
 * outcomeLogger.ts — Append-only record of every attempt, plus statistics.
 *
 * `record()` is fire-and-forget for the pipelines: it starts the append and
 * returns immediately.  Pending appends are tracked so the orchestrator can
 * `flush()` before it reports, and append failures are logged, not thrown
 * into a pipeline.
 *
 * Each outcome becomes its own row; recording the same outcome twice yields
 * two rows.  Nothing is ever updated in place.
 */

import { describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  AttemptOutcome,
  EnrollmentLogEntry,
  LogQuery,
  LogStatistics,
} from '../core/types';

const logger = new Logger('OutcomeLogger');

/** Storage port for the enrollment log. */
export interface LogStore {
  append(outcome: AttemptOutcome): Promise<EnrollmentLogEntry>;
  /**
   * Newest first; `limit` undefined means no limit, though a backend may
   * still cap a single call.
   */
  list(query: LogQuery): Promise<EnrollmentLogEntry[]>;
}

export const DEFAULT_QUERY_LIMIT = 100;

/** PostgREST returns at most 1000 rows per request by default. */
export const SUMMARY_PAGE_SIZE = 1000;

export function computeStatistics(entries: readonly AttemptOutcome[]): LogStatistics {
  const count = (predicate: (entry: AttemptOutcome) => boolean): number =>
    entries.filter(predicate).length;

  const success = count((e) => e.status === 'success');
  const failed = count((e) => e.status === 'failed');
  const skipped = count((e) => e.status === 'skipped');
  const alreadyEnrolled = count((e) => e.reason === 'already_enrolled');

  const attempted = success + failed;
  return {
    total: entries.length,
    success,
    failed,
    skipped,
    alreadyEnrolled,
    addActions: count((e) => e.action === 'add'),
    dropActions: count((e) => e.action === 'drop'),
    successRate: attempted === 0 ? 0 : (success + alreadyEnrolled) / attempted,
  };
}

export class OutcomeLogger {
  private readonly store: LogStore;
  private readonly pageSize: number;
  private readonly pending = new Set<Promise<void>>();

  /** `pageSize` must not exceed the store's per-call row cap. */
  constructor(store: LogStore, options: { pageSize?: number } = {}) {
    this.store = store;
    this.pageSize = Math.max(1, options.pageSize ?? SUMMARY_PAGE_SIZE);
  }

  /** Start appending `outcome`; never throws. */
  record(outcome: AttemptOutcome): void {
    const write = this.store
      .append(outcome)
      .then(() => undefined)
      .catch((err: unknown) => {
        logger.error(
          `Failed to record ${outcome.status}/${outcome.reason} for course ` +
            `${outcome.courseId} (account ${outcome.accountId}): ${describeError(err)}`,
          err,
        );
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  /** Resolve once every append started so far has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Reverse-chronological entries, filtered by account and/or status. */
  query(query: LogQuery = {}): Promise<EnrollmentLogEntry[]> {
    return this.store.list({ ...query, limit: query.limit ?? DEFAULT_QUERY_LIMIT });
  }

  /** Statistics for one account, or for every account when omitted. */
  async summarize(accountId?: string): Promise<LogStatistics> {
    const entries: EnrollmentLogEntry[] = [];
    for (;;) {
      const page = await this.store.list({
        accountId,
        limit: this.pageSize,
        offset: entries.length,
      });
      entries.push(...page);
      if (page.length < this.pageSize) break;
    }
    return computeStatistics(entries);
  }
}
