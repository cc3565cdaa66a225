/**
 * inMemoryLogStore.ts — Process-local LogStore for tests and dry runs.
 *
 * `append` pushes onto an array and never touches earlier entries, so
 * concurrent pipelines cannot lose each other's records.
 */

import type { AttemptOutcome, EnrollmentLogEntry, LogQuery } from '../core/types';
import type { LogStore } from './outcomeLogger';

export class InMemoryLogStore implements LogStore {
  private readonly entries: EnrollmentLogEntry[] = [];

  async append(outcome: AttemptOutcome): Promise<EnrollmentLogEntry> {
    const entry: EnrollmentLogEntry = { ...outcome, id: String(this.entries.length + 1) };
    this.entries.push(entry);
    return entry;
  }

  async list(query: LogQuery): Promise<EnrollmentLogEntry[]> {
    const matching = this.entries
      .filter((e) => query.accountId === undefined || e.accountId === query.accountId)
      .filter((e) => query.status === undefined || e.status === query.status)
      .reverse();
    const from = query.offset ?? 0;
    return matching.slice(from, query.limit === undefined ? undefined : from + query.limit);
  }

  /** Insertion order, oldest first. */
  all(): readonly EnrollmentLogEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
