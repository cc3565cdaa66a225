/**
 * supabaseService.ts — Accounts, course targets and the enrollment log in Supabase.
 *
 * Tables (snake_case, as in the dashboard's schema):
 *   accounts         id, user_id, nim, name, password_encrypted, status, created_at
 *   course_targets   id, account_id, course_id, course_name, priority,
 *                    auto_enroll, action, created_at
 *   enrollment_logs  id, account_id, action, course_id, course_name, status,
 *                    reason, message, attempt_number, created_at
 *
 * The engine only reads accounts/targets and only appends to the log.
 * Rows come back untyped from PostgREST, so every row passes through a
 * mapper that checks the fields it needs.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { Logger } from '../core/logger';
import type {
  Account,
  AttemptOutcome,
  CourseTarget,
  EnrollmentLogEntry,
  LogQuery,
  OutcomeReason,
  OutcomeStatus,
} from '../core/types';
import type { LogStore } from './outcomeLogger';
import { isRecord } from './siramaClient';

const logger = new Logger('SupabaseService');

// ─── Row mappers ────────────────────────────────────────────

function text(row: Record<string, unknown>, column: string): string | undefined {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function requireText(row: Record<string, unknown>, column: string, table: string): string {
  const value = text(row, column);
  if (value === undefined) {
    throw new Error(`SupabaseService: ${table}.${column} is missing or not text`);
  }
  return value;
}

export function toCourseTarget(row: unknown): CourseTarget {
  if (!isRecord(row)) throw new Error('SupabaseService: course_targets row is not an object');
  return {
    id: text(row, 'id'),
    accountId: requireText(row, 'account_id', 'course_targets'),
    courseId: requireText(row, 'course_id', 'course_targets'),
    courseName: text(row, 'course_name') ?? '',
    priority: typeof row.priority === 'number' ? row.priority : Number(row.priority ?? 0),
    autoEnroll: row.auto_enroll === true,
    action: row.action === 'drop' ? 'drop' : 'add',
  };
}

export function toAccount(row: unknown, targets: readonly CourseTarget[]): Account {
  if (!isRecord(row)) throw new Error('SupabaseService: accounts row is not an object');
  return {
    id: requireText(row, 'id', 'accounts'),
    nim: requireText(row, 'nim', 'accounts'),
    name: text(row, 'name'),
    credential: requireText(row, 'password_encrypted', 'accounts'),
    status: row.status === 'active' ? 'active' : 'inactive',
    targets,
  };
}

export function toLogRow(outcome: AttemptOutcome): Record<string, string | number> {
  return {
    account_id: outcome.accountId,
    action: outcome.action,
    course_id: outcome.courseId,
    course_name: outcome.courseName,
    status: outcome.status,
    reason: outcome.reason,
    message: outcome.message,
    attempt_number: outcome.attemptNumber,
    created_at: outcome.timestamp,
  };
}

const STATUSES: readonly OutcomeStatus[] = ['success', 'failed', 'skipped'];
const REASONS: readonly OutcomeReason[] = [
  'enrolled', 'dropped',
  'invalid_credentials', 'network_unreachable', 'service_unavailable',
  'already_enrolled', 'class_full', 'invalid_hash', 'network_error', 'timeout', 'unknown',
  'inactive', 'cancelled',
];

export function toLogEntry(row: unknown): EnrollmentLogEntry {
  if (!isRecord(row)) throw new Error('SupabaseService: enrollment_logs row is not an object');

  const status = STATUSES.find((s) => s === row.status) ?? 'failed';
  const reason = REASONS.find((r) => r === row.reason) ?? 'unknown';

  return {
    id: requireText(row, 'id', 'enrollment_logs'),
    accountId: requireText(row, 'account_id', 'enrollment_logs'),
    courseId: requireText(row, 'course_id', 'enrollment_logs'),
    courseName: text(row, 'course_name') ?? '',
    action: row.action === 'drop' ? 'drop' : 'add',
    status,
    reason,
    message: text(row, 'message') ?? '',
    attemptNumber: typeof row.attempt_number === 'number' ? row.attempt_number : 0,
    timestamp: text(row, 'created_at') ?? '',
  };
}

// ─── Service ────────────────────────────────────────────────

export class SupabaseService implements LogStore {
  private client: SupabaseClient;

  /**
   * @param client - An existing Supabase client, OR `undefined` to build one
   *   from SUPABASE_URL + SUPABASE_KEY.
   */
  constructor(client?: SupabaseClient) {
    if (client) {
      this.client = client;
    } else {
      const url = process.env.SUPABASE_URL;
      const key = process.env.SUPABASE_KEY;

      if (!url || !key) {
        throw new Error(
          'SupabaseService: SUPABASE_URL and SUPABASE_KEY must be set in the ' +
            'environment.  See .env.example.',
        );
      }
      this.client = createClient(url, key);
    }
  }

  // ── Accounts + targets ───────────────────────────────────

  /**
   * Read accounts (optionally for one dashboard user) with their targets
   * attached in insertion order.
   */
  async loadAccounts(userId?: string): Promise<Account[]> {
    let accountsQuery = this.client
      .from('accounts')
      .select('id, nim, name, password_encrypted, status, created_at');
    if (userId) {
      accountsQuery = accountsQuery.eq('user_id', userId);
    }

    const { data: accountRows, error: accountsError } = await accountsQuery
      .order('created_at', { ascending: true });
    if (accountsError) {
      throw new Error(`SupabaseService.loadAccounts failed: ${accountsError.message}`);
    }

    const rows: unknown[] = accountRows ?? [];
    const ids = rows.map((row) => (isRecord(row) ? text(row, 'id') : undefined))
      .filter((id): id is string => id !== undefined);
    if (ids.length === 0) return [];

    const { data: targetRows, error: targetsError } = await this.client
      .from('course_targets')
      .select('*')
      .in('account_id', ids)
      .order('created_at', { ascending: true })
      .order('id', { ascending: true });
    if (targetsError) {
      throw new Error(`SupabaseService.loadAccounts (targets) failed: ${targetsError.message}`);
    }

    const byAccount = new Map<string, CourseTarget[]>();
    const targetList: unknown[] = targetRows ?? [];
    for (const row of targetList) {
      const target = toCourseTarget(row);
      const list = byAccount.get(target.accountId) ?? [];
      list.push(target);
      byAccount.set(target.accountId, list);
    }

    const accounts = rows.map((row) => {
      const id = isRecord(row) ? text(row, 'id') : undefined;
      return toAccount(row, (id ? byAccount.get(id) : undefined) ?? []);
    });

    logger.info(
      `Loaded ${accounts.length} account(s) with ${targetList.length} target(s)`,
    );
    return accounts;
  }

  // ── Enrollment log (LogStore) ────────────────────────────

  async append(outcome: AttemptOutcome): Promise<EnrollmentLogEntry> {
    const { data, error } = await this.client
      .from('enrollment_logs')
      .insert(toLogRow(outcome))
      .select('*')
      .single();

    if (error) {
      throw new Error(`SupabaseService.append failed: ${error.message}`);
    }
    return toLogEntry(data);
  }

  async list(query: LogQuery): Promise<EnrollmentLogEntry[]> {
    let request = this.client.from('enrollment_logs').select('*');
    if (query.accountId) {
      request = request.eq('account_id', query.accountId);
    }
    if (query.status) {
      request = request.eq('status', query.status);
    }

    const ordered = request
      .order('created_at', { ascending: false })
      .order('id', { ascending: false });
    const from = query.offset ?? 0;
    const { data, error } = query.limit === undefined
      ? await (from > 0 ? ordered.range(from, Number.MAX_SAFE_INTEGER) : ordered)
      : await ordered.range(from, from + query.limit - 1);

    if (error) {
      throw new Error(`SupabaseService.list failed: ${error.message}`);
    }
    const rows: unknown[] = data ?? [];
    return rows.map(toLogEntry);
  }
}
