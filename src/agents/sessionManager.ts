/**
 * sessionManager.ts — Fresh, per-run authentication for one account.
 *
 * Flow:
 *   1. Decrypt the stored credential (the only place it ever exists in clear).
 *   2. Log in → bearer token + optional expiry.
 *   3. Read the profile → numeric student id the transaction endpoints need.
 *
 * No session table: every call returns a new `Session` value owned by the
 * caller, so nothing survives between runs or leaks across accounts.
 */

import { DateTime } from 'luxon';
import type { CredentialCipher } from '../core/credentialCipher';
import { AuthError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Account, Session } from '../core/types';
import type { RegistrationService } from '../services/siramaClient';

const logger = new Logger('SessionManager');

/** `expires` values above this are epoch seconds; below, seconds-to-live. */
const EPOCH_SECONDS_THRESHOLD = 1_000_000_000;

/** Turn the service's `expires` hint into an ISO timestamp. */
export function resolveExpiry(
  expires: number | undefined,
  now: DateTime = DateTime.utc(),
): string | undefined {
  if (expires === undefined || expires <= 0) return undefined;

  const expiry = expires > EPOCH_SECONDS_THRESHOLD
    ? DateTime.fromSeconds(expires, { zone: 'utc' })
    : now.plus({ seconds: expires });
  return expiry.toISO() ?? undefined;
}

export class SessionManager {
  private readonly client: RegistrationService;
  private readonly cipher: CredentialCipher;
  private readonly clock: () => DateTime;

  constructor(
    client: RegistrationService,
    cipher: CredentialCipher,
    clock: () => DateTime = () => DateTime.utc(),
  ) {
    this.client = client;
    this.cipher = cipher;
    this.clock = clock;
  }

  /**
   * Establish a session for `account`.
   *
   * @throws AuthError `invalid_credentials` (terminal), or
   *   `network_unreachable` / `service_unavailable` (transient).
   */
  async authenticate(account: Account): Promise<Session> {
    let password: string;
    try {
      password = this.cipher.decrypt(account.credential);
    } catch (err) {
      throw new AuthError(
        'invalid_credentials',
        `Stored credential could not be decrypted: ${describeError(err)}`,
      );
    }

    logger.info(`Logging in ${account.nim}…`);
    const login = await this.client.login(account.nim, password);
    const profile = await this.client.getProfile(login.token);

    const now = this.clock();
    const session: Session = {
      accountId: account.id,
      nim: account.nim,
      token: login.token,
      studentId: profile.studentId,
      issuedAt: now.toISO() ?? new Date().toISOString(),
      expiresAt: resolveExpiry(login.expires, now),
    };

    logger.info(
      `Session ready for ${account.nim}` +
        (session.expiresAt ? ` (expires ${session.expiresAt})` : ''),
    );
    return session;
  }
}
