/**
 * Shared fakes for the enrollment engine tests.  Nothing here touches the
 * network: the registration service, cipher and log store all run in process.
 */

import { AccountPipeline } from '../../src/agents/accountPipeline';
import { EnrollmentExecutor } from '../../src/agents/enrollmentExecutor';
import { zeroDelayPolicy, type RetryPolicy } from '../../src/agents/retryController';
import { SessionManager } from '../../src/agents/sessionManager';
import type { CredentialCipher } from '../../src/core/credentialCipher';
import type { Account, CourseTarget, Session } from '../../src/core/types';
import { OutcomeLogger } from '../../src/services/outcomeLogger';
import { InMemoryLogStore } from '../../src/services/inMemoryLogStore';
import type { RegistrationService, RemoteResponse } from '../../src/services/siramaClient';

export const FIXED_NOW = new Date('2026-08-01T01:00:00.000Z');

/** Handles look like `enc:<password>`; anything else fails to decrypt. */
export const testCipher: CredentialCipher = {
  encrypt: (plaintext) => `enc:${plaintext}`,
  decrypt: (handle) => {
    if (!handle.startsWith('enc:')) throw new Error('bad handle');
    return handle.slice('enc:'.length);
  },
};

export function makeTarget(
  accountId: string,
  courseId: string,
  priority: number,
  extra: Partial<CourseTarget> = {},
): CourseTarget {
  return {
    accountId,
    courseId,
    courseName: `Course ${courseId}`,
    priority,
    autoEnroll: true,
    ...extra,
  };
}

export function makeAccount(
  id: string,
  nim: string,
  courseIds: string[],
  extra: Partial<Account> = {},
): Account {
  return {
    id,
    nim,
    credential: 'enc:test-password',
    status: 'active',
    targets: courseIds.map((courseId, i) => makeTarget(id, courseId, i + 1)),
    ...extra,
  };
}

export function makeSession(accountId = 'acct-1', nim = '1234567890'): Session {
  return {
    accountId,
    nim,
    token: 'test-token',
    studentId: '990001',
    issuedAt: FIXED_NOW.toISOString(),
  };
}

export function jsonResponse(payload: unknown, statusCode = 200): RemoteResponse {
  return { statusCode, payload, rawBody: JSON.stringify(payload) };
}

export const SUCCESS = jsonResponse({ status: 'Success', message: 'Success record registration' });
export const CLASS_FULL = jsonResponse({ status: 'Failed', message: 'Kelas sudah penuh' });

const defaults: RegistrationService = {
  login: async () => ({ token: 'test-token', expires: 3600 }),
  getProfile: async () => ({ studentId: '990001', fullName: 'Test Student' }),
  addCourse: async () => SUCCESS,
  dropCourse: async () => jsonResponse({ status: 'Success' }),
  getEnrolledCourses: async () => [],
};

/** A RegistrationService whose every method is a jest mock. */
export function fakeClient(overrides: Partial<RegistrationService> = {}) {
  return {
    login: jest.fn(overrides.login ?? defaults.login),
    getProfile: jest.fn(overrides.getProfile ?? defaults.getProfile),
    addCourse: jest.fn(overrides.addCourse ?? defaults.addCourse),
    dropCourse: jest.fn(overrides.dropCourse ?? defaults.dropCourse),
    getEnrolledCourses: jest.fn(overrides.getEnrolledCourses ?? defaults.getEnrolledCourses),
  };
}

export interface PipelineFixture {
  pipeline: AccountPipeline;
  store: InMemoryLogStore;
  outcomeLogger: OutcomeLogger;
}

export function buildPipeline(
  client: RegistrationService,
  options: { policy?: RetryPolicy; verifyEnrollment?: boolean } = {},
): PipelineFixture {
  const store = new InMemoryLogStore();
  const outcomeLogger = new OutcomeLogger(store);
  const pipeline = new AccountPipeline({
    sessionManager: new SessionManager(client, testCipher),
    executor: new EnrollmentExecutor(client, () => FIXED_NOW),
    outcomeLogger,
    policy: options.policy ?? zeroDelayPolicy(),
    client,
    verifyEnrollment: options.verifyEnrollment,
    now: () => FIXED_NOW,
  });
  return { pipeline, store, outcomeLogger };
}
