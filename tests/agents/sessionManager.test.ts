import { DateTime } from 'luxon';
import { SessionManager, resolveExpiry } from '../../src/agents/sessionManager';
import { AuthError } from '../../src/core/errors';
import { fakeClient, makeAccount, testCipher } from '../helpers/fakes';

const NOW = DateTime.fromISO('2026-08-01T01:00:00.000Z', { zone: 'utc' });

describe('SessionManager.authenticate', () => {
  const account = makeAccount('acct-1', '1234567890', ['18285']);

  it('logs in with the decrypted password and reads the student id', async () => {
    const client = fakeClient();
    const manager = new SessionManager(client, testCipher, () => NOW);

    const session = await manager.authenticate(account);

    expect(client.login).toHaveBeenCalledWith('1234567890', 'test-password');
    expect(client.getProfile).toHaveBeenCalledWith('test-token');
    expect(session).toEqual({
      accountId: 'acct-1',
      nim: '1234567890',
      token: 'test-token',
      studentId: '990001',
      issuedAt: '2026-08-01T01:00:00.000Z',
      expiresAt: '2026-08-01T02:00:00.000Z',
    });
  });

  it('returns a new session on every call', async () => {
    const client = fakeClient();
    const manager = new SessionManager(client, testCipher, () => NOW);

    const first = await manager.authenticate(account);
    const second = await manager.authenticate(account);

    expect(first).not.toBe(second);
    expect(client.login).toHaveBeenCalledTimes(2);
  });

  it('fails with invalid_credentials when the credential cannot be decrypted', async () => {
    const client = fakeClient();
    const manager = new SessionManager(client, testCipher, () => NOW);

    await expect(
      manager.authenticate({ ...account, credential: 'not-a-handle' }),
    ).rejects.toMatchObject({
      reason: 'invalid_credentials',
      message: 'Stored credential could not be decrypted: bad handle',
    });
    expect(client.login).not.toHaveBeenCalled();
  });

  it('passes login failures through unchanged', async () => {
    const failure = new AuthError('network_unreachable', 'Login request failed: ECONNRESET');
    const client = fakeClient({
      login: async () => {
        throw failure;
      },
    });
    const manager = new SessionManager(client, testCipher, () => NOW);

    await expect(manager.authenticate(account)).rejects.toBe(failure);
    expect(client.getProfile).not.toHaveBeenCalled();
  });
});

describe('resolveExpiry', () => {
  it('treats small values as seconds-to-live', () => {
    expect(resolveExpiry(900, NOW)).toBe('2026-08-01T01:15:00.000Z');
  });

  it('treats large values as epoch seconds', () => {
    expect(resolveExpiry(1785542400, NOW)).toBe('2026-08-01T00:00:00.000Z');
  });

  it('returns undefined when there is no usable hint', () => {
    expect(resolveExpiry(undefined, NOW)).toBeUndefined();
    expect(resolveExpiry(0, NOW)).toBeUndefined();
  });
});
