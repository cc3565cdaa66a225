import { loadEngineConfig } from '../../src/core/config';
import { AuthError, TransportError } from '../../src/core/errors';
import { clearRateLimiters } from '../../src/middleware/compliance';
import type { HttpTransport, LightFetchResult } from '../../src/middleware/lightFetcher';
import { SiramaClient } from '../../src/services/siramaClient';
import { makeSession } from '../helpers/fakes';

const AUTH = 'https://auth-v2.telkomuniversity.ac.id';
const SERVICE = 'https://service-v2.telkomuniversity.ac.id';

function reply(statusCode: number, body: unknown): LightFetchResult {
  return { statusCode, body: typeof body === 'string' ? body : JSON.stringify(body) };
}

function clientAnswering(...results: Array<LightFetchResult | Error>) {
  const transport = jest.fn<ReturnType<HttpTransport>, Parameters<HttpTransport>>();
  for (const result of results) {
    if (result instanceof Error) {
      transport.mockRejectedValueOnce(result);
    } else {
      transport.mockResolvedValueOnce(result);
    }
  }
  return { transport, client: new SiramaClient(loadEngineConfig({}), transport) };
}

afterAll(async () => {
  await clearRateLimiters();
});

describe('SiramaClient.login', () => {
  it('reads the token and expiry from the current response shape', async () => {
    const { client, transport } = clientAnswering(
      reply(200, { meta: { status: 200, message: 'OK' }, token: 'test-token', expires: 3600 }),
    );

    await expect(client.login('1234567890', 'test-password')).resolves.toEqual({
      token: 'test-token',
      expires: 3600,
    });
    expect(transport).toHaveBeenCalledWith(
      `${AUTH}/api/oauth/issueauth`,
      expect.objectContaining({
        method: 'POST',
        form: { username: '1234567890', password: 'test-password' },
        timeout: 30000,
      }),
    );
  });

  it('accepts the older access_token shape', async () => {
    const { client } = clientAnswering(
      reply(200, { access_token: 'legacy-token', expires_in: 7200 }),
    );

    await expect(client.login('1234567890', 'test-password')).resolves.toEqual({
      token: 'legacy-token',
      expires: 7200,
    });
  });

  it('rejects HTTP 401 as invalid credentials with the server message', async () => {
    const { client } = clientAnswering(reply(401, { meta: { status: 401, message: 'Wrong password' } }));

    const failure = client.login('1234567890', 'test-password');

    await expect(failure).rejects.toBeInstanceOf(AuthError);
    await expect(failure).rejects.toMatchObject({
      reason: 'invalid_credentials',
      message: 'Wrong password',
    });
  });

  it('treats a 200 without a token as invalid credentials', async () => {
    const { client } = clientAnswering(reply(200, { meta: { status: 401, message: 'Invalid username' } }));

    await expect(client.login('1234567890', 'test-password')).rejects.toMatchObject({
      reason: 'invalid_credentials',
      message: 'Invalid username',
    });
  });

  it('reports 5xx as service_unavailable', async () => {
    const { client } = clientAnswering(reply(503, 'Service Unavailable'));

    await expect(client.login('1234567890', 'test-password')).rejects.toMatchObject({
      reason: 'service_unavailable',
      message: 'Login endpoint answered HTTP 503',
    });
  });

  it('reports transport failures as network_unreachable', async () => {
    const { client } = clientAnswering(new TransportError('network', 'getaddrinfo ENOTFOUND'));

    await expect(client.login('1234567890', 'test-password')).rejects.toMatchObject({
      reason: 'network_unreachable',
      message: 'Login request failed: getaddrinfo ENOTFOUND',
    });
  });
});

describe('SiramaClient.getProfile', () => {
  it('reads numberid with a bearer token', async () => {
    const { client, transport } = clientAnswering(
      reply(200, { numberid: 990001, fullname: 'Test Student' }),
    );

    await expect(client.getProfile('test-token')).resolves.toEqual({
      studentId: '990001',
      fullName: 'Test Student',
    });
    expect(transport).toHaveBeenCalledWith(
      `${SERVICE}/read/api/read/issueprofile`,
      expect.objectContaining({
        headers: expect.objectContaining({ authorization: 'Bearer test-token' }),
      }),
    );
  });

  it('fails with service_unavailable when the profile has no student id', async () => {
    const { client } = clientAnswering(reply(200, { fullname: 'Test Student' }));

    await expect(client.getProfile('test-token')).rejects.toMatchObject({
      reason: 'service_unavailable',
      message: 'Profile response has no student id',
    });
  });
});

describe('SiramaClient transactions', () => {
  const session = makeSession();

  it('posts an add as a form to the hash endpoint', async () => {
    const { client, transport } = clientAnswering(reply(200, { status: 'Success' }));

    const response = await client.addCourse(session, '18285', 'hash-1');

    expect(response).toEqual({
      statusCode: 200,
      payload: { status: 'Success' },
      rawBody: '{"status":"Success"}',
    });
    expect(transport).toHaveBeenCalledWith(
      `${SERVICE}/trans/api/transaction/hash-1`,
      expect.objectContaining({
        method: 'POST',
        form: { studentid: '990001', courseid: '18285' },
      }),
    );
  });

  it('deletes a drop with course, student and flag in the path', async () => {
    const { client, transport } = clientAnswering(reply(200, { status: 'Success' }));

    await client.dropCourse(session, '18290', 'hash-1');

    expect(transport).toHaveBeenCalledWith(
      `${SERVICE}/trans/api/transaction/hash-1/18290/990001/1`,
      expect.objectContaining({ method: 'DELETE' }),
    );
  });

  it('keeps a non-JSON body as rawBody with no payload', async () => {
    const { client } = clientAnswering(reply(502, 'Bad Gateway'));

    await expect(client.addCourse(session, '18285', 'hash-1')).resolves.toEqual({
      statusCode: 502,
      payload: undefined,
      rawBody: 'Bad Gateway',
    });
  });

  it('lets transport errors through to the executor', async () => {
    const timeout = new TransportError('timeout', 'Request timed out');
    const { client } = clientAnswering(timeout);

    await expect(client.addCourse(session, '18285', 'hash-1')).rejects.toBe(timeout);
  });
});

describe('SiramaClient.getEnrolledCourses', () => {
  const session = makeSession();

  it('returns the array payload', async () => {
    const { client } = clientAnswering(reply(200, [{ courseid: '18285' }]));

    await expect(client.getEnrolledCourses(session)).resolves.toEqual([{ courseid: '18285' }]);
  });

  it('returns an empty list for a non-array payload', async () => {
    const { client } = clientAnswering(reply(200, { data: null }));

    await expect(client.getEnrolledCourses(session)).resolves.toEqual([]);
  });

  it('throws on a non-2xx reply', async () => {
    const { client } = clientAnswering(reply(500, 'oops'));

    await expect(client.getEnrolledCourses(session)).rejects.toThrow(
      'Enrolled-courses endpoint answered HTTP 500',
    );
  });
});
