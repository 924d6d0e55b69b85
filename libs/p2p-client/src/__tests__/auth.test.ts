import { beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import type { HttpTransport, RawHttpResponse } from '@libs/p2p-http-core';
import { P2PAuthError, authenticate } from '../auth';

const AUTH_URL = 'https://auth.p2p.test/login';

function textResponse(status: number, text: string): RawHttpResponse {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return { status, headers: {}, body: buffer };
}

describe('authenticate', () => {
  let transport: Mock<HttpTransport>;

  beforeEach(() => {
    transport = vi.fn<HttpTransport>();
  });

  it('posts the credentials and returns the user', async () => {
    transport.mockResolvedValue(
      textResponse(200, JSON.stringify({ p2p_user: { username: 'editor', email: 'editor@example.com' } }))
    );

    const user = await authenticate({ username: 'editor', password: 'test-secret', authUrl: AUTH_URL, transport });

    expect(user).toEqual({ username: 'editor', email: 'editor@example.com' });
    expect(transport).toHaveBeenCalledWith(
      { method: 'POST', url: `${AUTH_URL}?username=editor&password=test-secret`, headers: { Accept: 'application/json' } },
      expect.any(AbortSignal)
    );
  });

  it('sends a token when given and reads the URL from the environment', async () => {
    transport.mockResolvedValue(textResponse(200, JSON.stringify({ p2p_user: { username: 'editor' } })));

    await authenticate({
      username: 'editor',
      password: 'test-secret',
      token: 'test-token',
      transport,
      env: { P2P_AUTH_URL: AUTH_URL },
    });

    expect(transport.mock.calls[0]?.[0].url).toBe(`${AUTH_URL}?username=editor&password=test-secret&token=test-token`);
  });

  it('reports refused credentials', async () => {
    transport.mockResolvedValue(textResponse(403, 'Forbidden'));

    const attempt = authenticate({ username: 'editor', password: 'wrong', authUrl: AUTH_URL, transport });

    await expect(attempt).rejects.toBeInstanceOf(P2PAuthError);
    await expect(attempt).rejects.toMatchObject({ message: 'Incorrect username or password', status: 403 });
  });

  it('passes other failure bodies through', async () => {
    transport.mockResolvedValue(textResponse(500, 'Server exploded'));

    await expect(
      authenticate({ username: 'editor', password: 'test-secret', authUrl: AUTH_URL, transport })
    ).rejects.toMatchObject({ message: 'Server exploded', status: 500 });
  });

  it('requires an auth URL', async () => {
    await expect(authenticate({ username: 'editor', password: 'test-secret', transport, env: {} })).rejects.toThrow(
      'No connection settings available. Set P2P_AUTH_URL in the environment'
    );
    expect(transport).not.toHaveBeenCalled();
  });

  it('requires both username and password', async () => {
    await expect(authenticate({ username: 'editor', authUrl: AUTH_URL, transport })).rejects.toThrow(
      'Username and password are required'
    );
  });

  it('wraps transport failures', async () => {
    const cause = new Error('connect ECONNREFUSED');
    transport.mockRejectedValue(cause);

    await expect(
      authenticate({ username: 'editor', password: 'test-secret', authUrl: AUTH_URL, transport })
    ).rejects.toMatchObject({ message: 'Authentication request failed', cause });
  });
});
