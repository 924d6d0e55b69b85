import { encodeQuery, fetchTransport, toQueryString, type HttpTransport, type RawHttpResponse } from '@libs/p2p-http-core';
import { authResponseSchema, type P2PUser } from './types';

export class P2PAuthError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'P2PAuthError';
  }
}

export interface AuthenticateParams {
  username?: string;
  password?: string;
  token?: string;
  /** Falls back to `P2P_AUTH_URL`. */
  authUrl?: string;
  transport?: HttpTransport;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
}

/**
 * Exchanges P2P credentials for the user record.
 */
export async function authenticate(params: AuthenticateParams): Promise<P2PUser> {
  const { username, password, token } = params;
  if (!username || !password) {
    throw new P2PAuthError('Username and password are required');
  }

  const authUrl = params.authUrl ?? (params.env ?? process.env).P2P_AUTH_URL;
  if (!authUrl) {
    throw new P2PAuthError('No connection settings available. Set P2P_AUTH_URL in the environment');
  }

  const transport = params.transport ?? fetchTransport;
  const qs = toQueryString(encodeQuery({ username, password, token }));
  const url = `${authUrl}${authUrl.includes('?') ? '&' : '?'}${qs}`;

  let response: RawHttpResponse;
  try {
    response = await transport(
      { method: 'POST', url, headers: { Accept: 'application/json' } },
      params.signal ?? new AbortController().signal
    );
  } catch (error) {
    throw new P2PAuthError('Authentication request failed', undefined, { cause: error });
  }

  const bodyText = new TextDecoder().decode(response.body);
  if (response.status === 403) {
    throw new P2PAuthError('Incorrect username or password', 403);
  }
  if (response.status < 200 || response.status >= 300) {
    throw new P2PAuthError(bodyText, response.status);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(bodyText);
  } catch (error) {
    throw new P2PAuthError('Authentication response is not JSON', response.status, { cause: error });
  }
  const parsed = authResponseSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new P2PAuthError('Authentication response has no p2p_user', response.status, { cause: parsed.error });
  }
  return parsed.data.p2p_user;
}
