import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * Node's fetch reports socket failures as `TypeError('fetch failed')` with the
 * system error as `cause`. The classifier reads `code` off the error it gets,
 * so hand it the underlying one.
 */
function unwrapFetchFailure(error: unknown): unknown {
  if (error instanceof TypeError && error.cause instanceof Error) {
    return error.cause;
  }
  return error;
}

function collectHeaders(response: Response): HttpHeaders {
  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

/**
 * Default transport on the global `fetch`. The body is read fully before returning.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  try {
    const response = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
    });
    const body = await response.arrayBuffer();
    return { status: response.status, headers: collectHeaders(response), body };
  } catch (error) {
    throw unwrapFetchFailure(error);
  }
};
