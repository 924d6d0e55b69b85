import { assertEncodable, classifyExchange, classifyTransportError } from './classifier';
import { resolveConnectionConfig, type ConnectionConfig, type ConnectionConfigInput } from './config';
import { P2PError, describeError } from './errors';
import { withRetry } from './retry';
import { buildSignature, canonicalPath, encodeQuery, toQueryString } from './signature';
import type {
  DispatchRequest,
  HttpHeaders,
  HttpMethod,
  P2PCache,
  QueryParams,
  RawHttpResponse,
  ReadOptions,
  WriteOptions,
} from './types';

interface PreparedRequest {
  method: HttpMethod;
  path: string;
  url: string;
  headers: HttpHeaders;
  payload?: string;
  signal?: AbortSignal;
  operation?: string;
}

export type SignedRequest = Pick<DispatchRequest, 'method' | 'path' | 'query' | 'body' | 'cacheable' | 'service'>;

export type PostOptions = WriteOptions & Pick<DispatchRequest, 'cacheable' | 'cacheMode'>;

/**
 * Turns a logical request into a value or a typed error: signature, cache
 * lookup, retried transport attempts, classification, cache write-through.
 *
 * Holds no mutable state besides the shared cache reference, so one instance
 * serves any number of concurrent calls.
 */
export class Dispatcher {
  readonly config: ConnectionConfig;

  constructor(config: ConnectionConfigInput) {
    this.config = resolveConnectionConfig(config);
  }

  get cache(): P2PCache {
    return this.config.cache;
  }

  /**
   * The cache key a request would be stored under.
   */
  signatureOf(req: SignedRequest): string {
    const method = req.method;
    const cacheable = req.cacheable ?? method === 'GET';
    return buildSignature({
      method,
      path: req.path,
      query: req.query,
      body: method !== 'GET' && cacheable ? req.body : undefined,
      service: req.service,
    });
  }

  /**
   * Drops the cached response for a request. Writes never do this implicitly.
   */
  async invalidate(req: SignedRequest): Promise<void> {
    const signature = this.signatureOf(req);
    try {
      await this.config.cache.invalidate?.(signature);
    } catch (error) {
      this.config.logger.warn('p2p.cache.invalidate.error', { signature, error: describeError(error) });
    }
  }

  async request<T = unknown>(req: DispatchRequest): Promise<T> {
    const cacheable = req.cacheable ?? req.method === 'GET';
    const cacheMode = req.cacheMode ?? 'default';
    const signature = this.signatureOf(req);
    const baseUrl = this.baseUrlFor(req);

    if (cacheable && cacheMode === 'default') {
      const hit = await this.readCache<T>(signature);
      if (hit !== undefined) {
        this.debug('p2p.cache.hit', { signature, operation: req.operation });
        return hit;
      }
    }

    const prepared = this.prepare(req, baseUrl);
    const value = await withRetry((attempt) => this.attempt<T>(prepared, attempt), this.config.retry, {
      signal: req.signal,
      onRetry: (event) =>
        this.debug('p2p.request.retry', {
          method: prepared.method,
          path: prepared.path,
          attempt: event.attempt,
          maxAttempts: event.maxAttempts,
          delayMs: event.delayMs,
          kind: event.error.kind,
        }),
    });

    if (cacheable && cacheMode !== 'bypass') {
      await this.writeCache(signature, value);
    }
    return value;
  }

  get<T = unknown>(path: string, query?: QueryParams, options: ReadOptions = {}): Promise<T> {
    return this.request<T>({ ...options, method: 'GET', path, query });
  }

  post<T = unknown>(path: string, body?: unknown, options: PostOptions = {}): Promise<T> {
    return this.request<T>({ ...options, method: 'POST', path, body });
  }

  put<T = unknown>(path: string, body?: unknown, options: WriteOptions = {}): Promise<T> {
    return this.request<T>({ ...options, method: 'PUT', path, body });
  }

  delete<T = unknown>(path: string, options: WriteOptions = {}): Promise<T> {
    return this.request<T>({ ...options, method: 'DELETE', path });
  }

  private baseUrlFor(req: DispatchRequest): string {
    if (req.service === 'secondary') {
      if (!this.config.secondaryUrl) {
        throw new P2PError('unknown', { message: 'No secondary service URL configured', method: req.method });
      }
      return this.config.secondaryUrl;
    }
    return this.config.baseUrl;
  }

  private prepare(req: DispatchRequest, baseUrl: string): PreparedRequest {
    const path = canonicalPath(req.path);
    const qs = toQueryString(encodeQuery(req.query));
    const url = `${baseUrl}${path}${qs ? `?${qs}` : ''}`;

    const headers: HttpHeaders = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.config.authToken}`,
      ...req.headers,
    };

    let payload: string | undefined;
    if (req.body !== undefined) {
      if (this.config.checkEncoding) {
        assertEncodable(req.body, this.config.charset, { method: req.method, url });
      }
      payload = JSON.stringify(req.body);
      headers['Content-Type'] = 'application/json';
    }

    return { method: req.method, path, url, headers, payload, signal: req.signal, operation: req.operation };
  }

  private async attempt<T>(prepared: PreparedRequest, attempt: number): Promise<T> {
    const { method, path, url, signal } = prepared;
    if (signal?.aborted) {
      throw classifyTransportError(signal.reason, { method, url, timedOut: false, cancelled: true });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let response: RawHttpResponse;
    try {
      response = await this.config.transport(
        { method, url, headers: prepared.headers, body: prepared.payload },
        controller.signal
      );
    } catch (error) {
      const classified = classifyTransportError(error, {
        method,
        url,
        timedOut,
        cancelled: signal?.aborted ?? false,
      });
      this.debug('p2p.request.failed', { method, path, attempt, kind: classified.kind, error: describeError(error) });
      throw classified;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    const bodyText = new TextDecoder().decode(response.body);
    this.debug('p2p.request.attempt', { method, path, status: response.status, attempt, operation: prepared.operation });

    const result = classifyExchange<T>(
      { method, url, status: response.status, headers: response.headers, bodyText },
      this.config.errorPatterns
    );
    if (!result.ok) {
      this.debug('p2p.request.failed', {
        method,
        path,
        attempt,
        status: response.status,
        kind: result.error.kind,
        body: bodyText,
      });
      throw result.error;
    }
    return result.value;
  }

  private async readCache<T>(signature: string): Promise<T | undefined> {
    try {
      return await this.config.cache.get<T>(signature);
    } catch (error) {
      this.config.logger.warn('p2p.cache.get.error', { signature, error: describeError(error) });
      return undefined;
    }
  }

  private async writeCache(signature: string, value: unknown): Promise<void> {
    try {
      await this.config.cache.set(signature, value);
    } catch (error) {
      this.config.logger.warn('p2p.cache.set.error', { signature, error: describeError(error) });
    }
  }

  private debug(message: string, meta: Record<string, unknown>): void {
    if (this.config.debug) {
      this.config.logger.debug(message, meta);
    }
  }
}
