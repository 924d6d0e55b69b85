import type { ErrorKind } from './errors';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Capability-based response store keyed by request signature.
 * A miss is a normal `undefined` return, never a thrown error.
 */
export interface P2PCache {
  get<T = unknown>(signature: string): MaybePromise<T | undefined>;
  set<T = unknown>(signature: string, value: T): MaybePromise<void>;
  invalidate?(signature: string): MaybePromise<void>;
  clear(): MaybePromise<void>;
}

export interface CacheEntry<T = unknown> {
  signature: string;
  value: T;
  insertedAt: number; // epoch millis
}

export interface CacheStats {
  gets: number;
  hits: number;
  size: number;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryScalar = string | number | boolean;

export type NestedQueryValue = QueryScalar | QueryScalar[] | Record<string, QueryScalar> | null | undefined;

export type QueryValue = QueryScalar | QueryScalar[] | Record<string, NestedQueryValue> | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Transport-level request handed to an {@link HttpTransport}.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

/**
 * Transport-level response: status, headers and the undecoded body.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * A completed HTTP exchange as seen by the classifier.
 */
export interface HttpExchange {
  method: HttpMethod;
  url: string;
  status: number;
  headers: HttpHeaders;
  bodyText: string;
}

export type StatusMatcher = number | readonly number[] | '4xx' | '5xx' | ((status: number) => boolean);

export type BodyMatcher = string | RegExp;

/**
 * One row of the ordered error-pattern table. Rows with a `body` matcher only
 * apply when the response body parses as structured data.
 */
export interface ErrorPattern {
  kind: ErrorKind;
  status?: StatusMatcher;
  body?: BodyMatcher;
  description?: string;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export type Charset = 'utf-8' | 'latin1';

/**
 * - `default`: serve cache hits, write through on success
 * - `refresh`: skip the lookup but still write through (force update)
 * - `bypass`: neither read nor write the cache
 */
export type CacheMode = 'default' | 'refresh' | 'bypass';

export type ServiceTarget = 'primary' | 'secondary';

export interface DispatchRequest {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
  /** Defaults to `true` for GET. Set on POST lookups that only read. */
  cacheable?: boolean;
  cacheMode?: CacheMode;
  service?: ServiceTarget;
  signal?: AbortSignal;
  /** Free-form label carried into log lines. */
  operation?: string;
  headers?: HttpHeaders;
}

export type ReadOptions = Pick<DispatchRequest, 'cacheMode' | 'signal' | 'operation' | 'service'>;

export type WriteOptions = Pick<DispatchRequest, 'signal' | 'operation' | 'service' | 'query'>;
