/**
 * Closed error taxonomy for the P2P pipeline.
 *
 * Every failure leaves the pipeline as a {@link P2PError}. The `kind` tag names
 * what went wrong; `retryable` marks the subset the retry policy re-attempts.
 */
export type ErrorKind =
  | 'unknown'
  | 'slug_taken'
  | 'not_found'
  | 'unique_constraint_violated'
  | 'encoding_mismatch'
  | 'unknown_attribute'
  | 'invalid_access_definition'
  | 'search_error'
  | 'forbidden'
  | 'timeout';

export const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['forbidden', 'timeout']);

const DEFAULT_MESSAGES: Record<ErrorKind, string> = {
  unknown: 'P2P request failed',
  slug_taken: 'Slug has already been taken',
  not_found: 'Resource not found',
  unique_constraint_violated: 'Unique constraint violated',
  encoding_mismatch: 'Payload is not representable in the service character set',
  unknown_attribute: 'Unknown attribute',
  invalid_access_definition: 'Invalid access definition',
  search_error: 'Search service error',
  forbidden: 'Credentials refused or throttled',
  timeout: 'Request timed out',
};

export interface P2PErrorOptions {
  message?: string;
  status?: number;
  body?: string;
  method?: string;
  url?: string;
  cause?: unknown;
  cancelled?: boolean;
}

export class P2PError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly status?: number;
  readonly body?: string;
  readonly method?: string;
  readonly url?: string;
  /** Set when the caller aborted; never retried even though the kind is retryable. */
  readonly cancelled: boolean;

  constructor(kind: ErrorKind, options: P2PErrorOptions = {}) {
    super(options.message ?? formatMessage(kind, options), { cause: options.cause });
    this.name = 'P2PError';
    this.kind = kind;
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.status = options.status;
    this.body = options.body;
    this.method = options.method;
    this.url = options.url;
    this.cancelled = options.cancelled ?? false;
  }
}

function formatMessage(kind: ErrorKind, options: P2PErrorOptions): string {
  const base = DEFAULT_MESSAGES[kind];
  const target = options.method && options.url ? ` (${options.method} ${options.url})` : '';
  const status = options.status !== undefined ? `: HTTP ${options.status}` : '';
  return `${base}${status}${target}`;
}

export function isP2PError(error: unknown, kind?: ErrorKind): error is P2PError {
  if (!(error instanceof P2PError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

export function isRetryableError(error: unknown): error is P2PError {
  return error instanceof P2PError && error.retryable && !error.cancelled;
}

/**
 * Log-safe one-line description of any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof P2PError) {
    return `[${error.kind}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
