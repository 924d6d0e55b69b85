import { P2PError, type ErrorKind } from './errors';
import type { BodyMatcher, Charset, ErrorPattern, HttpExchange, HttpMethod, StatusMatcher } from './types';

const SLUG_TAKEN = /slug has already been taken|"slug":\s*\["has already been taken"/i;

/**
 * Ordered pattern table, first match wins. Rows carrying a `body` matcher only
 * apply when the response body parses as JSON.
 */
export const DEFAULT_ERROR_PATTERNS: readonly ErrorPattern[] = Object.freeze([
  { kind: 'timeout', status: '5xx', body: 'Request Timeout', description: 'service-side request timeout' },
  { kind: 'slug_taken', status: '5xx', body: SLUG_TAKEN },
  { kind: 'slug_taken', status: [409, 422], body: SLUG_TAKEN },
  { kind: 'unique_constraint_violated', status: '5xx', body: /unique constraint/i },
  { kind: 'unique_constraint_violated', status: '4xx', body: /unique constraint/i },
  { kind: 'encoding_mismatch', status: '5xx', body: /incompatible character encodings|invalid byte sequence/i },
  { kind: 'unknown_attribute', body: /unknown attribute/i },
  { kind: 'invalid_access_definition', body: /invalid access definition/i },
  { kind: 'search_error', status: '5xx', body: /solr|search error/i },
  { kind: 'not_found', status: 404 },
] satisfies ErrorPattern[]);

export interface ExtendPatternsOptions {
  prepend?: readonly ErrorPattern[];
  append?: readonly ErrorPattern[];
  base?: readonly ErrorPattern[];
}

/**
 * Builds a pattern table around the defaults (or `base`). Prepended rows win
 * over the defaults; appended rows only see what nothing else matched.
 */
export function extendErrorPatterns(options: ExtendPatternsOptions): readonly ErrorPattern[] {
  const base = options.base ?? DEFAULT_ERROR_PATTERNS;
  return Object.freeze([...(options.prepend ?? []), ...base, ...(options.append ?? [])]);
}

export type Classification<T = unknown> = { ok: true; value: T } | { ok: false; error: P2PError };

const FORBIDDEN_STATUSES = new Set([401, 403, 429]);
const TIMEOUT_STATUSES = new Set([408, 504]);

function matchesStatus(matcher: StatusMatcher | undefined, status: number): boolean {
  if (matcher === undefined) return true;
  if (typeof matcher === 'number') return matcher === status;
  if (typeof matcher === 'function') return matcher(status);
  if (matcher === '4xx') return status >= 400 && status < 500;
  if (matcher === '5xx') return status >= 500 && status < 600;
  return matcher.includes(status);
}

function matchesBody(matcher: BodyMatcher, bodyText: string): boolean {
  if (typeof matcher === 'string') return bodyText.includes(matcher);
  matcher.lastIndex = 0;
  return matcher.test(bodyText);
}

type ParsedBody = { parsed: true; value: unknown } | { parsed: false };

function parseJson(bodyText: string): ParsedBody {
  if (bodyText.trim() === '') {
    return { parsed: true, value: null };
  }
  try {
    return { parsed: true, value: JSON.parse(bodyText) };
  } catch {
    return { parsed: false };
  }
}

function failure(kind: ErrorKind, exchange: HttpExchange, message?: string): Classification<never> {
  return {
    ok: false,
    error: new P2PError(kind, {
      message,
      status: exchange.status,
      body: exchange.bodyText,
      method: exchange.method,
      url: exchange.url,
    }),
  };
}

/**
 * Turns a completed exchange into a decoded value or a typed error.
 */
export function classifyExchange<T = unknown>(
  exchange: HttpExchange,
  patterns: readonly ErrorPattern[] = DEFAULT_ERROR_PATTERNS
): Classification<T> {
  const body = parseJson(exchange.bodyText);

  if (exchange.status >= 200 && exchange.status < 300) {
    if (body.parsed) {
      return { ok: true, value: body.value as T };
    }
    return failure('unknown', exchange, `Response body is not JSON (${exchange.method} ${exchange.url})`);
  }

  // An empty error body is not structured data for matching purposes.
  const structured = body.parsed && exchange.bodyText.trim() !== '';
  for (const pattern of patterns) {
    if (!matchesStatus(pattern.status, exchange.status)) continue;
    if (pattern.body !== undefined && !(structured && matchesBody(pattern.body, exchange.bodyText))) continue;
    return failure(pattern.kind, exchange);
  }

  if (FORBIDDEN_STATUSES.has(exchange.status)) {
    return failure('forbidden', exchange);
  }
  if (TIMEOUT_STATUSES.has(exchange.status)) {
    return failure('timeout', exchange);
  }
  return failure('unknown', exchange);
}

const SOCKET_TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export interface TransportFailureContext {
  method: HttpMethod;
  url: string;
  /** The per-attempt timer fired. */
  timedOut: boolean;
  /** The caller's own signal was aborted. */
  cancelled: boolean;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Maps a thrown transport error (no HTTP response) onto the taxonomy.
 */
export function classifyTransportError(error: unknown, context: TransportFailureContext): P2PError {
  if (error instanceof P2PError) {
    return error;
  }
  const target = { method: context.method, url: context.url, cause: error };
  if (context.cancelled) {
    return new P2PError('timeout', { ...target, message: `Request cancelled (${context.method} ${context.url})`, cancelled: true });
  }
  const named = error instanceof Error && error.name === 'TimeoutError';
  const code = errorCode(error);
  if (context.timedOut || named || (code !== undefined && SOCKET_TIMEOUT_CODES.has(code))) {
    return new P2PError('timeout', target);
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new P2PError('unknown', { ...target, message: `Transport failure (${context.method} ${context.url}): ${detail}` });
}

function findUnrepresentable(text: string, charset: Charset): { char: string; index: number } | undefined {
  for (let index = 0; index < text.length; index += 1) {
    const code = text.charCodeAt(index);
    if (charset === 'latin1') {
      if (code > 0xff) {
        const point = text.codePointAt(index) ?? code;
        return { char: String.fromCodePoint(point), index };
      }
      continue;
    }
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = text.charCodeAt(index + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        index += 1;
        continue;
      }
      return { char: text[index] ?? '', index };
    }
    if (code >= 0xdc00 && code <= 0xdfff) {
      return { char: text[index] ?? '', index };
    }
  }
  return undefined;
}

function* stringsOf(value: unknown): Generator<string> {
  if (typeof value === 'string') {
    yield value;
  } else if (Array.isArray(value)) {
    for (const item of value) yield* stringsOf(item);
  } else if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    for (const [key, item] of Object.entries(value)) {
      yield key;
      yield* stringsOf(item);
    }
  }
}

/**
 * Pre-flight check of an outbound payload. Throws `encoding_mismatch` when a
 * string anywhere in the body holds a character the charset cannot carry.
 * Runs on the unserialized value: JSON.stringify escapes lone surrogates.
 */
export function assertEncodable(payload: unknown, charset: Charset, context?: { method: HttpMethod; url: string }): void {
  for (const text of stringsOf(payload)) {
    const hit = findUnrepresentable(text, charset);
    if (!hit) continue;
    const point = (hit.char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
    throw new P2PError('encoding_mismatch', {
      message: `Payload character U+${point} at offset ${hit.index} cannot be encoded as ${charset}`,
      method: context?.method,
      url: context?.url,
    });
  }
}
