import type { HttpMethod, QueryParams, QueryScalar, QueryValue, ServiceTarget } from './types';

export type QueryPair = [key: string, value: string];

const isScalar = (value: unknown): value is QueryScalar =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const encodeKey = (segments: string[]): string =>
  segments.map((segment, index) => (index === 0 ? encodeURIComponent(segment) : `[${encodeURIComponent(segment)}]`)).join('');

function pushScalarOrList(pairs: QueryPair[], segments: string[], value: unknown): boolean {
  if (isScalar(value)) {
    pairs.push([encodeKey(segments), String(value)]);
    return true;
  }
  if (Array.isArray(value)) {
    for (const entry of value) {
      if (!isScalar(entry)) {
        throw new TypeError(`Unsupported query value in list "${segments.join('.')}"`);
      }
      pairs.push([`${encodeKey(segments)}[]`, String(entry)]);
    }
    return true;
  }
  return false;
}

function encodeNested(pairs: QueryPair[], key: string, nestedKey: string, value: unknown): void {
  if (value === undefined || value === null) return;
  if (pushScalarOrList(pairs, [key, nestedKey], value)) return;
  if (isPlainObject(value)) {
    for (const [innerKey, innerValue] of Object.entries(value)) {
      if (!isScalar(innerValue)) {
        throw new TypeError(`Unsupported query value at "${key}.${nestedKey}.${innerKey}"`);
      }
      pairs.push([encodeKey([key, nestedKey, innerKey]), String(innerValue)]);
    }
    return;
  }
  throw new TypeError(`Unsupported query value at "${key}.${nestedKey}"`);
}

function encodeValue(pairs: QueryPair[], key: string, value: QueryValue): void {
  if (value === undefined || value === null) return;
  if (pushScalarOrList(pairs, [key], value)) return;
  if (isPlainObject(value)) {
    for (const [nestedKey, nestedValue] of Object.entries(value)) {
      encodeNested(pairs, key, nestedKey, nestedValue);
    }
    return;
  }
  throw new TypeError(`Unsupported query value at "${key}"`);
}

/**
 * Flattens query parameters the way the P2P API reads them:
 * `include[]=web_url`, `filter[state]=live`, `filter[tags][]=a`.
 * Keys are percent-encoded segment by segment; the brackets are kept literal.
 */
export function encodeQuery(query?: QueryParams): QueryPair[] {
  const pairs: QueryPair[] = [];
  if (!query) return pairs;
  for (const [key, value] of Object.entries(query)) {
    encodeValue(pairs, key, value);
  }
  return pairs;
}

export function toQueryString(pairs: QueryPair[]): string {
  return pairs.map(([key, value]) => `${key}=${encodeURIComponent(value)}`).join('&');
}

/**
 * Sorts by key only. The sort is stable, so repeated keys (list values) keep
 * their relative order.
 */
export function sortQueryPairs(pairs: QueryPair[]): QueryPair[] {
  return [...pairs].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function canonicalPath(path: string): string {
  const trimmed = path.trim();
  const withLeading = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  return withLeading.length > 1 ? withLeading.replace(/\/+$/, '') || '/' : withLeading;
}

export function stableStringify(value: unknown): string {
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, entry]) => entry !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`).join(',')}}`;
}

export interface SignatureInput {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  /** Only set for reads sent with a body (POST lookups). */
  body?: unknown;
  /** Secondary-service reads are keyed apart from primary ones. */
  service?: ServiceTarget;
}

/**
 * Canonical cache key: `METHOD /path?sorted=query` plus, for body-carrying
 * reads, a key-sorted serialization of the body.
 */
export function buildSignature(input: SignatureInput): string {
  const qs = toQueryString(sortQueryPairs(encodeQuery(input.query)));
  const target = input.service === 'secondary' ? 'secondary ' : '';
  const base = `${target}${input.method.toUpperCase()} ${canonicalPath(input.path)}${qs ? `?${qs}` : ''}`;
  return input.body === undefined ? base : `${base} ${stableStringify(input.body)}`;
}
