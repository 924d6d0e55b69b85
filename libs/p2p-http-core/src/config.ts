import { z } from 'zod';
import { DEFAULT_ERROR_PATTERNS } from './classifier';
import { P2PError } from './errors';
import { ConsoleLogger } from './logger';
import { DEFAULT_RETRY_POLICY } from './retry';
import { NoopCache } from './cache/noopCache';
import { fetchTransport } from './transport/fetchTransport';
import type { Charset, ErrorPattern, HttpTransport, Logger, P2PCache, RetryPolicy } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

const stripTrailingSlashes = (value: string): string => value.replace(/\/+$/, '');

const retryPolicySchema = z.object({
  maxAttempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.maxAttempts),
  baseDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  backoffFactor: z.number().positive().default(DEFAULT_RETRY_POLICY.backoffFactor),
  maxDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
});

export const connectionConfigSchema = z.object({
  baseUrl: z.string().url().transform(stripTrailingSlashes),
  authToken: z.string().min(1, 'authToken is required'),
  debug: z.boolean().default(false),
  secondaryUrl: z.string().url().transform(stripTrailingSlashes).optional(),
  authUrl: z.string().url().optional(),
  preserveEmbeddedTags: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  retry: retryPolicySchema.default({}),
  checkEncoding: z.boolean().default(true),
  charset: z.enum(['utf-8', 'latin1']).default('utf-8'),
});

/** Serializable settings, as accepted before defaults are applied. */
export type ConnectionSettings = z.input<typeof connectionConfigSchema>;

/** Collaborators that cannot be validated as plain data. */
export interface ConnectionCollaborators {
  cache?: P2PCache;
  logger?: Logger;
  transport?: HttpTransport;
  errorPatterns?: readonly ErrorPattern[];
}

export type ConnectionConfigInput = ConnectionSettings & ConnectionCollaborators;

export interface ConnectionConfig {
  readonly baseUrl: string;
  readonly authToken: string;
  readonly debug: boolean;
  readonly secondaryUrl?: string;
  readonly authUrl?: string;
  readonly preserveEmbeddedTags: boolean;
  readonly timeoutMs: number;
  readonly retry: Readonly<RetryPolicy>;
  readonly checkEncoding: boolean;
  readonly charset: Charset;
  readonly cache: P2PCache;
  readonly logger: Logger;
  readonly transport: HttpTransport;
  readonly errorPatterns: readonly ErrorPattern[];
}

/**
 * Validates settings, applies defaults and returns a frozen configuration
 * shared read-only by every call of one client.
 */
export function resolveConnectionConfig(input: ConnectionConfigInput): ConnectionConfig {
  const settings = connectionConfigSchema.parse(input);
  return Object.freeze({
    ...settings,
    retry: Object.freeze(settings.retry),
    cache: input.cache ?? new NoopCache(),
    logger: input.logger ?? new ConsoleLogger(),
    transport: input.transport ?? fetchTransport,
    errorPatterns: input.errorPatterns ?? DEFAULT_ERROR_PATTERNS,
  });
}

/** Non-negative finite numbers only; anything else yields `fallback`. */
export function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function parsePositiveIntOrDefault(value: string | undefined, fallback: number): number {
  const parsed = parseNumberOrDefault(value, fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  return normalized !== '' && normalized !== '0' && normalized !== 'false';
}

type Env = Record<string, string | undefined>;

/**
 * Reads connection settings from environment variables.
 */
export function loadConfigFromEnv(env: Env = process.env): ConnectionSettings {
  const baseUrl = env.P2P_API_URL;
  const authToken = env.P2P_API_KEY;
  if (!baseUrl || !authToken) {
    throw new P2PError('unknown', {
      message: 'No connection settings available. Set P2P_API_URL and P2P_API_KEY in the environment',
    });
  }

  return {
    baseUrl,
    authToken,
    debug: parseFlag(env.P2P_API_DEBUG),
    secondaryUrl: env.P2P_SECONDARY_API_URL || undefined,
    authUrl: env.P2P_AUTH_URL || undefined,
    preserveEmbeddedTags: parseFlag(env.P2P_PRESERVE_EMBEDDED_TAGS),
    timeoutMs: parsePositiveIntOrDefault(env.P2P_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    retry: {
      maxAttempts: parsePositiveIntOrDefault(env.P2P_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.maxAttempts),
      baseDelayMs: parseNumberOrDefault(env.P2P_RETRY_DELAY_MS, DEFAULT_RETRY_POLICY.baseDelayMs),
    },
  };
}
