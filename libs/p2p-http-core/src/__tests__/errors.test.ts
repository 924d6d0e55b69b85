import { describe, it, expect } from 'vitest';
import { P2PError, RETRYABLE_KINDS, describeError, isP2PError, isRetryableError } from '../errors';

describe('P2PError', () => {
  it('derives retryable from the kind', () => {
    expect(new P2PError('forbidden').retryable).toBe(true);
    expect(new P2PError('timeout').retryable).toBe(true);
    expect(new P2PError('slug_taken').retryable).toBe(false);
    expect([...RETRYABLE_KINDS].sort()).toEqual(['forbidden', 'timeout']);
  });

  it('builds a message from the kind, status and target', () => {
    const error = new P2PError('not_found', { status: 404, method: 'GET', url: 'https://p2p.test/x.json' });
    expect(error.message).toBe('Resource not found: HTTP 404 (GET https://p2p.test/x.json)');
    expect(error.name).toBe('P2PError');
  });

  it('prefers an explicit message', () => {
    expect(new P2PError('unknown', { message: '500 fetching 42' }).message).toBe('500 fetching 42');
  });
});

describe('error helpers', () => {
  it('narrows by kind', () => {
    const error = new P2PError('slug_taken');
    expect(isP2PError(error)).toBe(true);
    expect(isP2PError(error, 'slug_taken')).toBe(true);
    expect(isP2PError(error, 'not_found')).toBe(false);
    expect(isP2PError(new Error('plain'))).toBe(false);
  });

  it('never treats a cancellation as retryable', () => {
    expect(isRetryableError(new P2PError('timeout'))).toBe(true);
    expect(isRetryableError(new P2PError('timeout', { cancelled: true }))).toBe(false);
  });

  it('describes any thrown value', () => {
    expect(describeError(new P2PError('forbidden'))).toBe('[forbidden] Credentials refused or throttled');
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('text')).toBe('text');
  });
});
