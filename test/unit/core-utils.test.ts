/**
 * Unit Tests for core utilities and the error taxonomy
 */
import { describe, it, expect, vi } from 'vitest';
import {
  API_KEY_PREFIX,
  ForbiddenError,
  GatewayError,
  InsufficientCreditsError,
  KeyNotFoundError,
  LedgerConflictError,
  ProviderUnavailableError,
  RecordNotFoundError,
  RequestAbortedError,
  ServiceInactiveError,
  ServiceNotFoundError,
  TimeoutError,
  UnauthenticatedError,
  errorMessage,
  generateApiKey,
  hashApiKey,
  isGatewayError,
  keyPrefixOf,
  retry,
  safeJsonParse,
  withTimeout,
} from '@verigate/core';

// ---------------------------------------------------------------------------
// retry / withTimeout
// ---------------------------------------------------------------------------
describe('retry', () => {
  it('makes maxRetries + 1 attempts before giving up', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('still down'));
    const onRetry = vi.fn();

    await expect(retry(fn, { maxRetries: 2, initialDelayMs: 1, onRetry })).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map((c) => c[1])).toEqual([1, 2]);
  });

  it('returns the first success', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('blip')).mockResolvedValue('ok');
    expect(await retry(fn, { maxRetries: 3, initialDelayMs: 1 })).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at an error shouldRetry refuses', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));
    await expect(
      retry(fn, { maxRetries: 5, initialDelayMs: 1, shouldRetry: (e) => e.message !== 'fatal' }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('passes through a value that arrives in time', async () => {
    expect(await withTimeout(Promise.resolve(42), 50, 'answer')).toBe(42);
  });

  it('rejects with TimeoutError when the deadline passes first', async () => {
    const err = await withTimeout(new Promise<never>(() => undefined), 10, 'record store read').catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toHaveProperty('message', 'record store read timed out after 10ms');
  });
});

// ---------------------------------------------------------------------------
// API keys
// ---------------------------------------------------------------------------
describe('API keys', () => {
  it('generates distinct keys with a stable hash and display prefix', () => {
    const a = generateApiKey();
    const b = generateApiKey();

    expect(a.plaintext).toMatch(new RegExp(`^${API_KEY_PREFIX}_[0-9a-f]{48}$`));
    expect(a.plaintext).not.toBe(b.plaintext);
    expect(a.keyHash).toBe(hashApiKey(a.plaintext));
    expect(a.keyHash).toMatch(/^[0-9a-f]{64}$/);
    expect(a.keyPrefix).toBe(keyPrefixOf(a.plaintext));
    expect(a.keyPrefix).toHaveLength(12);
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------
describe('Error taxonomy', () => {
  it('gives every failure kind its own status, code and HTTP status', () => {
    const errors: GatewayError[] = [
      new UnauthenticatedError('missing'),
      new ForbiddenError('pan-verification'),
      new ServiceNotFoundError('nope'),
      new ServiceInactiveError('retired'),
      new InsufficientCreditsError(2, 1),
      new RecordNotFoundError('pan-verification', 'ABCDE1234F'),
      new KeyNotFoundError('key-1'),
      new RequestAbortedError('resolving'),
    ];

    expect(errors.map((e) => [e.code, e.status, e.httpStatus])).toEqual([
      ['UNAUTHENTICATED', 'unauthenticated', 401],
      ['FORBIDDEN', 'forbidden', 403],
      ['SERVICE_NOT_FOUND', 'service_unavailable', 404],
      ['SERVICE_INACTIVE', 'service_unavailable', 503],
      ['INSUFFICIENT_CREDITS', 'insufficient_credits', 402],
      ['RECORD_NOT_FOUND', 'not_found', 404],
      ['KEY_NOT_FOUND', 'not_found', 404],
      ['REQUEST_ABORTED', 'aborted', 499],
    ]);
  });

  it('keeps the internal failures recognisable', () => {
    const unavailable = new ProviderUnavailableError('api2', 'HTTP 503');
    expect(unavailable.message).toBe('Provider "api2" unavailable: HTTP 503');
    expect(isGatewayError(unavailable)).toBe(true);

    const conflict = new LedgerConflictError('acme', 'reserve');
    expect(conflict.context).toEqual({ callerId: 'acme', operation: 'reserve' });
    expect(isGatewayError(new Error('plain'))).toBe(false);
  });

  it('extracts a message from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
  });
});

describe('safeJsonParse', () => {
  it('parses JSON and falls back to the raw text', () => {
    expect(safeJsonParse('{"a":1}')).toEqual({ a: 1 });
    expect(safeJsonParse('not json')).toBe('not json');
    expect(safeJsonParse(null)).toBeNull();
  });
});
