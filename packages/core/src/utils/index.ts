/**
 * @verigate/core - Common utilities
 *
 * Shared helper functions used across the gateway.
 */

import { createHash, randomBytes } from 'node:crypto';

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff.
 *
 * Only errors accepted by `shouldRetry` are retried; anything else is
 * rethrown immediately.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffMultiplier?: number;
    shouldRetry?: (error: Error) => boolean;
    onRetry?: (error: Error, attempt: number) => void;
  } = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxRetries || !shouldRetry(lastError)) {
        throw lastError;
      }

      onRetry?.(lastError, attempt + 1);

      // Add jitter: +/- 25% of delay
      const jitter = delay * 0.25 * (Math.random() * 2 - 1);
      await sleep(Math.max(0, Math.min(delay + jitter, maxDelayMs)));

      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }

  throw lastError ?? new Error('retry exhausted');
}

/** Raised by withTimeout when the deadline passes first. */
export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timeout. Rejects with a TimeoutError when the
 * timeout fires first. The underlying promise is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(label, ms));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

/**
 * Compute a SHA-256 hash of the input string.
 */
export function hash(input: string, encoding: 'hex' | 'base64' = 'hex'): string {
  return createHash('sha256').update(input, 'utf-8').digest(encoding);
}

// ---------------------------------------------------------------------------
// API keys
// ---------------------------------------------------------------------------

export const API_KEY_PREFIX = 'vg_live';
const API_KEY_BYTES = 24;
const DISPLAY_PREFIX_LENGTH = 12;

export interface GeneratedApiKey {
  /** Shown to the owner once, never stored. */
  plaintext: string;
  keyHash: string;
  keyPrefix: string;
}

/**
 * Generate a new API key: `vg_live_<48 hex chars>`.
 */
export function generateApiKey(prefix = API_KEY_PREFIX): GeneratedApiKey {
  const plaintext = `${prefix}_${randomBytes(API_KEY_BYTES).toString('hex')}`;
  return {
    plaintext,
    keyHash: hashApiKey(plaintext),
    keyPrefix: plaintext.slice(0, DISPLAY_PREFIX_LENGTH),
  };
}

export function hashApiKey(plaintext: string): string {
  return hash(plaintext);
}

/** Display form of a presented key, safe for logs. */
export function keyPrefixOf(plaintext: string): string {
  return plaintext.slice(0, DISPLAY_PREFIX_LENGTH);
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text, returning the raw string when it is not valid JSON.
 */
export function safeJsonParse(value: string | null | undefined): unknown {
  if (value === null || value === undefined) return null;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}
