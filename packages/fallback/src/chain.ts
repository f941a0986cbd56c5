/**
 * @verigate/fallback - FallbackChain
 *
 * Tries external providers in declared order until one returns a record.
 * Unconfigured providers are skipped; timeouts, transport errors and
 * "not found" answers move on to the next provider. Only exhaustion of the
 * whole chain is reported to the caller.
 */

import pino from 'pino';
import {
  RequestAbortedError,
  TimeoutError,
  withTimeout,
  errorMessage,
  type AttemptSummary,
} from '@verigate/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What a provider answered for one lookup. */
export type ProviderFetchResult =
  | { kind: 'found'; payload: unknown }
  | { kind: 'not_found' }
  | { kind: 'unavailable'; reason: string };

export interface FetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** A third-party data source that can be placed in a fallback chain. */
export interface ExternalProvider {
  /** Stable id; becomes the record's source tag. */
  readonly id: string;
  /** Per-call bound applied by the chain. */
  readonly timeoutMs: number;
  /** False when the endpoint or credential for this service is missing. */
  isConfigured(serviceId: string): boolean;
  fetch(serviceId: string, lookupKey: string, options: FetchOptions): Promise<ProviderFetchResult>;
  /** Reachability check used by the health checker. */
  ping(): Promise<boolean>;
}

/** Record of a single provider within a chain execution. */
export type FallbackAttempt = AttemptSummary;

/** Successful chain execution result. */
export interface FallbackResult {
  payload: unknown;
  provider: string;
  attempts: FallbackAttempt[];
}

/** Options accepted by FallbackChain constructor. */
export interface FallbackChainOptions {
  /** Providers in the order they are tried. */
  providers: ExternalProvider[];
  /** Called whenever we fall back from one provider to the next. */
  onFallback?: (from: string, to: string, reason: string) => void;
  /** Called after every provider attempt (used for passive health tracking). */
  onAttempt?: (attempt: FallbackAttempt) => void;
  /** Custom pino logger instance. */
  logger?: pino.Logger;
}

// ---------------------------------------------------------------------------
// FallbackChain
// ---------------------------------------------------------------------------

/**
 * Executes providers in order until one finds the record.
 *
 * ```ts
 * const chain = new FallbackChain({ providers: catalog.pick(service.fallbackChain) });
 * const { payload, provider, attempts } = await chain.execute(service.id, 'MH12AB1234');
 * ```
 */
export class FallbackChain {
  private readonly providers: ExternalProvider[];
  private readonly onFallback?: (from: string, to: string, reason: string) => void;
  private readonly onAttempt?: (attempt: FallbackAttempt) => void;
  private readonly log: pino.Logger;

  constructor(options: FallbackChainOptions) {
    this.providers = [...options.providers];
    this.onFallback = options.onFallback;
    this.onAttempt = options.onAttempt;
    this.log = options.logger ?? pino({ name: 'verigate:fallback' });
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Run the chain for one lookup. Throws FallbackChainError when no
   * provider produced a record, RequestAbortedError when `signal` fires
   * between providers.
   */
  async execute(serviceId: string, lookupKey: string, signal?: AbortSignal): Promise<FallbackResult> {
    const attempts: FallbackAttempt[] = [];

    for (const [i, provider] of this.providers.entries()) {
      if (signal?.aborted) {
        throw new RequestAbortedError('resolving');
      }

      const next = this.providers[i + 1];

      // --- configuration check -------------------------------------------
      if (!provider.isConfigured(serviceId)) {
        this.log.info({ provider: provider.id, serviceId }, 'Provider not configured, skipping');
        this.record(attempts, { provider: provider.id, outcome: 'skipped', durationMs: 0 });
        if (next) this.onFallback?.(provider.id, next.id, 'not configured');
        continue;
      }

      // --- execution -----------------------------------------------------
      const start = performance.now();
      let answer: ProviderFetchResult;
      try {
        answer = await withTimeout(
          provider.fetch(serviceId, lookupKey, { timeoutMs: provider.timeoutMs, signal }),
          provider.timeoutMs,
          `Provider "${provider.id}"`,
        );
      } catch (err: unknown) {
        answer = {
          kind: 'unavailable',
          reason: err instanceof TimeoutError ? err.message : `transport error: ${errorMessage(err)}`,
        };
      }
      const durationMs = Math.round(performance.now() - start);

      if (answer.kind === 'found') {
        this.log.info({ provider: provider.id, serviceId, durationMs }, 'Provider succeeded');
        this.record(attempts, { provider: provider.id, outcome: 'found', durationMs });
        return { payload: answer.payload, provider: provider.id, attempts };
      }

      if (answer.kind === 'not_found') {
        this.log.info({ provider: provider.id, serviceId, durationMs }, 'Provider has no record');
        this.record(attempts, { provider: provider.id, outcome: 'not_found', durationMs });
        if (next) this.onFallback?.(provider.id, next.id, 'not found');
        continue;
      }

      this.log.warn({ provider: provider.id, serviceId, durationMs, error: answer.reason }, 'Provider failed');
      this.record(attempts, {
        provider: provider.id,
        outcome: 'unavailable',
        error: answer.reason,
        durationMs,
      });
      if (next) this.onFallback?.(provider.id, next.id, answer.reason);
    }

    throw new FallbackChainError(
      this.providers.length === 0
        ? 'Fallback chain is empty'
        : `All ${this.providers.length} providers exhausted`,
      attempts,
    );
  }

  /**
   * Return the ordered list of provider ids.
   */
  getProviderIds(): string[] {
    return this.providers.map((p) => p.id);
  }

  private record(attempts: FallbackAttempt[], attempt: FallbackAttempt): void {
    attempts.push(attempt);
    this.onAttempt?.(attempt);
  }
}

// ---------------------------------------------------------------------------
// FallbackChainError
// ---------------------------------------------------------------------------

/** Error thrown when the entire chain is exhausted. */
export class FallbackChainError extends Error {
  public readonly attempts: FallbackAttempt[];

  constructor(message: string, attempts: FallbackAttempt[]) {
    super(message);
    this.name = 'FallbackChainError';
    this.attempts = attempts;
  }
}
