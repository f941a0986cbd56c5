/**
 * @verigate/fallback - FallbackResolver
 *
 * Local store first, then the service's provider chain. A record fetched
 * from a provider is written back to the store under the provider's source
 * tag so the next lookup for the same identity stays local.
 */

import pino from 'pino';
import {
  LOCAL_SOURCE,
  RecordNotFoundError,
  RequestAbortedError,
  withTimeout,
  type RecordStore,
  type ServiceDefinition,
  type VerificationRecord,
} from '@verigate/core';
import { FallbackChainError, type FallbackAttempt } from './chain.js';
import type { ProviderRegistry } from './registry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolveResult {
  record: VerificationRecord;
  /** True when a stale local record was served because the chain failed. */
  stale: boolean;
  attempts: FallbackAttempt[];
}

export interface FallbackResolverOptions {
  store: RecordStore;
  registry: ProviderRegistry;
  /** Bound on each RecordStore call. */
  storageTimeoutMs?: number;
  /** Observer for every provider attempt (health tracking). */
  onAttempt?: (attempt: FallbackAttempt) => void;
  logger?: pino.Logger;
  now?: () => Date;
}

const HOUR_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// FallbackResolver
// ---------------------------------------------------------------------------

export class FallbackResolver {
  private readonly store: RecordStore;
  private readonly registry: ProviderRegistry;
  private readonly storageTimeoutMs: number;
  private readonly onAttempt?: (attempt: FallbackAttempt) => void;
  private readonly log: pino.Logger;
  private readonly now: () => Date;

  constructor(options: FallbackResolverOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.storageTimeoutMs = options.storageTimeoutMs ?? 2000;
    this.onAttempt = options.onAttempt;
    this.log = options.logger ?? pino({ name: 'verigate:resolver' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Resolve one record. Throws RecordNotFoundError when neither the store
   * nor any provider has it, RequestAbortedError when `signal` fires first.
   */
  async resolve(service: ServiceDefinition, lookupKey: string, signal?: AbortSignal): Promise<ResolveResult> {
    const local = await this.readLocal(service.id, lookupKey);

    if (local && !this.isStale(service, local)) {
      return { record: { ...local, source: LOCAL_SOURCE }, stale: false, attempts: [] };
    }

    const chain = this.registry.chainFor(service.fallbackChain, {
      onAttempt: this.onAttempt,
      onFallback: (from, to, reason) => {
        this.log.debug({ serviceId: service.id, from, to, reason }, 'Falling back');
      },
    });

    let attempts: FallbackAttempt[];
    try {
      const result = await chain.execute(service.id, lookupKey, signal);
      attempts = result.attempts;

      if (signal?.aborted) {
        const last = attempts[attempts.length - 1];
        if (last) last.outcome = 'discarded';
        this.log.info({ serviceId: service.id, provider: result.provider }, 'Caller gone, discarding provider result');
        throw new RequestAbortedError('resolving');
      }

      const record: VerificationRecord = {
        serviceId: service.id,
        lookupKey,
        payload: result.payload,
        source: result.provider,
        fetchedAt: this.now().toISOString(),
      };
      await this.writeLocal(record);
      return { record, stale: false, attempts };
    } catch (err: unknown) {
      if (!(err instanceof FallbackChainError)) throw err;
      if (signal?.aborted) throw new RequestAbortedError('resolving');
      attempts = err.attempts;
    }

    if (local) {
      this.log.warn(
        { serviceId: service.id, fetchedAt: local.fetchedAt },
        'Providers exhausted, serving stale local record',
      );
      return { record: { ...local, source: LOCAL_SOURCE }, stale: true, attempts };
    }

    throw new RecordNotFoundError(service.id, lookupKey, attempts);
  }

  private isStale(service: ServiceDefinition, record: VerificationRecord): boolean {
    if (service.maxAgeHours === undefined) return false;
    const fetched = Date.parse(record.fetchedAt);
    if (Number.isNaN(fetched)) return true;
    return this.now().getTime() - fetched > service.maxAgeHours * HOUR_MS;
  }

  /** A store read that fails or times out counts as a local miss. */
  private async readLocal(serviceId: string, lookupKey: string): Promise<VerificationRecord | null> {
    try {
      return await withTimeout(this.store.get(serviceId, lookupKey), this.storageTimeoutMs, 'Record store read');
    } catch (err: unknown) {
      this.log.warn({ serviceId, err }, 'Record store read failed, treating as miss');
      return null;
    }
  }

  /** The fetched payload is still served when the write-back fails. */
  private async writeLocal(record: VerificationRecord): Promise<void> {
    try {
      await withTimeout(
        this.store.put(record.serviceId, record.lookupKey, record),
        this.storageTimeoutMs,
        'Record store write',
      );
    } catch (err: unknown) {
      this.log.warn({ serviceId: record.serviceId, source: record.source, err }, 'Record store write failed');
    }
  }
}
