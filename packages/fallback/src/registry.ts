/**
 * @verigate/fallback - ProviderRegistry
 *
 * Maps provider ids to their ExternalProvider instances and builds the
 * per-service FallbackChain from a service's declared chain.
 */

import pino from 'pino';
import { FallbackChain, type ExternalProvider, type FallbackAttempt } from './chain.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Status of an individual provider within a chain. */
export interface ProviderStatus {
  id: string;
  configured: boolean;
}

/** Aggregate status returned by getChainStatus(). */
export interface ChainStatus {
  serviceId: string;
  providers: ProviderStatus[];
}

export interface ChainHooks {
  onFallback?: (from: string, to: string, reason: string) => void;
  onAttempt?: (attempt: FallbackAttempt) => void;
}

// ---------------------------------------------------------------------------
// ProviderRegistry
// ---------------------------------------------------------------------------

export class ProviderRegistry {
  private readonly providers = new Map<string, ExternalProvider>();
  private readonly log: pino.Logger;

  constructor(providers: ExternalProvider[] = [], logger?: pino.Logger) {
    this.log = logger ?? pino({ name: 'verigate:providers' });
    for (const provider of providers) {
      this.register(provider);
    }
  }

  /**
   * Register (or replace) a provider.
   */
  register(provider: ExternalProvider): void {
    if (this.providers.has(provider.id)) {
      this.log.info({ provider: provider.id }, 'Replacing existing provider');
    }
    this.providers.set(provider.id, provider);
  }

  get(id: string): ExternalProvider | undefined {
    return this.providers.get(id);
  }

  list(): ExternalProvider[] {
    return Array.from(this.providers.values());
  }

  /**
   * Providers for the given ids, in the given order. Unknown ids are
   * dropped with a warning; config validation rejects them up front.
   */
  pick(ids: readonly string[]): ExternalProvider[] {
    const picked: ExternalProvider[] = [];
    for (const id of ids) {
      const provider = this.providers.get(id);
      if (provider) {
        picked.push(provider);
      } else {
        this.log.warn({ provider: id }, 'Unknown provider in fallback chain');
      }
    }
    return picked;
  }

  /**
   * Build a chain for one service's declared provider order.
   */
  chainFor(chainIds: readonly string[], hooks: ChainHooks = {}): FallbackChain {
    return new FallbackChain({
      providers: this.pick(chainIds),
      onFallback: hooks.onFallback,
      onAttempt: hooks.onAttempt,
      logger: this.log,
    });
  }

  getChainStatus(serviceId: string, chainIds: readonly string[]): ChainStatus {
    return {
      serviceId,
      providers: this.pick(chainIds).map((p) => ({ id: p.id, configured: p.isConfigured(serviceId) })),
    };
  }
}
