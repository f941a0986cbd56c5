/**
 * @verigate/fallback - HealthChecker
 *
 * Tracks provider health from two inputs: periodic pings, and the outcome
 * of real chain attempts fed in through `recordAttempt()`. Consecutive
 * failures past a threshold mark a provider degraded. Per-service status
 * is derived from the providers in that service's chain.
 */

import pino from 'pino';
import type { ServiceDefinition } from '@verigate/core';
import type { ProviderRegistry } from './registry.js';
import type { FallbackAttempt } from './chain.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Health snapshot for a single provider. */
export interface ProviderHealth {
  id: string;
  available: boolean;
  lastCheck: Date;
  lastLatencyMs: number;
  consecutiveFailures: number;
  /** True when consecutiveFailures >= degradedThreshold. */
  degraded: boolean;
}

/** Overall status level. */
export type OverallStatus = 'healthy' | 'degraded' | 'down';

/** Per-service summary inside a HealthReport. */
export interface ServiceHealth {
  serviceId: string;
  providers: ProviderHealth[];
  status: OverallStatus;
}

/** Top-level health report returned by getReport(). */
export interface HealthReport {
  overallStatus: OverallStatus;
  providers: ProviderHealth[];
  services: ServiceHealth[];
  lastFullCheck: Date | null;
}

export interface HealthCheckerOptions {
  intervalMs?: number;
  degradedThreshold?: number;
  onDegraded?: (providerId: string) => void;
  logger?: pino.Logger;
}

// ---------------------------------------------------------------------------
// HealthChecker
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const checker = new HealthChecker(registry, { intervalMs: 30_000 });
 * checker.start();
 * // later...
 * checker.stop();
 * const report = checker.getReport(config.services);
 * ```
 */
export class HealthChecker {
  private readonly registry: ProviderRegistry;
  private readonly log: pino.Logger;
  private readonly degradedThreshold: number;
  private readonly onDegraded?: (providerId: string) => void;
  private readonly defaultIntervalMs: number;

  private readonly healthMap = new Map<string, ProviderHealth>();
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private lastFullCheck: Date | null = null;

  constructor(registry: ProviderRegistry, options: HealthCheckerOptions = {}) {
    this.registry = registry;
    this.defaultIntervalMs = options.intervalMs ?? 60_000;
    this.degradedThreshold = options.degradedThreshold ?? 3;
    this.onDegraded = options.onDegraded;
    this.log = options.logger ?? pino({ name: 'verigate:health' });
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  start(intervalMs?: number): void {
    if (this.intervalHandle) {
      this.log.warn('HealthChecker already running -- ignoring start()');
      return;
    }

    const ms = intervalMs ?? this.defaultIntervalMs;
    this.log.info({ intervalMs: ms }, 'Starting health checker');

    this.runCheck();
    this.intervalHandle = setInterval(() => this.runCheck(), ms);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.log.info('Health checker stopped');
    }
  }

  get running(): boolean {
    return this.intervalHandle !== null;
  }

  // -----------------------------------------------------------------------
  // Checks
  // -----------------------------------------------------------------------

  /**
   * Ping every registered provider once.
   */
  async checkAll(): Promise<ProviderHealth[]> {
    const results = await Promise.all(
      this.registry.list().map(async (provider) => {
        const start = performance.now();
        let available: boolean;
        try {
          available = await provider.ping();
        } catch (err: unknown) {
          this.log.debug({ provider: provider.id, err }, 'Ping threw');
          available = false;
        }
        return this.update(provider.id, available, Math.round(performance.now() - start));
      }),
    );

    this.lastFullCheck = new Date();
    return results;
  }

  /**
   * Feed the outcome of a real chain attempt. Skips carry no signal;
   * `not_found` counts as a healthy answer.
   */
  recordAttempt(attempt: FallbackAttempt): void {
    if (attempt.outcome === 'skipped' || attempt.outcome === 'discarded') return;
    this.update(attempt.provider, attempt.outcome !== 'unavailable', attempt.durationMs);
  }

  private runCheck(): void {
    this.checkAll().catch((err: unknown) => {
      this.log.error({ err }, 'Health check failed');
    });
  }

  private update(id: string, available: boolean, latencyMs: number): ProviderHealth {
    const existing = this.healthMap.get(id);
    const consecutiveFailures = available ? 0 : (existing?.consecutiveFailures ?? 0) + 1;
    const degraded = consecutiveFailures >= this.degradedThreshold;

    const health: ProviderHealth = {
      id,
      available,
      lastCheck: new Date(),
      lastLatencyMs: latencyMs,
      consecutiveFailures,
      degraded,
    };
    this.healthMap.set(id, health);

    if (degraded && !existing?.degraded) {
      this.log.warn({ provider: id, consecutiveFailures }, 'Provider marked degraded');
      this.onDegraded?.(id);
    } else if (!available) {
      this.log.debug({ provider: id, consecutiveFailures }, 'Provider unavailable');
    }

    return health;
  }

  // -----------------------------------------------------------------------
  // Report
  // -----------------------------------------------------------------------

  getProviderHealth(id: string): ProviderHealth | undefined {
    return this.healthMap.get(id);
  }

  /**
   * Build a report from the cached data. Providers never checked are left
   * out of their service's list.
   */
  getReport(services: readonly ServiceDefinition[]): HealthReport {
    const serviceHealth: ServiceHealth[] = services.map((service) => {
      const providers = service.fallbackChain
        .map((id) => this.healthMap.get(id))
        .filter((h): h is ProviderHealth => h !== undefined);
      return {
        serviceId: service.id,
        providers,
        status: deriveServiceStatus(service, providers),
      };
    });

    return {
      overallStatus: deriveOverallStatus(serviceHealth),
      providers: Array.from(this.healthMap.values()),
      services: serviceHealth,
      lastFullCheck: this.lastFullCheck,
    };
  }

  reset(): void {
    this.healthMap.clear();
    this.lastFullCheck = null;
  }
}

// ---------------------------------------------------------------------------
// Status derivation helpers
// ---------------------------------------------------------------------------

/**
 * - healthy : chain is empty (local only), unchecked, or has an available,
 *             non-degraded provider and none degraded
 * - degraded: something is available but at least one provider is degraded
 * - down    : every checked provider is unavailable
 */
function deriveServiceStatus(service: ServiceDefinition, providers: ProviderHealth[]): OverallStatus {
  if (service.fallbackChain.length === 0 || providers.length === 0) return 'healthy';

  const anyAvailable = providers.some((p) => p.available);
  const anyDegraded = providers.some((p) => p.degraded);

  if (!anyAvailable) return 'down';
  if (anyDegraded) return 'degraded';
  return 'healthy';
}

function deriveOverallStatus(services: ServiceHealth[]): OverallStatus {
  if (services.some((s) => s.status === 'down')) return 'down';
  if (services.some((s) => s.status === 'degraded')) return 'degraded';
  return 'healthy';
}
