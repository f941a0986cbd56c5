/**
 * Composition root
 *
 * Builds every gateway component from one configuration snapshot. Stores
 * and providers can be injected so tests run the full stack in process.
 */

import pino from 'pino';
import { buildPaths, type GatewayConfig, type GatewayPaths } from '@verigate/core';
import { FallbackResolver, HealthChecker, ProviderRegistry, type ExternalProvider } from '@verigate/fallback';
import { CreditLedger } from '@verigate/ledger';
import { createProviderRegistry } from '@verigate/providers';
import { createStores, type StoreBundle } from '@verigate/store';

import { GatewayAuth } from './gateway/auth.js';
import { HealthMonitor } from './gateway/health.js';
import { GatewayServer } from './gateway/server.js';
import { AccessGate } from './pipeline/access-gate.js';
import { KeyManager } from './pipeline/key-manager.js';
import { RequestPipeline } from './pipeline/request-pipeline.js';
import { ServiceRegistry } from './pipeline/service-registry.js';
import { UsageLogger } from './pipeline/usage-logger.js';

export interface CreateGatewayOptions {
  paths?: GatewayPaths;
  /** Replaces the stores chosen by `storage.backend`. */
  stores?: StoreBundle;
  /** Replaces the HTTP providers built from `providers[]`. */
  providers?: ExternalProvider[];
  logger?: pino.Logger;
  /** Skip the background provider polling. */
  healthPolling?: boolean;
}

export interface Gateway {
  config: GatewayConfig;
  stores: StoreBundle;
  providers: ProviderRegistry;
  checker: HealthChecker;
  services: ServiceRegistry;
  gate: AccessGate;
  ledger: CreditLedger;
  resolver: FallbackResolver;
  usage: UsageLogger;
  pipeline: RequestPipeline;
  keys: KeyManager;
  health: HealthMonitor;
  server: GatewayServer;
  /** Start listening; resolves with the bound port. */
  start(): Promise<number>;
  stop(): Promise<void>;
}

export async function createGateway(config: GatewayConfig, options: CreateGatewayOptions = {}): Promise<Gateway> {
  const log = options.logger ?? pino({ name: 'verigate' });
  const child = (area: string): pino.Logger => log.child({ area });

  const stores = options.stores ?? createStores(config, (options.paths ?? buildPaths()).database);

  const providers = options.providers
    ? new ProviderRegistry(options.providers, child('providers'))
    : createProviderRegistry(config, child('providers'));

  const checker = new HealthChecker(providers, {
    intervalMs: config.health.intervalMs,
    degradedThreshold: config.health.degradedThreshold,
    onDegraded: (providerId) => log.warn({ provider: providerId }, 'Provider degraded'),
    logger: child('health'),
  });

  const services = new ServiceRegistry(config.services, stores.serviceState, child('services'));
  await services.load();

  const gate = new AccessGate(stores.grants, stores.callers, child('access'));
  const ledger = new CreditLedger({
    accounts: stores.accounts,
    lockTimeoutMs: config.ledger.lockTimeoutMs,
    maxConflictRetries: config.ledger.maxConflictRetries,
    logger: child('ledger'),
  });
  const resolver = new FallbackResolver({
    store: stores.records,
    registry: providers,
    storageTimeoutMs: config.storage.timeoutMs,
    onAttempt: (attempt) => checker.recordAttempt(attempt),
    logger: child('resolver'),
  });
  const usage = new UsageLogger(stores.usage, child('usage'));
  const pipeline = new RequestPipeline({ gate, services, ledger, resolver, usage, logger: child('pipeline') });
  const keys = new KeyManager(stores.grants, services, child('keys'));
  const health = new HealthMonitor(checker, services, ledger, usage);

  const server = new GatewayServer({
    config: config.gateway,
    auth: new GatewayAuth(config.gateway.adminToken, child('auth')),
    health,
    pipeline,
    gate,
    ledger,
    services,
    keys,
    usage,
    logger: child('gateway'),
  });

  const pollHealth = options.healthPolling ?? true;

  return {
    config,
    stores,
    providers,
    checker,
    services,
    gate,
    ledger,
    resolver,
    usage,
    pipeline,
    keys,
    health,
    server,
    async start() {
      const port = await server.start();
      if (pollHealth) checker.start();
      return port;
    },
    async stop() {
      checker.stop();
      await server.stop();
      if (ledger.owedCount > 0) {
        const settled = await ledger.reconcile();
        log.warn({ settled, remaining: ledger.owedCount }, 'Owed refunds at shutdown');
      }
      stores.close();
    },
  };
}
