/**
 * Verigate - Main Entry Point
 *
 * Boots the verification gateway:
 *   1. Ensure state directories and load configuration
 *   2. Build stores, providers, ledger and pipeline
 *   3. Start the HTTP + WebSocket server and provider health polling
 *   4. Handle graceful shutdown
 */

import pino from 'pino';
import { ensureDirectories, loadConfig } from '@verigate/core';
import { createGateway } from './app.js';
import { VERSION } from './gateway/health.js';

const log = pino({ name: 'verigate' });

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  log.info({ version: VERSION }, 'Verigate starting');

  // ---- 1. Ensure directories and load config ----

  const paths = ensureDirectories();
  log.info({ home: paths.home, stateDir: paths.stateDir }, 'Paths resolved');

  const { config, validation } = await loadConfig({ configPath: paths.config });

  for (const warn of validation.warnings) {
    log.warn({ path: warn.path }, `Config warning: ${warn.message}`);
  }

  if (!validation.valid) {
    for (const err of validation.errors) {
      log.error({ path: err.path }, `Config error: ${err.message}`);
    }
    throw new Error(`Configuration ${paths.config} is invalid`);
  }

  log.info(
    { services: config.services.length, providers: config.providers.length, storage: config.storage.backend },
    'Config loaded',
  );

  // ---- 2. Build and start ----

  const gateway = await createGateway(config, { paths, logger: log });
  const port = await gateway.start();

  log.info(
    {
      http: `http://${config.gateway.host}:${port}`,
      ws: `ws://${config.gateway.host}:${port}`,
      admin: config.gateway.adminToken ? 'enabled' : 'disabled',
    },
    'Verigate is ready',
  );

  // ---- 3. Graceful shutdown ----

  let shutdownInProgress = false;

  async function shutdown(signal: string): Promise<void> {
    if (shutdownInProgress) return;
    shutdownInProgress = true;

    log.info({ signal }, 'Shutting down');
    try {
      await gateway.stop();
      log.info('Shutdown complete');
      process.exit(0);
    } catch (err: unknown) {
      log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    log.error({ reason }, 'Unhandled rejection');
  });
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((err: unknown) => {
  log.fatal({ err }, 'Fatal error during startup');
  process.exit(1);
});
