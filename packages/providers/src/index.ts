/**
 * @verigate/providers - Concrete ExternalProvider implementations
 */

import pino from 'pino';
import type { GatewayConfig } from '@verigate/core';
import { ProviderRegistry } from '@verigate/fallback';
import { HttpProvider } from './http-provider.js';

export { HttpProvider, interpretBody } from './http-provider.js';

/**
 * Build one HttpProvider per configured provider entry. Called once at
 * startup; instances never re-read configuration.
 */
export function createProviderRegistry(config: GatewayConfig, logger?: pino.Logger): ProviderRegistry {
  const log = logger ?? pino({ name: 'verigate:providers' });
  const providers = config.providers.map((entry) => new HttpProvider(entry, log));

  for (const provider of providers) {
    if (!provider.hasCredentials) {
      log.info({ provider: provider.id }, 'Provider has no credentials and will be skipped');
    }
  }

  return new ProviderRegistry(providers, log);
}
