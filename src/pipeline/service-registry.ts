/**
 * ServiceRegistry
 *
 * The service catalog. Definitions come from the config snapshot; only the
 * active flag changes at runtime, and such changes are persisted so they
 * survive a restart. Every change swaps in a new frozen definition, so a
 * request keeps the definition it resolved even if the service is toggled
 * while it runs.
 */

import pino from 'pino';
import {
  ServiceInactiveError,
  ServiceNotFoundError,
  type ServiceDefinition,
  type ServiceStateStore,
} from '@verigate/core';

export class ServiceRegistry {
  private readonly services = new Map<string, Readonly<ServiceDefinition>>();
  private readonly patterns = new Map<string, RegExp>();
  private readonly state?: ServiceStateStore;
  private readonly log: pino.Logger;

  constructor(definitions: readonly ServiceDefinition[], state?: ServiceStateStore, logger?: pino.Logger) {
    this.state = state;
    this.log = logger ?? pino({ name: 'verigate:services' });

    for (const def of definitions) {
      this.services.set(def.id, freeze(def));
      if (def.keyPattern !== undefined) {
        this.patterns.set(def.id, new RegExp(def.keyPattern));
      }
    }
  }

  /**
   * Apply active-flag overrides saved by earlier runs.
   */
  async load(): Promise<void> {
    if (!this.state) return;
    const overrides = await this.state.loadOverrides();
    for (const [serviceId, active] of overrides) {
      const def = this.services.get(serviceId);
      if (!def) {
        this.log.warn({ serviceId }, 'Override for unknown service ignored');
        continue;
      }
      this.services.set(serviceId, freeze({ ...def, active }));
    }
    this.log.info({ services: this.services.size, overrides: overrides.size }, 'Service registry loaded');
  }

  /**
   * Definition for a request. Throws ServiceNotFoundError or
   * ServiceInactiveError.
   */
  resolveService(serviceId: string): Readonly<ServiceDefinition> {
    const def = this.services.get(serviceId);
    if (!def) {
      throw new ServiceNotFoundError(serviceId);
    }
    if (!def.active) {
      throw new ServiceInactiveError(serviceId);
    }
    return def;
  }

  get(serviceId: string): Readonly<ServiceDefinition> | undefined {
    return this.services.get(serviceId);
  }

  list(): Readonly<ServiceDefinition>[] {
    return Array.from(this.services.values());
  }

  /** Whether `lookupKey` satisfies the service's keyPattern (if any). */
  acceptsKey(serviceId: string, lookupKey: string): boolean {
    const pattern = this.patterns.get(serviceId);
    return pattern ? pattern.test(lookupKey) : true;
  }

  /**
   * Enable or disable a service. Visible to every request that resolves
   * the service afterwards.
   */
  async setActive(serviceId: string, active: boolean): Promise<Readonly<ServiceDefinition>> {
    const def = this.services.get(serviceId);
    if (!def) {
      throw new ServiceNotFoundError(serviceId);
    }

    await this.state?.saveOverride(serviceId, active);
    const next = freeze({ ...def, active });
    this.services.set(serviceId, next);

    this.log.info({ serviceId, active }, 'Service state changed');
    return next;
  }
}

function freeze(def: ServiceDefinition): Readonly<ServiceDefinition> {
  return Object.freeze({ ...def, fallbackChain: [...def.fallbackChain] });
}
