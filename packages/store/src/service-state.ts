/**
 * @verigate/store - Runtime overrides of a service's active flag
 */

import type { ServiceStateStore } from '@verigate/core';
import type { GatewayDatabase } from './database.js';

export class SqliteServiceStateStore implements ServiceStateStore {
  constructor(private readonly database: GatewayDatabase) {}

  async loadOverrides(): Promise<Map<string, boolean>> {
    const rows = this.database.db
      .prepare<[], { service_id: string; active: number }>('SELECT service_id, active FROM service_overrides')
      .all();
    return new Map(rows.map((r) => [r.service_id, r.active === 1]));
  }

  async saveOverride(serviceId: string, active: boolean): Promise<void> {
    this.database.db
      .prepare<[string, number, string]>(
        `INSERT INTO service_overrides (service_id, active, updated_at) VALUES (?, ?, ?)
         ON CONFLICT (service_id) DO UPDATE SET active = excluded.active, updated_at = excluded.updated_at`,
      )
      .run(serviceId, active ? 1 : 0, new Date().toISOString());
  }
}

export class InMemoryServiceStateStore implements ServiceStateStore {
  private readonly overrides = new Map<string, boolean>();

  async loadOverrides(): Promise<Map<string, boolean>> {
    return new Map(this.overrides);
  }

  async saveOverride(serviceId: string, active: boolean): Promise<void> {
    this.overrides.set(serviceId, active);
  }
}
