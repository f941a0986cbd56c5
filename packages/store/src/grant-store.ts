/**
 * @verigate/store - API key grants and their service entitlements
 */

import type { ApiKeyGrant, GrantStore } from '@verigate/core';
import type { GatewayDatabase } from './database.js';

interface KeyRow {
  key_id: string;
  key_hash: string;
  key_prefix: string;
  caller_id: string;
  name: string;
  active: number;
  created_at: string;
  last_used_at: string | null;
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

export class SqliteGrantStore implements GrantStore {
  constructor(private readonly database: GatewayDatabase) {}

  async findByHash(keyHash: string): Promise<ApiKeyGrant | null> {
    const row = this.database.db
      .prepare<[string], KeyRow>('SELECT * FROM api_keys WHERE key_hash = ?')
      .get(keyHash);
    return row ? this.hydrate(row) : null;
  }

  async findById(keyId: string): Promise<ApiKeyGrant | null> {
    const row = this.database.db.prepare<[string], KeyRow>('SELECT * FROM api_keys WHERE key_id = ?').get(keyId);
    return row ? this.hydrate(row) : null;
  }

  async listByCaller(callerId: string): Promise<ApiKeyGrant[]> {
    const rows = this.database.db
      .prepare<[string], KeyRow>('SELECT * FROM api_keys WHERE caller_id = ? ORDER BY created_at, key_id')
      .all(callerId);
    return rows.map((row) => this.hydrate(row));
  }

  async insert(grant: ApiKeyGrant): Promise<void> {
    this.database.transaction(() => {
      this.database.db
        .prepare<[string, string, string, string, string, number, string, string | null]>(
          `INSERT INTO api_keys (key_id, key_hash, key_prefix, caller_id, name, active, created_at, last_used_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          grant.keyId,
          grant.keyHash,
          grant.keyPrefix,
          grant.callerId,
          grant.name,
          grant.active ? 1 : 0,
          grant.createdAt,
          grant.lastUsedAt,
        );
      this.writeServices(grant.keyId, grant.services);
    });
  }

  async setActive(keyId: string, active: boolean): Promise<boolean> {
    const result = this.database.db
      .prepare<[number, string]>('UPDATE api_keys SET active = ? WHERE key_id = ?')
      .run(active ? 1 : 0, keyId);
    return result.changes > 0;
  }

  async addService(keyId: string, serviceId: string): Promise<ApiKeyGrant | null> {
    return this.database.transaction(() => {
      const row = this.database.db.prepare<[string], KeyRow>('SELECT * FROM api_keys WHERE key_id = ?').get(keyId);
      if (!row) return null;
      this.writeServices(keyId, [serviceId]);
      return this.hydrate(row);
    });
  }

  async removeService(keyId: string, serviceId: string): Promise<ApiKeyGrant | null> {
    return this.database.transaction(() => {
      const row = this.database.db.prepare<[string], KeyRow>('SELECT * FROM api_keys WHERE key_id = ?').get(keyId);
      if (!row) return null;
      this.database.db
        .prepare<[string, string]>('DELETE FROM api_key_services WHERE key_id = ? AND service_id = ?')
        .run(keyId, serviceId);
      return this.hydrate(row);
    });
  }

  async touch(keyId: string, at: string): Promise<void> {
    this.database.db.prepare<[string, string]>('UPDATE api_keys SET last_used_at = ? WHERE key_id = ?').run(at, keyId);
  }

  private writeServices(keyId: string, services: readonly string[]): void {
    const stmt = this.database.db.prepare<[string, string]>(
      'INSERT OR IGNORE INTO api_key_services (key_id, service_id) VALUES (?, ?)',
    );
    for (const serviceId of services) {
      stmt.run(keyId, serviceId);
    }
  }

  private hydrate(row: KeyRow): ApiKeyGrant {
    const services = this.database.db
      .prepare<[string], { service_id: string }>(
        'SELECT service_id FROM api_key_services WHERE key_id = ? ORDER BY service_id',
      )
      .all(row.key_id)
      .map((r) => r.service_id);

    return {
      keyId: row.key_id,
      keyHash: row.key_hash,
      keyPrefix: row.key_prefix,
      callerId: row.caller_id,
      name: row.name,
      services,
      active: row.active === 1,
      createdAt: row.created_at,
      lastUsedAt: row.last_used_at,
    };
  }
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class InMemoryGrantStore implements GrantStore {
  private readonly grants = new Map<string, ApiKeyGrant>();

  async findByHash(keyHash: string): Promise<ApiKeyGrant | null> {
    for (const grant of this.grants.values()) {
      if (grant.keyHash === keyHash) return clone(grant);
    }
    return null;
  }

  async findById(keyId: string): Promise<ApiKeyGrant | null> {
    const grant = this.grants.get(keyId);
    return grant ? clone(grant) : null;
  }

  async listByCaller(callerId: string): Promise<ApiKeyGrant[]> {
    return Array.from(this.grants.values())
      .filter((g) => g.callerId === callerId)
      .map(clone);
  }

  async insert(grant: ApiKeyGrant): Promise<void> {
    for (const existing of this.grants.values()) {
      if (existing.keyHash === grant.keyHash) {
        throw new Error(`Duplicate key hash for "${grant.keyId}"`);
      }
    }
    this.grants.set(grant.keyId, { ...grant, services: Array.from(new Set(grant.services)).sort() });
  }

  async setActive(keyId: string, active: boolean): Promise<boolean> {
    const grant = this.grants.get(keyId);
    if (!grant) return false;
    grant.active = active;
    return true;
  }

  async addService(keyId: string, serviceId: string): Promise<ApiKeyGrant | null> {
    const grant = this.grants.get(keyId);
    if (!grant) return null;
    if (!grant.services.includes(serviceId)) {
      grant.services = [...grant.services, serviceId].sort();
    }
    return clone(grant);
  }

  async removeService(keyId: string, serviceId: string): Promise<ApiKeyGrant | null> {
    const grant = this.grants.get(keyId);
    if (!grant) return null;
    grant.services = grant.services.filter((s) => s !== serviceId);
    return clone(grant);
  }

  async touch(keyId: string, at: string): Promise<void> {
    const grant = this.grants.get(keyId);
    if (grant) grant.lastUsedAt = at;
  }
}

function clone(grant: ApiKeyGrant): ApiKeyGrant {
  return { ...grant, services: [...grant.services] };
}
