/**
 * @verigate/store - Verification record persistence
 */

import { safeJsonParse, type RecordStore, type VerificationRecord } from '@verigate/core';
import type { GatewayDatabase } from './database.js';

interface RecordRow {
  service_id: string;
  lookup_key: string;
  payload: string;
  source: string;
  fetched_at: string;
}

function rowToRecord(row: RecordRow): VerificationRecord {
  return {
    serviceId: row.service_id,
    lookupKey: row.lookup_key,
    payload: safeJsonParse(row.payload),
    source: row.source,
    fetchedAt: row.fetched_at,
  };
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

export class SqliteRecordStore implements RecordStore {
  constructor(private readonly database: GatewayDatabase) {}

  async get(serviceId: string, lookupKey: string): Promise<VerificationRecord | null> {
    const row = this.database.db
      .prepare<[string, string], RecordRow>('SELECT * FROM records WHERE service_id = ? AND lookup_key = ?')
      .get(serviceId, lookupKey);
    return row ? rowToRecord(row) : null;
  }

  /** Last write wins for a given (service, key). */
  async put(serviceId: string, lookupKey: string, record: VerificationRecord): Promise<void> {
    this.database.db
      .prepare<[string, string, string, string, string]>(
        `INSERT INTO records (service_id, lookup_key, payload, source, fetched_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (service_id, lookup_key) DO UPDATE SET
           payload = excluded.payload,
           source = excluded.source,
           fetched_at = excluded.fetched_at`,
      )
      .run(serviceId, lookupKey, JSON.stringify(record.payload ?? null), record.source, record.fetchedAt);
  }

  count(): number {
    const row = this.database.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM records').get();
    return row?.n ?? 0;
  }
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class InMemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, VerificationRecord>();

  async get(serviceId: string, lookupKey: string): Promise<VerificationRecord | null> {
    const record = this.records.get(keyOf(serviceId, lookupKey));
    return record ? { ...record } : null;
  }

  async put(serviceId: string, lookupKey: string, record: VerificationRecord): Promise<void> {
    this.records.set(keyOf(serviceId, lookupKey), { ...record, serviceId, lookupKey });
  }

  count(): number {
    return this.records.size;
  }
}

function keyOf(serviceId: string, lookupKey: string): string {
  return `${serviceId}\u0000${lookupKey}`;
}
