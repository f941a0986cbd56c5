/**
 * @verigate/store - Append-only usage log
 */

import type { UsageLogEntry, UsageLogSink, UsageOutcome } from '@verigate/core';
import type { GatewayDatabase } from './database.js';

interface UsageRow {
  id: string;
  caller_id: string | null;
  key_id: string | null;
  service_id: string;
  lookup_key: string;
  outcome: UsageOutcome;
  failure_code: string | null;
  source: string | null;
  credits_charged: number;
  balance_after: number | null;
  duration_ms: number;
  created_at: string;
}

function rowToEntry(row: UsageRow): UsageLogEntry {
  return {
    id: row.id,
    callerId: row.caller_id,
    keyId: row.key_id,
    serviceId: row.service_id,
    lookupKey: row.lookup_key,
    outcome: row.outcome,
    failureCode: row.failure_code,
    source: row.source,
    creditsCharged: row.credits_charged,
    balanceAfter: row.balance_after,
    durationMs: row.duration_ms,
    createdAt: row.created_at,
  };
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

export class SqliteUsageLog implements UsageLogSink {
  constructor(private readonly database: GatewayDatabase) {}

  async append(entry: UsageLogEntry): Promise<void> {
    this.database.db
      .prepare<
        [
          string,
          string | null,
          string | null,
          string,
          string,
          string,
          string | null,
          string | null,
          number,
          number | null,
          number,
          string,
        ]
      >(
        `INSERT INTO usage_log (id, caller_id, key_id, service_id, lookup_key, outcome, failure_code, source,
                                credits_charged, balance_after, duration_ms, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.id,
        entry.callerId,
        entry.keyId,
        entry.serviceId,
        entry.lookupKey,
        entry.outcome,
        entry.failureCode,
        entry.source,
        entry.creditsCharged,
        entry.balanceAfter,
        entry.durationMs,
        entry.createdAt,
      );
  }

  /** Newest first. */
  async listByCaller(callerId: string, limit = 50): Promise<UsageLogEntry[]> {
    return this.database.db
      .prepare<[string, number], UsageRow>(
        'SELECT * FROM usage_log WHERE caller_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
      )
      .all(callerId, limit)
      .map(rowToEntry);
  }

  async listRecent(limit = 50): Promise<UsageLogEntry[]> {
    return this.database.db
      .prepare<[number], UsageRow>('SELECT * FROM usage_log ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(limit)
      .map(rowToEntry);
  }
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class InMemoryUsageLog implements UsageLogSink {
  readonly entries: UsageLogEntry[] = [];

  async append(entry: UsageLogEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  async listByCaller(callerId: string, limit = 50): Promise<UsageLogEntry[]> {
    return this.entries
      .filter((e) => e.callerId === callerId)
      .reverse()
      .slice(0, limit);
  }

  async listRecent(limit = 50): Promise<UsageLogEntry[]> {
    return [...this.entries].reverse().slice(0, limit);
  }
}
