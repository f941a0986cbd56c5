/**
 * @verigate/store - Credit accounts and the ledger journal
 *
 * Balance writes are compare-and-set on `version`; the ledger retries when
 * a write loses the race.
 */

import type { AccountStore, CreditAccount, LedgerEntry, LedgerEntryKind } from '@verigate/core';
import type { GatewayDatabase } from './database.js';

interface AccountRow {
  caller_id: string;
  balance: number;
  version: number;
}

interface EntryRow {
  id: string;
  caller_id: string;
  kind: LedgerEntryKind;
  amount: number;
  balance_after: number;
  reservation_id: string | null;
  created_at: string;
}

function rowToEntry(row: EntryRow): LedgerEntry {
  return {
    id: row.id,
    callerId: row.caller_id,
    kind: row.kind,
    amount: row.amount,
    balanceAfter: row.balance_after,
    reservationId: row.reservation_id,
    createdAt: row.created_at,
  };
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

export class SqliteAccountStore implements AccountStore {
  constructor(private readonly database: GatewayDatabase) {}

  async get(callerId: string): Promise<CreditAccount | null> {
    const row = this.database.db
      .prepare<[string], AccountRow>('SELECT caller_id, balance, version FROM accounts WHERE caller_id = ?')
      .get(callerId);
    return row ? { callerId: row.caller_id, balance: row.balance, version: row.version } : null;
  }

  async compareAndSet(callerId: string, expectedVersion: number, balance: number): Promise<boolean> {
    const now = new Date().toISOString();

    if (expectedVersion === 0) {
      const result = this.database.db
        .prepare<[string, number, string]>(
          `INSERT INTO accounts (caller_id, balance, version, updated_at) VALUES (?, ?, 1, ?)
           ON CONFLICT (caller_id) DO NOTHING`,
        )
        .run(callerId, balance, now);
      return result.changes === 1;
    }

    const result = this.database.db
      .prepare<[number, string, string, number]>(
        `UPDATE accounts SET balance = ?, version = version + 1, updated_at = ?
         WHERE caller_id = ? AND version = ?`,
      )
      .run(balance, now, callerId, expectedVersion);
    return result.changes === 1;
  }

  async appendEntry(entry: LedgerEntry): Promise<void> {
    this.database.db
      .prepare<[string, string, string, number, number, string | null, string]>(
        `INSERT INTO ledger_entries (id, caller_id, kind, amount, balance_after, reservation_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.id,
        entry.callerId,
        entry.kind,
        entry.amount,
        entry.balanceAfter,
        entry.reservationId,
        entry.createdAt,
      );
  }

  /** Newest first. */
  async listEntries(callerId: string, limit = 50): Promise<LedgerEntry[]> {
    return this.database.db
      .prepare<[string, number], EntryRow>(
        'SELECT * FROM ledger_entries WHERE caller_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
      )
      .all(callerId, limit)
      .map(rowToEntry);
  }
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class InMemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<string, CreditAccount>();
  private readonly entries: LedgerEntry[] = [];

  async get(callerId: string): Promise<CreditAccount | null> {
    const account = this.accounts.get(callerId);
    return account ? { ...account } : null;
  }

  async compareAndSet(callerId: string, expectedVersion: number, balance: number): Promise<boolean> {
    if (balance < 0) {
      throw new Error(`Balance for "${callerId}" cannot go negative`);
    }
    const current = this.accounts.get(callerId);
    const currentVersion = current?.version ?? 0;
    if (currentVersion !== expectedVersion) return false;

    this.accounts.set(callerId, { callerId, balance, version: currentVersion + 1 });
    return true;
  }

  async appendEntry(entry: LedgerEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  async listEntries(callerId: string, limit = 50): Promise<LedgerEntry[]> {
    return this.entries
      .filter((e) => e.callerId === callerId)
      .reverse()
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }
}
