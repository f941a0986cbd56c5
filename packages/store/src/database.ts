/**
 * @verigate/store - Database layer
 *
 * Owns the SQLite connection behind every persistent store.
 * Tables: records, api_keys, api_key_services, accounts, ledger_entries,
 * usage_log, service_overrides.
 *
 * DB location: <stateDir>/data/verigate.db (auto-created), or `:memory:`.
 */

import { dirname } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import Database from 'better-sqlite3';
import pino from 'pino';

const logger = pino({ name: 'verigate:store:database' });

export const IN_MEMORY = ':memory:';

export class GatewayDatabase {
  readonly db: Database.Database;
  readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;

    if (dbPath !== IN_MEMORY) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');

    this.initSchema();
    logger.info({ dbPath }, 'Database initialized');
  }

  // -------------------------------------------------------------------------
  // Schema
  // -------------------------------------------------------------------------

  private initSchema(): void {
    this.db.exec(`
      -- One row per (service, lookup key); put() upserts
      CREATE TABLE IF NOT EXISTS records (
        service_id  TEXT NOT NULL,
        lookup_key  TEXT NOT NULL,
        payload     TEXT NOT NULL DEFAULT 'null',
        source      TEXT NOT NULL,
        fetched_at  TEXT NOT NULL,
        PRIMARY KEY (service_id, lookup_key)
      );

      -- API keys: hash only, never plaintext
      CREATE TABLE IF NOT EXISTS api_keys (
        key_id        TEXT PRIMARY KEY,
        key_hash      TEXT NOT NULL UNIQUE,
        key_prefix    TEXT NOT NULL,
        caller_id     TEXT NOT NULL,
        name          TEXT NOT NULL DEFAULT '',
        active        INTEGER NOT NULL DEFAULT 1,
        created_at    TEXT NOT NULL,
        last_used_at  TEXT
      );

      CREATE TABLE IF NOT EXISTS api_key_services (
        key_id      TEXT NOT NULL REFERENCES api_keys(key_id) ON DELETE CASCADE,
        service_id  TEXT NOT NULL,
        PRIMARY KEY (key_id, service_id)
      );

      CREATE TABLE IF NOT EXISTS accounts (
        caller_id   TEXT PRIMARY KEY,
        balance     INTEGER NOT NULL CHECK (balance >= 0),
        version     INTEGER NOT NULL,
        updated_at  TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS ledger_entries (
        id              TEXT PRIMARY KEY,
        caller_id       TEXT NOT NULL,
        kind            TEXT NOT NULL,
        amount          INTEGER NOT NULL,
        balance_after   INTEGER NOT NULL,
        reservation_id  TEXT,
        created_at      TEXT NOT NULL
      );

      -- Append-only
      CREATE TABLE IF NOT EXISTS usage_log (
        id               TEXT PRIMARY KEY,
        caller_id        TEXT,
        key_id           TEXT,
        service_id       TEXT NOT NULL,
        lookup_key       TEXT NOT NULL,
        outcome          TEXT NOT NULL,
        failure_code     TEXT,
        source           TEXT,
        credits_charged  INTEGER NOT NULL DEFAULT 0,
        balance_after    INTEGER,
        duration_ms      INTEGER NOT NULL DEFAULT 0,
        created_at       TEXT NOT NULL
      );

      -- Callers refused by an admin
      CREATE TABLE IF NOT EXISTS suspended_callers (
        caller_id     TEXT PRIMARY KEY,
        suspended_at  TEXT NOT NULL
      );

      -- Runtime enable/disable of services
      CREATE TABLE IF NOT EXISTS service_overrides (
        service_id  TEXT PRIMARY KEY,
        active      INTEGER NOT NULL,
        updated_at  TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_api_keys_caller      ON api_keys(caller_id);
      CREATE INDEX IF NOT EXISTS idx_ledger_caller        ON ledger_entries(caller_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_usage_caller         ON usage_log(caller_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_usage_created        ON usage_log(created_at);
    `);
  }

  /**
   * Run `fn` inside a single SQLite transaction.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.info({ dbPath: this.dbPath }, 'Database closed');
    }
  }
}
