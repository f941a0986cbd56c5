/**
 * @verigate/store - Persistence for records, keys, credits and usage
 *
 * Every store has a SQLite implementation and an in-memory twin with the
 * same contract.
 */

import type {
  AccountStore,
  CallerStatusStore,
  GatewayConfig,
  GrantStore,
  RecordStore,
  ServiceStateStore,
  UsageLogSink,
} from '@verigate/core';
import { GatewayDatabase } from './database.js';
import { SqliteRecordStore, InMemoryRecordStore } from './record-store.js';
import { SqliteGrantStore, InMemoryGrantStore } from './grant-store.js';
import { SqliteAccountStore, InMemoryAccountStore } from './account-store.js';
import { SqliteUsageLog, InMemoryUsageLog } from './usage-log.js';
import { SqliteServiceStateStore, InMemoryServiceStateStore } from './service-state.js';
import { SqliteCallerStatusStore, InMemoryCallerStatusStore } from './caller-status.js';

export { GatewayDatabase, IN_MEMORY } from './database.js';
export { SqliteRecordStore, InMemoryRecordStore } from './record-store.js';
export { SqliteGrantStore, InMemoryGrantStore } from './grant-store.js';
export { SqliteAccountStore, InMemoryAccountStore } from './account-store.js';
export { SqliteUsageLog, InMemoryUsageLog } from './usage-log.js';
export { SqliteServiceStateStore, InMemoryServiceStateStore } from './service-state.js';
export { SqliteCallerStatusStore, InMemoryCallerStatusStore } from './caller-status.js';

/** Every collaborator store the gateway needs. */
export interface StoreBundle {
  records: RecordStore;
  grants: GrantStore;
  accounts: AccountStore;
  usage: UsageLogSink;
  serviceState: ServiceStateStore;
  callers: CallerStatusStore;
  close(): void;
}

export function createSqliteStores(dbPath: string): StoreBundle {
  const database = new GatewayDatabase(dbPath);
  return {
    records: new SqliteRecordStore(database),
    grants: new SqliteGrantStore(database),
    accounts: new SqliteAccountStore(database),
    usage: new SqliteUsageLog(database),
    serviceState: new SqliteServiceStateStore(database),
    callers: new SqliteCallerStatusStore(database),
    close: () => database.close(),
  };
}

export function createInMemoryStores(): StoreBundle {
  return {
    records: new InMemoryRecordStore(),
    grants: new InMemoryGrantStore(),
    accounts: new InMemoryAccountStore(),
    usage: new InMemoryUsageLog(),
    serviceState: new InMemoryServiceStateStore(),
    callers: new InMemoryCallerStatusStore(),
    close: () => undefined,
  };
}

/**
 * Pick the backend named by `storage.backend`. `defaultPath` is used when
 * the config gives no explicit database path.
 */
export function createStores(config: GatewayConfig, defaultPath: string): StoreBundle {
  if (config.storage.backend === 'memory') {
    return createInMemoryStores();
  }
  return createSqliteStores(config.storage.path ?? defaultPath);
}
