/**
 * @verigate/store - Suspended callers
 */

import type { CallerStatusStore } from '@verigate/core';
import type { GatewayDatabase } from './database.js';

export class SqliteCallerStatusStore implements CallerStatusStore {
  constructor(private readonly database: GatewayDatabase) {}

  async isSuspended(callerId: string): Promise<boolean> {
    const row = this.database.db
      .prepare<[string], { caller_id: string }>('SELECT caller_id FROM suspended_callers WHERE caller_id = ?')
      .get(callerId);
    return row !== undefined;
  }

  async setSuspended(callerId: string, suspended: boolean): Promise<boolean> {
    const result = suspended
      ? this.database.db
          .prepare<[string, string]>(
            'INSERT INTO suspended_callers (caller_id, suspended_at) VALUES (?, ?) ON CONFLICT (caller_id) DO NOTHING',
          )
          .run(callerId, new Date().toISOString())
      : this.database.db.prepare<[string]>('DELETE FROM suspended_callers WHERE caller_id = ?').run(callerId);
    return result.changes > 0;
  }

  async listSuspended(): Promise<string[]> {
    return this.database.db
      .prepare<[], { caller_id: string }>('SELECT caller_id FROM suspended_callers ORDER BY caller_id')
      .all()
      .map((r) => r.caller_id);
  }
}

export class InMemoryCallerStatusStore implements CallerStatusStore {
  private readonly suspended = new Set<string>();

  async isSuspended(callerId: string): Promise<boolean> {
    return this.suspended.has(callerId);
  }

  async setSuspended(callerId: string, suspended: boolean): Promise<boolean> {
    const was = this.suspended.has(callerId);
    if (suspended) this.suspended.add(callerId);
    else this.suspended.delete(callerId);
    return was !== suspended;
  }

  async listSuspended(): Promise<string[]> {
    return [...this.suspended].sort();
  }
}
