/**
 * UsageLogger
 *
 * Writes each finished request to the usage log sink and announces it to
 * in-process listeners (the WebSocket fan-out). A sink failure is logged
 * and swallowed: it never changes a request's outcome.
 */

import { EventEmitter } from 'node:events';
import pino from 'pino';
import type { UsageLogEntry, UsageLogSink } from '@verigate/core';

export const USAGE_EVENT = 'usage';

export class UsageLogger extends EventEmitter {
  private readonly sink: UsageLogSink;
  private readonly log: pino.Logger;
  private failures = 0;

  constructor(sink: UsageLogSink, logger?: pino.Logger) {
    super();
    this.sink = sink;
    this.log = logger ?? pino({ name: 'verigate:usage' });
  }

  /**
   * Append one entry. Resolves once the write has been attempted; never
   * rejects.
   */
  async record(entry: UsageLogEntry): Promise<void> {
    try {
      await this.sink.append(entry);
    } catch (err: unknown) {
      this.failures++;
      this.log.warn({ entryId: entry.id, serviceId: entry.serviceId, err }, 'Usage log write failed');
    }

    try {
      this.emit(USAGE_EVENT, entry);
    } catch (err: unknown) {
      this.log.error({ entryId: entry.id, err }, 'Usage listener threw');
    }
  }

  /** Subscribe to finished requests; returns the unsubscribe function. */
  onEntry(listener: (entry: UsageLogEntry) => void): () => void {
    this.on(USAGE_EVENT, listener);
    return () => {
      this.off(USAGE_EVENT, listener);
    };
  }

  listByCaller(callerId: string, limit?: number): Promise<UsageLogEntry[]> {
    return this.sink.listByCaller(callerId, limit);
  }

  listRecent(limit?: number): Promise<UsageLogEntry[]> {
    return this.sink.listRecent(limit);
  }

  /** Writes that failed since startup. */
  get failedWrites(): number {
    return this.failures;
  }
}
