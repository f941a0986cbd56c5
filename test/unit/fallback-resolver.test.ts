/**
 * Unit Tests for FallbackResolver
 *
 * Tests local-first lookup, write-back, TTL staleness, stale serving,
 * store failures and cancellation.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RecordNotFoundError, RequestAbortedError, type VerificationRecord } from '@verigate/core';
import { FallbackResolver, ProviderRegistry } from '@verigate/fallback';
import { FakeProvider, FlakyRecordStore, found, notFound, service, unavailable } from '../support/fakes.js';

vi.mock('pino', () => {
  const logger: Record<string, unknown> = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  logger['child'] = () => logger;
  return { default: () => logger };
});

const NOW = new Date('2026-03-01T12:00:00.000Z');
const RC = service({ id: 'vehicle-rc-verification' });

function stored(overrides: Partial<VerificationRecord> = {}): VerificationRecord {
  return {
    serviceId: RC.id,
    lookupKey: 'MH12AB1234',
    payload: { owner: 'Stored Owner' },
    source: 'api2',
    fetchedAt: '2026-03-01T11:30:00.000Z',
    ...overrides,
  };
}

describe('FallbackResolver', () => {
  let store: FlakyRecordStore;
  let api1: FakeProvider;
  let api2: FakeProvider;
  let api3: FakeProvider;
  let resolver: FallbackResolver;

  beforeEach(() => {
    store = new FlakyRecordStore();
    api1 = new FakeProvider('api1', () => notFound(), { configured: false });
    api2 = new FakeProvider('api2', () => found({ owner: 'Fresh Owner' }));
    api3 = new FakeProvider('api3', () => found({ owner: 'Third Owner' }));
    resolver = new FallbackResolver({
      store,
      registry: new ProviderRegistry([api1, api2, api3]),
      storageTimeoutMs: 30,
      now: () => NOW,
    });
  });

  // ---------------------------------------------------------------------------
  // Local first
  // ---------------------------------------------------------------------------
  describe('Local store', () => {
    it('answers from the store without touching any provider', async () => {
      await store.put(RC.id, 'MH12AB1234', stored());

      const result = await resolver.resolve(RC, 'MH12AB1234');

      expect(result.record.source).toBe('local');
      expect(result.record.payload).toEqual({ owner: 'Stored Owner' });
      expect(result.stale).toBe(false);
      expect(result.attempts).toEqual([]);
      expect(api2.calls).toHaveLength(0);
    });

    it('writes a provider result back and serves it locally afterwards', async () => {
      const first = await resolver.resolve(RC, 'MH12AB1234');
      expect(first.record.source).toBe('api2');
      expect(first.record.fetchedAt).toBe(NOW.toISOString());
      expect(first.attempts.map((a) => a.outcome)).toEqual(['skipped', 'found']);

      const second = await resolver.resolve(RC, 'MH12AB1234');
      expect(second.record.source).toBe('local');
      expect(second.record.payload).toEqual({ owner: 'Fresh Owner' });
      expect(api2.calls).toHaveLength(1);
    });
  });

  // ---------------------------------------------------------------------------
  // TTL
  // ---------------------------------------------------------------------------
  describe('Staleness', () => {
    const withTtl = service({ id: RC.id, maxAgeHours: 1 });

    it('keeps using a record younger than maxAgeHours', async () => {
      await store.put(RC.id, 'MH12AB1234', stored({ fetchedAt: '2026-03-01T11:30:00.000Z' }));
      const result = await resolver.resolve(withTtl, 'MH12AB1234');
      expect(result.record.source).toBe('local');
      expect(api2.calls).toHaveLength(0);
    });

    it('refreshes a record older than maxAgeHours', async () => {
      await store.put(RC.id, 'MH12AB1234', stored({ fetchedAt: '2026-03-01T10:00:00.000Z' }));
      const result = await resolver.resolve(withTtl, 'MH12AB1234');
      expect(result.record.source).toBe('api2');
      expect(result.stale).toBe(false);
      expect(store.records.get(`${RC.id}\u0000MH12AB1234`)?.fetchedAt).toBe(NOW.toISOString());
    });

    it('serves the stale record when every provider fails', async () => {
      api2.answerWith(() => unavailable('HTTP 503: maintenance'));
      api3.answerWith(() => notFound());
      await store.put(RC.id, 'MH12AB1234', stored({ fetchedAt: '2026-02-01T00:00:00.000Z' }));

      const result = await resolver.resolve(withTtl, 'MH12AB1234');

      expect(result.stale).toBe(true);
      expect(result.record.source).toBe('local');
      expect(result.record.payload).toEqual({ owner: 'Stored Owner' });
      expect(result.attempts.map((a) => a.outcome)).toEqual(['skipped', 'unavailable', 'not_found']);
    });

    it('never treats a record as stale without maxAgeHours', async () => {
      await store.put(RC.id, 'MH12AB1234', stored({ fetchedAt: '2001-01-01T00:00:00.000Z' }));
      const result = await resolver.resolve(RC, 'MH12AB1234');
      expect(result.record.source).toBe('local');
    });
  });

  // ---------------------------------------------------------------------------
  // Not found
  // ---------------------------------------------------------------------------
  describe('Exhaustion', () => {
    it('throws RecordNotFoundError carrying every attempt', async () => {
      api2.answerWith(() => unavailable('HTTP 500: boom'));
      api3.answerWith(() => notFound());

      const err = await resolver.resolve(RC, 'XX00ZZ0000').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RecordNotFoundError);
      if (!(err instanceof RecordNotFoundError)) return;
      expect(err.code).toBe('RECORD_NOT_FOUND');
      expect(err.attempts.map((a) => [a.provider, a.outcome])).toEqual([
        ['api1', 'skipped'],
        ['api2', 'unavailable'],
        ['api3', 'not_found'],
      ]);
      expect(store.puts).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Store failures
  // ---------------------------------------------------------------------------
  describe('Store failures', () => {
    it('treats a failing read as a miss', async () => {
      store.failReads = true;
      const result = await resolver.resolve(RC, 'MH12AB1234');
      expect(result.record.source).toBe('api2');
    });

    it('treats a read that exceeds the storage timeout as a miss', async () => {
      store.hangReads = true;
      const result = await resolver.resolve(RC, 'MH12AB1234');
      expect(result.record.source).toBe('api2');
    });

    it('still returns the payload when the write-back fails', async () => {
      store.failWrites = true;
      const result = await resolver.resolve(RC, 'MH12AB1234');
      expect(result.record.payload).toEqual({ owner: 'Fresh Owner' });
      expect(store.puts).toBe(1);
      expect(store.records.size).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Cancellation
  // ---------------------------------------------------------------------------
  describe('Cancellation', () => {
    it('discards a result that arrives after the caller left', async () => {
      const controller = new AbortController();
      const onAttempt = vi.fn();
      api2.answerWith(() => {
        controller.abort();
        return found({ owner: 'Too Late' });
      });
      resolver = new FallbackResolver({
        store,
        registry: new ProviderRegistry([api1, api2, api3]),
        onAttempt,
        now: () => NOW,
      });

      await expect(resolver.resolve(RC, 'MH12AB1234', controller.signal)).rejects.toThrow(RequestAbortedError);
      expect(store.puts).toBe(0);
      expect(api3.calls).toHaveLength(0);
      expect(onAttempt).toHaveBeenLastCalledWith(expect.objectContaining({ provider: 'api2', outcome: 'discarded' }));
    });

    it('reports abort rather than not-found when the last provider was cut off', async () => {
      const controller = new AbortController();
      api2.answerWith(() => {
        controller.abort();
        return unavailable('socket closed');
      });
      resolver = new FallbackResolver({ store, registry: new ProviderRegistry([api1, api2]), now: () => NOW });

      await expect(resolver.resolve(RC, 'MH12AB1234', controller.signal)).rejects.toThrow(RequestAbortedError);
    });
  });
});
