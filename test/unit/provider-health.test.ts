/**
 * Unit Tests for HealthChecker
 *
 * Tests pings, passive attempt tracking, degradation and report derivation.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HealthChecker, ProviderRegistry } from '@verigate/fallback';
import { FakeProvider, notFound, service } from '../support/fakes.js';

vi.mock('pino', () => {
  const logger: Record<string, unknown> = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  logger['child'] = () => logger;
  return { default: () => logger };
});

describe('HealthChecker', () => {
  let api1: FakeProvider;
  let api2: FakeProvider;
  let checker: HealthChecker;
  let onDegraded: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    api1 = new FakeProvider('api1', () => notFound());
    api2 = new FakeProvider('api2', () => notFound());
    onDegraded = vi.fn();
    checker = new HealthChecker(new ProviderRegistry([api1, api2]), { degradedThreshold: 2, onDegraded });
  });

  afterEach(() => {
    checker.stop();
  });

  // ---------------------------------------------------------------------------
  // Pings
  // ---------------------------------------------------------------------------
  it('pings every provider and stamps the full check', async () => {
    api2.reachable = false;

    const results = await checker.checkAll();

    expect(results.map((r) => [r.id, r.available])).toEqual([
      ['api1', true],
      ['api2', false],
    ]);
    expect(checker.getProviderHealth('api2')?.consecutiveFailures).toBe(1);
    expect(checker.getReport([]).lastFullCheck).toBeInstanceOf(Date);
  });

  it('counts a ping that throws as unavailable', async () => {
    vi.spyOn(api1, 'ping').mockRejectedValue(new Error('EHOSTUNREACH'));
    await checker.checkAll();
    expect(checker.getProviderHealth('api1')?.available).toBe(false);
  });

  // ---------------------------------------------------------------------------
  // Passive tracking
  // ---------------------------------------------------------------------------
  it('marks a provider degraded after the threshold and notifies once', () => {
    checker.recordAttempt({ provider: 'api1', outcome: 'unavailable', error: 'HTTP 500: x', durationMs: 5 });
    expect(checker.getProviderHealth('api1')?.degraded).toBe(false);

    checker.recordAttempt({ provider: 'api1', outcome: 'unavailable', error: 'HTTP 500: x', durationMs: 5 });
    checker.recordAttempt({ provider: 'api1', outcome: 'unavailable', error: 'HTTP 500: x', durationMs: 5 });

    expect(checker.getProviderHealth('api1')?.degraded).toBe(true);
    expect(onDegraded).toHaveBeenCalledTimes(1);
    expect(onDegraded).toHaveBeenCalledWith('api1');
  });

  it('treats not_found as a healthy answer and ignores skips', () => {
    checker.recordAttempt({ provider: 'api1', outcome: 'unavailable', durationMs: 1 });
    checker.recordAttempt({ provider: 'api1', outcome: 'not_found', durationMs: 1 });
    checker.recordAttempt({ provider: 'api2', outcome: 'skipped', durationMs: 0 });

    expect(checker.getProviderHealth('api1')).toMatchObject({ available: true, consecutiveFailures: 0 });
    expect(checker.getProviderHealth('api2')).toBeUndefined();
  });

  // ---------------------------------------------------------------------------
  // Report
  // ---------------------------------------------------------------------------
  describe('getReport', () => {
    const rc = service({ id: 'rc', fallbackChain: ['api1', 'api2'] });
    const localOnly = service({ id: 'local-only', fallbackChain: [] });

    it('is healthy before anything was checked', () => {
      const report = checker.getReport([rc, localOnly]);
      expect(report.overallStatus).toBe('healthy');
      expect(report.services.map((s) => s.status)).toEqual(['healthy', 'healthy']);
    });

    it('is down when every provider of a chain is unavailable', async () => {
      api1.reachable = false;
      api2.reachable = false;
      await checker.checkAll();

      const report = checker.getReport([rc, localOnly]);
      expect(report.services).toEqual([
        expect.objectContaining({ serviceId: 'rc', status: 'down' }),
        expect.objectContaining({ serviceId: 'local-only', status: 'healthy' }),
      ]);
      expect(report.overallStatus).toBe('down');
    });

    it('is degraded while one provider is degraded and another still answers', async () => {
      api1.reachable = false;
      await checker.checkAll();
      await checker.checkAll();

      const report = checker.getReport([rc]);
      expect(report.services[0]?.status).toBe('degraded');
      expect(report.overallStatus).toBe('degraded');
    });
  });

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------
  it('runs an immediate check on start and stops cleanly', async () => {
    const ping = vi.spyOn(api1, 'ping');
    checker.start(60_000);
    expect(checker.running).toBe(true);

    await vi.waitFor(() => expect(ping).toHaveBeenCalledTimes(1));

    checker.stop();
    expect(checker.running).toBe(false);
  });
});
