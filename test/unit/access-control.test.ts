/**
 * Unit Tests for AccessGate, ServiceRegistry and KeyManager
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ALL_SERVICES,
  API_KEY_PREFIX,
  CallerSuspendedError,
  ForbiddenError,
  KeyNotFoundError,
  ServiceInactiveError,
  ServiceNotFoundError,
  UnauthenticatedError,
  InvalidRequestError,
  hashApiKey,
} from '@verigate/core';
import { InMemoryCallerStatusStore, InMemoryGrantStore, InMemoryServiceStateStore } from '@verigate/store';
import { AccessGate } from '../../src/pipeline/access-gate.js';
import { ServiceRegistry } from '../../src/pipeline/service-registry.js';
import { KeyManager } from '../../src/pipeline/key-manager.js';
import { service } from '../support/fakes.js';

vi.mock('pino', () => {
  const logger: Record<string, unknown> = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  logger['child'] = () => logger;
  return { default: () => logger };
});

const SERVICES = [
  service({ id: 'pan-verification', cost: 1, keyPattern: '^[A-Z]{5}[0-9]{4}[A-Z]$' }),
  service({ id: 'vehicle-rc-verification' }),
  service({ id: 'retired-service', active: false }),
];

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------
describe('ServiceRegistry', () => {
  let state: InMemoryServiceStateStore;
  let registry: ServiceRegistry;

  beforeEach(() => {
    state = new InMemoryServiceStateStore();
    registry = new ServiceRegistry(SERVICES, state);
  });

  it('resolves an active service', () => {
    expect(registry.resolveService('pan-verification')).toMatchObject({ id: 'pan-verification', cost: 1 });
  });

  it('distinguishes unknown from disabled services', () => {
    expect(() => registry.resolveService('nope')).toThrow(ServiceNotFoundError);
    expect(() => registry.resolveService('retired-service')).toThrow(ServiceInactiveError);
  });

  it('checks lookup keys against keyPattern only where one is declared', () => {
    expect(registry.acceptsKey('pan-verification', 'ABCDE1234F')).toBe(true);
    expect(registry.acceptsKey('pan-verification', 'abcde1234f')).toBe(false);
    expect(registry.acceptsKey('vehicle-rc-verification', 'anything at all')).toBe(true);
  });

  it('persists a toggle and leaves the previous definition untouched', async () => {
    const before = registry.resolveService('pan-verification');

    const after = await registry.setActive('pan-verification', false);

    expect(before.active).toBe(true);
    expect(after.active).toBe(false);
    expect(Object.isFrozen(after)).toBe(true);
    expect(() => registry.resolveService('pan-verification')).toThrow(ServiceInactiveError);
    expect((await state.loadOverrides()).get('pan-verification')).toBe(false);
  });

  it('refuses to toggle an unknown service', async () => {
    await expect(registry.setActive('nope', true)).rejects.toThrow(ServiceNotFoundError);
  });

  it('applies saved overrides on load and ignores unknown ids', async () => {
    await state.saveOverride('retired-service', true);
    await state.saveOverride('gone-service', false);

    const reloaded = new ServiceRegistry(SERVICES, state);
    await reloaded.load();

    expect(reloaded.resolveService('retired-service').active).toBe(true);
    expect(reloaded.get('gone-service')).toBeUndefined();
    expect(reloaded.list()).toHaveLength(3);
  });
});

// ---------------------------------------------------------------------------
// AccessGate + KeyManager
// ---------------------------------------------------------------------------
describe('AccessGate and KeyManager', () => {
  let grants: InMemoryGrantStore;
  let callers: InMemoryCallerStatusStore;
  let gate: AccessGate;
  let keys: KeyManager;

  beforeEach(() => {
    grants = new InMemoryGrantStore();
    callers = new InMemoryCallerStatusStore();
    gate = new AccessGate(grants, callers);
    keys = new KeyManager(grants, new ServiceRegistry(SERVICES));
  });

  describe('KeyManager', () => {
    it('returns the plaintext once and stores only its hash', async () => {
      const created = await keys.createKey('acme', 'primary', ['vehicle-rc-verification', 'pan-verification']);

      expect(created.apiKey.startsWith(`${API_KEY_PREFIX}_`)).toBe(true);
      expect(created.grant).not.toHaveProperty('keyHash');
      expect(created.grant).toMatchObject({
        callerId: 'acme',
        name: 'primary',
        services: ['pan-verification', 'vehicle-rc-verification'],
        active: true,
        lastUsedAt: null,
        keyPrefix: created.apiKey.slice(0, 12),
      });

      const stored = await grants.findById(created.grant.keyId);
      expect(stored?.keyHash).toBe(hashApiKey(created.apiKey));
    });

    it('rejects unknown services and an empty caller id', async () => {
      await expect(keys.createKey('acme', 'k', ['nope'])).rejects.toThrow(ServiceNotFoundError);
      await expect(keys.createKey('  ', 'k', [])).rejects.toThrow(InvalidRequestError);
    });

    it('grants and withdraws services without duplicates', async () => {
      const { grant } = await keys.createKey('acme', 'k', ['pan-verification']);

      expect((await keys.grantService(grant.keyId, 'pan-verification')).services).toEqual(['pan-verification']);
      expect((await keys.grantService(grant.keyId, 'vehicle-rc-verification')).services).toEqual([
        'pan-verification',
        'vehicle-rc-verification',
      ]);
      expect((await keys.revokeService(grant.keyId, 'pan-verification')).services).toEqual([
        'vehicle-rc-verification',
      ]);
    });

    it('keeps every one of several concurrent entitlement changes', async () => {
      const { grant } = await keys.createKey('acme', 'k', ['pan-verification']);

      await Promise.all([
        keys.grantService(grant.keyId, 'vehicle-rc-verification'),
        keys.grantService(grant.keyId, 'retired-service'),
        keys.revokeService(grant.keyId, 'pan-verification'),
      ]);

      expect((await grants.findById(grant.keyId))?.services).toEqual(['retired-service', 'vehicle-rc-verification']);
    });

    it('accepts the wildcard in place of a service id', async () => {
      const { grant } = await keys.createKey('acme', 'k', [ALL_SERVICES]);
      expect(grant.services).toEqual([ALL_SERVICES]);

      const { grant: other } = await keys.createKey('acme', 'k2', []);
      expect((await keys.grantService(other.keyId, ALL_SERVICES)).services).toEqual([ALL_SERVICES]);
    });

    it('reports unknown key ids', async () => {
      await expect(keys.revokeKey('missing')).rejects.toThrow(KeyNotFoundError);
      await expect(keys.grantService('missing', 'pan-verification')).rejects.toThrow(KeyNotFoundError);
      await expect(keys.revokeService('missing', 'pan-verification')).rejects.toThrow(KeyNotFoundError);
    });

    it('lists the keys of a caller without hashes', async () => {
      await keys.createKey('acme', 'one', []);
      await keys.createKey('globex', 'two', []);

      const listed = await keys.listKeys('acme');
      expect(listed.map((k) => k.name)).toEqual(['one']);
      expect(listed[0]).not.toHaveProperty('keyHash');
    });
  });

  describe('AccessGate', () => {
    it('authorizes an entitled key', async () => {
      const { apiKey, grant } = await keys.createKey('acme', 'k', ['pan-verification']);

      expect(await gate.authorize(apiKey, 'pan-verification')).toEqual({
        keyId: grant.keyId,
        keyPrefix: grant.keyPrefix,
        callerId: 'acme',
        serviceId: 'pan-verification',
      });
    });

    it('rejects missing, unknown and revoked keys as unauthenticated', async () => {
      const { apiKey, grant } = await keys.createKey('acme', 'k', ['pan-verification']);

      await expect(gate.authorize(undefined, 'pan-verification')).rejects.toThrow('Invalid API key: missing');
      await expect(gate.authorize('vg_live_unknown', 'pan-verification')).rejects.toThrow(
        'Invalid API key: unknown key',
      );

      await keys.revokeKey(grant.keyId);
      const err = await gate.authorize(apiKey, 'pan-verification').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UnauthenticatedError);
      expect(err).toHaveProperty('message', 'Invalid API key: key revoked');
    });

    it('rejects a valid key for a service it is not entitled to', async () => {
      const { apiKey } = await keys.createKey('acme', 'k', ['pan-verification']);
      await expect(gate.authorize(apiKey, 'vehicle-rc-verification')).rejects.toThrow(ForbiddenError);
    });

    it('lets a wildcard key reach every service', async () => {
      const { apiKey } = await keys.createKey('acme', 'k', [ALL_SERVICES]);

      expect((await gate.authorize(apiKey, 'vehicle-rc-verification')).serviceId).toBe('vehicle-rc-verification');
      expect((await gate.authorize(apiKey, 'not-yet-registered')).serviceId).toBe('not-yet-registered');
    });

    it('refuses every key of a suspended caller until reactivated', async () => {
      const { apiKey } = await keys.createKey('acme', 'k', ['pan-verification']);
      const { apiKey: otherKey } = await keys.createKey('globex', 'k', ['pan-verification']);

      expect(await gate.setSuspended('acme', true)).toBe(true);
      expect(await gate.setSuspended('acme', true)).toBe(false);
      expect(await gate.listSuspended()).toEqual(['acme']);

      const err = await gate.authorize(apiKey, 'pan-verification').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CallerSuspendedError);
      expect(err).toMatchObject({ code: 'CALLER_SUSPENDED', httpStatus: 403, message: 'Caller "acme" is suspended' });
      await expect(gate.authorize(otherKey, 'pan-verification')).resolves.toMatchObject({ callerId: 'globex' });

      expect(await gate.setSuspended('acme', false)).toBe(true);
      expect(await gate.listSuspended()).toEqual([]);
      await expect(gate.authorize(apiKey, 'pan-verification')).resolves.toMatchObject({ callerId: 'acme' });
    });

    it('still identifies the key of a suspended caller', async () => {
      const { apiKey, grant } = await keys.createKey('acme', 'k', []);
      await gate.setSuspended('acme', true);
      expect((await gate.identify(apiKey)).keyId).toBe(grant.keyId);
    });

    it('rejects suspending an empty caller id', async () => {
      await expect(gate.setSuspended(' ', true)).rejects.toThrow(InvalidRequestError);
    });

    it('does not change the grant when authorizing', async () => {
      const { apiKey, grant } = await keys.createKey('acme', 'k', ['pan-verification']);
      await gate.authorize(apiKey, 'pan-verification');
      expect((await grants.findById(grant.keyId))?.lastUsedAt).toBeNull();
    });

    it('stamps last use on request and only logs a failing store', async () => {
      const { grant } = await keys.createKey('acme', 'k', []);
      await gate.recordUse(grant.keyId, new Date('2026-04-01T00:00:00.000Z'));
      expect((await grants.findById(grant.keyId))?.lastUsedAt).toBe('2026-04-01T00:00:00.000Z');

      vi.spyOn(grants, 'touch').mockRejectedValue(new Error('locked'));
      await expect(gate.recordUse(grant.keyId)).resolves.toBeUndefined();
    });
  });
});
