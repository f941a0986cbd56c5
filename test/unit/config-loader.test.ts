/**
 * Unit Tests for Config Loader
 *
 * Tests loading defaults, merging, $env: resolution, validation rules and
 * path resolution.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DEFAULT_CONFIG,
  buildPaths,
  ensureDirectories,
  isValidPattern,
  loadConfig,
  parseConfig,
  validateConfig,
  type SecretResolver,
} from '@verigate/core';

/** Resolver over a fixed map instead of process.env. */
function secrets(values: Record<string, string>): SecretResolver {
  return { resolve: async (name) => values[name] };
}

const NONE = secrets({});

describe('Config Loader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'verigate-config-test-'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(tempDir, { recursive: true, force: true });
  });

  // ---------------------------------------------------------------------------
  // Defaults & merging
  // ---------------------------------------------------------------------------
  describe('parseConfig', () => {
    it('fills an empty object with the defaults', async () => {
      const { config, validation } = await parseConfig({}, NONE);

      expect(validation.valid).toBe(true);
      expect(config.gateway).toEqual({ host: '127.0.0.1', port: 8420, maxBodyBytes: 65536 });
      expect(config.storage).toEqual({ backend: 'sqlite', timeoutMs: 2000 });
      expect(config.services.map((s) => s.id)).toEqual(DEFAULT_CONFIG.services.map((s) => s.id));
    });

    it('drops unresolved $env: references and warns about skipped providers', async () => {
      const { config, validation } = await parseConfig({}, NONE);

      expect(config.gateway.adminToken).toBeUndefined();
      expect(config.providers[0]).not.toHaveProperty('baseUrl');
      expect(validation.warnings.map((w) => w.message)).toEqual([
        'Provider "api1" has no baseUrl; it will be skipped',
        'Provider "api2" has no baseUrl; it will be skipped',
        'Provider "api3" has no baseUrl; it will be skipped',
      ]);
    });

    it('resolves $env: references through the resolver', async () => {
      const { config } = await parseConfig(
        {},
        secrets({
          VERIGATE_ADMIN_TOKEN: 'test-admin-token',
          VERIGATE_PROVIDER_1_URL: 'https://upstream.example.test/',
          VERIGATE_PROVIDER_1_KEY: 'test-secret',
        }),
      );

      expect(config.gateway.adminToken).toBe('test-admin-token');
      expect(config.providers[0]).toMatchObject({
        baseUrl: 'https://upstream.example.test/',
        apiKey: 'test-secret',
      });
      expect(config.providers[1]).not.toHaveProperty('apiKey');
    });

    it('merges nested sections and replaces arrays', async () => {
      const { config, validation } = await parseConfig(
        {
          gateway: { port: 9000 },
          providers: [{ id: 'only', baseUrl: 'https://x.example.test', apiKey: 'k', endpoints: {} }],
          services: [{ id: 'solo', name: 'Solo', active: true, cost: 3, fallbackChain: ['only'] }],
        },
        NONE,
      );

      expect(config.gateway.port).toBe(9000);
      expect(config.gateway.host).toBe('127.0.0.1');
      expect(config.providers).toEqual([
        { id: 'only', baseUrl: 'https://x.example.test', apiKey: 'k', timeoutMs: 5000, endpoints: {} },
      ]);
      expect(config.services).toHaveLength(1);
      expect(validation.errors).toEqual([]);
      expect(validation.warnings).toEqual([
        {
          path: '/services/0/fallbackChain/0',
          message: 'Provider "only" has no endpoint for "solo"; it will be skipped',
        },
      ]);
    });

    it('returns a frozen snapshot', async () => {
      const { config } = await parseConfig({}, NONE);
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.services[0])).toBe(true);
    });

    it('rejects a root that is not an object', async () => {
      await expect(parseConfig([1, 2], NONE)).rejects.toThrow('Configuration root must be a JSON object');
    });
  });

  // ---------------------------------------------------------------------------
  // Validation rules
  // ---------------------------------------------------------------------------
  describe('validateConfig', () => {
    it('reports schema errors and falls back to the defaults', async () => {
      const result = validateConfig({ ...DEFAULT_CONFIG, gateway: { ...DEFAULT_CONFIG.gateway, port: 'x' } });
      expect(result.valid).toBe(false);
      expect(result.errors.some((e) => e.path === '/gateway/port')).toBe(true);
      expect(result.config.gateway.port).toBe(8420);
    });

    it('catches duplicate ids, unknown chain members and broken patterns', async () => {
      const { validation } = await parseConfig(
        {
          providers: [
            { id: 'p', endpoints: {} },
            { id: 'p', endpoints: {} },
          ],
          services: [
            { id: 's', name: 'S', active: true, cost: 1, fallbackChain: ['ghost'], keyPattern: '([' },
            { id: 's', name: 'S2', active: true, cost: 1, fallbackChain: [] },
          ],
        },
        NONE,
      );

      expect(validation.valid).toBe(false);
      expect(validation.errors.map((e) => e.path)).toEqual([
        '/providers/1/id',
        '/services/0/fallbackChain/0',
        '/services/0/keyPattern',
        '/services/1/id',
      ]);
    });

    it('rejects a negative service cost', async () => {
      const { validation } = await parseConfig(
        { services: [{ id: 's', name: 'S', active: true, cost: -1, fallbackChain: [] }] },
        NONE,
      );
      expect(validation.valid).toBe(false);
      expect(validation.errors[0]?.path).toBe('/services/0/cost');
    });

    it('knows which patterns compile', () => {
      expect(isValidPattern('^[A-Z]{5}$')).toBe(true);
      expect(isValidPattern('(')).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // Files & paths
  // ---------------------------------------------------------------------------
  describe('loadConfig', () => {
    it('writes the defaults when the file is missing', async () => {
      const configPath = join(tempDir, 'verigate.json');

      const { config } = await loadConfig({ configPath, resolver: NONE });

      expect(config.gateway.port).toBe(8420);
      const written: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
      expect(written).toEqual(DEFAULT_CONFIG);
    });

    it('reads an existing file', async () => {
      const configPath = join(tempDir, 'verigate.json');
      await writeFile(configPath, JSON.stringify({ storage: { backend: 'memory' } }), 'utf-8');

      const { config } = await loadConfig({ configPath, resolver: NONE });
      expect(config.storage).toEqual({ backend: 'memory', timeoutMs: 2000 });
    });

    it('names the file when it is not valid JSON', async () => {
      const configPath = join(tempDir, 'verigate.json');
      await writeFile(configPath, '{ broken', 'utf-8');

      await expect(loadConfig({ configPath, resolver: NONE })).rejects.toThrow(`Failed to parse ${configPath}`);
    });
  });

  describe('paths', () => {
    it('derives every path from VERIGATE_HOME and VERIGATE_STATE_DIR', () => {
      vi.stubEnv('VERIGATE_HOME', join(tempDir, 'home'));
      vi.stubEnv('VERIGATE_STATE_DIR', join(tempDir, 'state'));

      expect(buildPaths()).toEqual({
        home: join(tempDir, 'home'),
        stateDir: join(tempDir, 'state'),
        config: join(tempDir, 'home', 'verigate.json'),
        data: join(tempDir, 'state', 'data'),
        logs: join(tempDir, 'state', 'logs'),
        database: join(tempDir, 'state', 'data', 'verigate.db'),
      });
    });

    it('creates the directories on demand', () => {
      vi.stubEnv('VERIGATE_HOME', join(tempDir, 'home'));
      vi.stubEnv('VERIGATE_STATE_DIR', '');

      const paths = ensureDirectories();
      expect(existsSync(paths.data)).toBe(true);
      expect(existsSync(paths.logs)).toBe(true);
      expect(paths.stateDir).toBe(join(tempDir, 'home'));
    });
  });
});
