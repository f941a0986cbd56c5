/**
 * In-process stand-ins shared by the unit and e2e suites.
 */
import {
  DEFAULT_CONFIG,
  type GatewayConfig,
  type RecordStore,
  type ServiceDefinition,
  type VerificationRecord,
} from '@verigate/core';
import type { ExternalProvider, FetchOptions, ProviderFetchResult } from '@verigate/fallback';

export type Answer = ProviderFetchResult | Error;

export const found = (payload: unknown): ProviderFetchResult => ({ kind: 'found', payload });
export const notFound = (): ProviderFetchResult => ({ kind: 'not_found' });
export const unavailable = (reason: string): ProviderFetchResult => ({ kind: 'unavailable', reason });

export interface FakeProviderOptions {
  /** Default: configured for every service. */
  configured?: boolean;
  timeoutMs?: number;
  /** Delay before answering; honours the abort signal. */
  delayMs?: number;
  reachable?: boolean;
}

/**
 * Provider answering from a fixed function; records every call.
 */
export class FakeProvider implements ExternalProvider {
  readonly timeoutMs: number;
  readonly calls: Array<{ serviceId: string; lookupKey: string }> = [];
  configured: boolean;
  reachable: boolean;
  private readonly delayMs: number;

  constructor(
    readonly id: string,
    private answer: (serviceId: string, lookupKey: string) => Answer,
    options: FakeProviderOptions = {},
  ) {
    this.configured = options.configured ?? true;
    this.timeoutMs = options.timeoutMs ?? 1000;
    this.delayMs = options.delayMs ?? 0;
    this.reachable = options.reachable ?? true;
  }

  /** Replace the answer function. */
  answerWith(answer: (serviceId: string, lookupKey: string) => Answer): void {
    this.answer = answer;
  }

  isConfigured(_serviceId: string): boolean {
    return this.configured;
  }

  async fetch(serviceId: string, lookupKey: string, options: FetchOptions): Promise<ProviderFetchResult> {
    this.calls.push({ serviceId, lookupKey });
    if (this.delayMs > 0) {
      await delay(this.delayMs, options.signal);
    }
    const result = this.answer(serviceId, lookupKey);
    if (result instanceof Error) throw result;
    return result;
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }
}

/** Resolves after `ms`, unless `signal` aborts first. */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true },
    );
  });
}

/**
 * Record store whose calls can be made to fail or hang.
 */
export class FlakyRecordStore implements RecordStore {
  readonly records = new Map<string, VerificationRecord>();
  failReads = false;
  failWrites = false;
  hangReads = false;
  puts = 0;

  async get(serviceId: string, lookupKey: string): Promise<VerificationRecord | null> {
    if (this.hangReads) return new Promise<never>(() => undefined);
    if (this.failReads) throw new Error('store offline');
    return this.records.get(`${serviceId}\u0000${lookupKey}`) ?? null;
  }

  async put(serviceId: string, lookupKey: string, record: VerificationRecord): Promise<void> {
    this.puts++;
    if (this.failWrites) throw new Error('store read-only');
    this.records.set(`${serviceId}\u0000${lookupKey}`, record);
  }
}

export function service(overrides: Partial<ServiceDefinition> & { id: string }): ServiceDefinition {
  return {
    name: overrides.id,
    active: true,
    cost: 2,
    fallbackChain: ['api1', 'api2', 'api3'],
    ...overrides,
  };
}

/**
 * Config snapshot for in-process tests: memory storage, no env refs,
 * ephemeral port.
 */
export function testConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    ...DEFAULT_CONFIG,
    gateway: { host: '127.0.0.1', port: 0, adminToken: 'test-admin-token', maxBodyBytes: 4096 },
    storage: { backend: 'memory', timeoutMs: 200 },
    providers: [],
    services: [
      service({ id: 'vehicle-rc-verification', cost: 2 }),
      service({ id: 'pan-verification', cost: 1, keyPattern: '^[A-Z]{5}[0-9]{4}[A-Z]$' }),
      service({ id: 'free-lookup', cost: 0 }),
      service({ id: 'retired-service', active: false }),
    ],
    ...overrides,
  };
}
