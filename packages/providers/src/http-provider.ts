/**
 * @verigate/providers - HTTP Provider
 *
 * Talks to an upstream verification aggregator over JSON/HTTP:
 * `POST {baseUrl}/{endpoint.path}` with `{ [keyField]: lookupKey }` and an
 * `X-API-Key` header. Answers with `success: true` carry the record in
 * `data`; 404 or `success: false` means the upstream has no such record.
 */

import pino from 'pino';
import { isPlainObject, errorMessage, type ProviderConfig } from '@verigate/core';
import type { ExternalProvider, FetchOptions, ProviderFetchResult } from '@verigate/fallback';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PING_TIMEOUT_MS = 3000;
const MAX_ERROR_TEXT = 200;

// ---------------------------------------------------------------------------
// HttpProvider
// ---------------------------------------------------------------------------

export class HttpProvider implements ExternalProvider {
  readonly id: string;
  readonly timeoutMs: number;

  private readonly config: ProviderConfig;
  private readonly log: pino.Logger;

  constructor(config: ProviderConfig, logger?: pino.Logger) {
    this.id = config.id;
    this.timeoutMs = config.timeoutMs;
    this.config = config;
    this.log = (logger ?? pino({ name: 'verigate:providers' })).child({ provider: config.id });
  }

  /** Base URL and credential present. */
  get hasCredentials(): boolean {
    return Boolean(this.config.baseUrl && this.config.apiKey);
  }

  isConfigured(serviceId: string): boolean {
    return this.hasCredentials && this.config.endpoints[serviceId] !== undefined;
  }

  async fetch(serviceId: string, lookupKey: string, options: FetchOptions): Promise<ProviderFetchResult> {
    const endpoint = this.config.endpoints[serviceId];
    const { baseUrl, apiKey } = this.config;
    if (!endpoint || !baseUrl || !apiKey) {
      return { kind: 'unavailable', reason: 'not configured' };
    }

    const url = `${baseUrl.replace(/\/+$/, '')}/${endpoint.path.replace(/^\/+/, '')}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-API-Key': apiKey,
        },
        body: JSON.stringify({ [endpoint.keyField]: lookupKey }),
        signal: controller.signal,
      });
    } catch (err: unknown) {
      const reason = options.signal?.aborted
        ? 'aborted by caller'
        : controller.signal.aborted
          ? `aborted after ${options.timeoutMs}ms`
          : errorMessage(err);
      this.log.debug({ serviceId, reason }, 'Request failed');
      return { kind: 'unavailable', reason };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    if (res.status === 404) {
      return { kind: 'not_found' };
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      return { kind: 'unavailable', reason: `HTTP ${res.status}: ${text.slice(0, MAX_ERROR_TEXT)}` };
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err: unknown) {
      return { kind: 'unavailable', reason: `invalid JSON: ${errorMessage(err)}` };
    }

    return interpretBody(body);
  }

  /**
   * Reachability check: any answer below 500 from the base URL counts.
   */
  async ping(): Promise<boolean> {
    const { baseUrl } = this.config;
    if (!baseUrl || !this.hasCredentials) return false;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), PING_TIMEOUT_MS);
    try {
      const res = await fetch(baseUrl, { method: 'GET', signal: controller.signal });
      return res.status < 500;
    } catch (err: unknown) {
      this.log.debug({ error: errorMessage(err) }, 'Ping failed');
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Map an upstream JSON body onto a fetch result.
 */
export function interpretBody(body: unknown): ProviderFetchResult {
  if (!isPlainObject(body)) {
    return { kind: 'unavailable', reason: 'response body is not an object' };
  }
  if (body['success'] === true) {
    return { kind: 'found', payload: body['data'] ?? body };
  }
  if (body['success'] === false) {
    return { kind: 'not_found' };
  }
  return { kind: 'unavailable', reason: 'response body has no success flag' };
}
