/**
 * KeyManager
 *
 * Issues, revokes and re-scopes API keys. The plaintext key exists only in
 * the return value of `createKey`; storage keeps its hash and a display
 * prefix.
 */

import pino from 'pino';
import { nanoid } from 'nanoid';
import {
  ALL_SERVICES,
  InvalidRequestError,
  KeyNotFoundError,
  ServiceNotFoundError,
  generateApiKey,
  type ApiKeyGrant,
  type GrantStore,
} from '@verigate/core';
import type { ServiceRegistry } from './service-registry.js';

/** Grant without its hash, safe to return over the wire. */
export type ApiKeySummary = Omit<ApiKeyGrant, 'keyHash'>;

export interface CreatedKey {
  apiKey: string;
  grant: ApiKeySummary;
}

export function summarize(grant: ApiKeyGrant): ApiKeySummary {
  const { keyHash: _keyHash, ...rest } = grant;
  return rest;
}

export class KeyManager {
  private readonly grants: GrantStore;
  private readonly services: ServiceRegistry;
  private readonly log: pino.Logger;

  constructor(grants: GrantStore, services: ServiceRegistry, logger?: pino.Logger) {
    this.grants = grants;
    this.services = services;
    this.log = logger ?? pino({ name: 'verigate:keys' });
  }

  async createKey(callerId: string, name: string, services: readonly string[]): Promise<CreatedKey> {
    if (callerId.trim().length === 0) {
      throw new InvalidRequestError('callerId must not be empty');
    }
    this.assertKnown(services);

    const generated = generateApiKey();
    const grant: ApiKeyGrant = {
      keyId: nanoid(),
      keyHash: generated.keyHash,
      keyPrefix: generated.keyPrefix,
      callerId,
      name,
      services: Array.from(new Set(services)).sort(),
      active: true,
      createdAt: new Date().toISOString(),
      lastUsedAt: null,
    };
    await this.grants.insert(grant);

    this.log.info({ keyId: grant.keyId, keyPrefix: grant.keyPrefix, callerId }, 'API key created');
    return { apiKey: generated.plaintext, grant: summarize(grant) };
  }

  async revokeKey(keyId: string): Promise<void> {
    if (!(await this.grants.setActive(keyId, false))) {
      throw new KeyNotFoundError(keyId);
    }
    this.log.info({ keyId }, 'API key revoked');
  }

  async grantService(keyId: string, serviceId: string): Promise<ApiKeySummary> {
    this.assertKnown([serviceId]);
    return this.updated(keyId, await this.grants.addService(keyId, serviceId));
  }

  async revokeService(keyId: string, serviceId: string): Promise<ApiKeySummary> {
    return this.updated(keyId, await this.grants.removeService(keyId, serviceId));
  }

  async listKeys(callerId: string): Promise<ApiKeySummary[]> {
    return (await this.grants.listByCaller(callerId)).map(summarize);
  }

  private updated(keyId: string, grant: ApiKeyGrant | null): ApiKeySummary {
    if (!grant) {
      throw new KeyNotFoundError(keyId);
    }
    this.log.info({ keyId, services: grant.services }, 'Entitlements updated');
    return summarize(grant);
  }

  private assertKnown(services: readonly string[]): void {
    for (const serviceId of services) {
      if (serviceId !== ALL_SERVICES && !this.services.get(serviceId)) {
        throw new ServiceNotFoundError(serviceId);
      }
    }
  }
}
