/**
 * AccessGate
 *
 * Authenticates an API key, refuses keys of suspended callers and checks
 * the key's entitlement to one service. `authorize` is a pure lookup;
 * presenting a key never changes any state.
 */

import pino from 'pino';
import {
  ALL_SERVICES,
  CallerSuspendedError,
  ForbiddenError,
  InvalidRequestError,
  UnauthenticatedError,
  hashApiKey,
  type ApiKeyGrant,
  type CallerStatusStore,
  type Entitlement,
  type GrantStore,
} from '@verigate/core';

/** True when `grant` covers `serviceId`, directly or by wildcard. */
export function grantCovers(grant: Pick<ApiKeyGrant, 'services'>, serviceId: string): boolean {
  return grant.services.includes(ALL_SERVICES) || grant.services.includes(serviceId);
}

export class AccessGate {
  private readonly grants: GrantStore;
  private readonly callers: CallerStatusStore;
  private readonly log: pino.Logger;

  constructor(grants: GrantStore, callers: CallerStatusStore, logger?: pino.Logger) {
    this.grants = grants;
    this.callers = callers;
    this.log = logger ?? pino({ name: 'verigate:access' });
  }

  /**
   * Grant behind a presented key, provided its caller is not suspended.
   */
  async authenticate(apiKey: string | undefined): Promise<ApiKeyGrant> {
    const grant = await this.identify(apiKey);
    await this.assertCallerActive(grant);
    return grant;
  }

  /**
   * Look up the grant behind a presented key. Unknown and revoked keys are
   * both UnauthenticatedError.
   */
  async identify(apiKey: string | undefined): Promise<ApiKeyGrant> {
    if (!apiKey) {
      throw new UnauthenticatedError('missing');
    }

    const grant = await this.grants.findByHash(hashApiKey(apiKey));
    if (!grant) {
      throw new UnauthenticatedError('unknown key');
    }
    if (!grant.active) {
      throw new UnauthenticatedError('key revoked');
    }
    return grant;
  }

  async assertCallerActive(grant: ApiKeyGrant): Promise<void> {
    if (await this.callers.isSuspended(grant.callerId)) {
      this.log.info({ keyPrefix: grant.keyPrefix, callerId: grant.callerId }, 'Key of suspended caller refused');
      throw new CallerSuspendedError(grant.callerId);
    }
  }

  /**
   * Entitlement of an authenticated grant to `serviceId`, or ForbiddenError.
   */
  entitle(grant: ApiKeyGrant, serviceId: string): Entitlement {
    if (!grantCovers(grant, serviceId)) {
      this.log.info({ keyPrefix: grant.keyPrefix, serviceId }, 'Key not entitled to service');
      throw new ForbiddenError(serviceId);
    }

    return {
      keyId: grant.keyId,
      keyPrefix: grant.keyPrefix,
      callerId: grant.callerId,
      serviceId,
    };
  }

  async authorize(apiKey: string | undefined, serviceId: string): Promise<Entitlement> {
    return this.entitle(await this.authenticate(apiKey), serviceId);
  }

  /**
   * Suspend or reactivate every key of `callerId`. Returns false when the
   * caller was already in that state.
   */
  async setSuspended(callerId: string, suspended: boolean): Promise<boolean> {
    if (!callerId.trim()) {
      throw new InvalidRequestError('callerId must not be empty');
    }
    const changed = await this.callers.setSuspended(callerId, suspended);
    if (changed) {
      this.log.info({ callerId }, suspended ? 'Caller suspended' : 'Caller reactivated');
    }
    return changed;
  }

  async listSuspended(): Promise<string[]> {
    return this.callers.listSuspended();
  }

  /**
   * Stamp the key's last-used time. Failures are logged only.
   */
  async recordUse(keyId: string, at: Date = new Date()): Promise<void> {
    try {
      await this.grants.touch(keyId, at.toISOString());
    } catch (err: unknown) {
      this.log.warn({ keyId, err }, 'Could not update key last-used time');
    }
  }
}
