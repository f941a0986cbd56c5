/**
 * RequestPipeline
 *
 * Runs one verification request through
 *
 *   Authorizing -> ServiceChecking -> CreditReserving -> Resolving -> Settling -> LogComplete
 *
 * with `Failed` reachable from every stage. Credits are reserved before
 * resolution, committed only on a found record and released on every
 * failure after a reservation. Each request ends in exactly one usage log
 * entry, whichever way it ends.
 */

import pino from 'pino';
import { nanoid } from 'nanoid';
import {
  InvalidRequestError,
  RequestAbortedError,
  errorMessage,
  isGatewayError,
  type ApiKeyGrant,
  type Entitlement,
  type ErrorCode,
  type ResponseStatus,
  type ServiceDefinition,
  type UsageLogEntry,
} from '@verigate/core';
import type { FallbackResolver } from '@verigate/fallback';
import type { CreditLedger, ReservationToken } from '@verigate/ledger';
import type { AccessGate } from './access-gate.js';
import type { ServiceRegistry } from './service-registry.js';
import type { UsageLogger } from './usage-logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PipelineState =
  | 'Authorizing'
  | 'ServiceChecking'
  | 'CreditReserving'
  | 'Resolving'
  | 'Settling'
  | 'LogComplete'
  | 'Failed';

export interface VerifyRequest {
  apiKey: string | undefined;
  serviceId: string;
  lookupKey: string;
  /** Fires when the caller goes away. */
  signal?: AbortSignal;
}

export interface VerifySuccess {
  status: 'success';
  httpStatus: 200;
  requestId: string;
  serviceId: string;
  lookupKey: string;
  data: unknown;
  source: string;
  stale: boolean;
  fetchedAt: string;
  creditsCharged: number;
  balance: number;
}

export interface VerifyFailure {
  status: Exclude<ResponseStatus, 'success'>;
  httpStatus: number;
  requestId: string;
  serviceId: string;
  lookupKey: string;
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  /** Present once the caller is known. */
  balance?: number;
}

export type VerifyResponse = VerifySuccess | VerifyFailure;

export interface RequestPipelineOptions {
  gate: AccessGate;
  services: ServiceRegistry;
  ledger: CreditLedger;
  resolver: FallbackResolver;
  usage: UsageLogger;
  logger?: pino.Logger;
  /** Observer for stage transitions. */
  onTransition?: (requestId: string, from: PipelineState, to: PipelineState) => void;
  now?: () => Date;
}

interface RequestContext {
  requestId: string;
  state: PipelineState;
  startedAt: number;
  grant: ApiKeyGrant | null;
  entitlement: Entitlement | null;
  service: Readonly<ServiceDefinition> | null;
  token: ReservationToken | null;
  balance: number | null;
}

// ---------------------------------------------------------------------------
// RequestPipeline
// ---------------------------------------------------------------------------

export class RequestPipeline {
  private readonly gate: AccessGate;
  private readonly services: ServiceRegistry;
  private readonly ledger: CreditLedger;
  private readonly resolver: FallbackResolver;
  private readonly usage: UsageLogger;
  private readonly log: pino.Logger;
  private readonly onTransition?: (requestId: string, from: PipelineState, to: PipelineState) => void;
  private readonly now: () => Date;

  constructor(options: RequestPipelineOptions) {
    this.gate = options.gate;
    this.services = options.services;
    this.ledger = options.ledger;
    this.resolver = options.resolver;
    this.usage = options.usage;
    this.log = options.logger ?? pino({ name: 'verigate:pipeline' });
    this.onTransition = options.onTransition;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one request to a terminal state. Never rejects: every failure is
   * turned into a VerifyFailure.
   */
  async execute(request: VerifyRequest): Promise<VerifyResponse> {
    const lookupKey = request.lookupKey.trim();
    const ctx = newContext();

    try {
      // --- Authorizing ----------------------------------------------------
      ctx.grant = await this.gate.identify(request.apiKey);
      await this.gate.assertCallerActive(ctx.grant);
      ctx.entitlement = this.gate.entitle(ctx.grant, request.serviceId);

      // --- ServiceChecking ------------------------------------------------
      this.transition(ctx, 'ServiceChecking');
      const service = this.services.resolveService(request.serviceId);
      ctx.service = service;
      if (lookupKey.length === 0) {
        throw new InvalidRequestError('lookupKey must not be empty');
      }
      if (!this.services.acceptsKey(service.id, lookupKey)) {
        throw new InvalidRequestError(`lookupKey does not match the format for "${service.id}"`, {
          keyPattern: service.keyPattern,
        });
      }

      // --- CreditReserving ------------------------------------------------
      this.transition(ctx, 'CreditReserving');
      ctx.token = await this.ledger.reserve(ctx.entitlement.callerId, service.cost);
      ctx.balance = ctx.token.balanceAfter;

      // --- Resolving ------------------------------------------------------
      this.transition(ctx, 'Resolving');
      const resolved = await this.resolver.resolve(service, lookupKey, request.signal);
      if (request.signal?.aborted) {
        throw new RequestAbortedError('resolving');
      }

      // --- Settling -------------------------------------------------------
      this.transition(ctx, 'Settling');
      const settled = await this.ledger.commit(ctx.token);
      ctx.balance = settled.balanceAfter;

      // --- LogComplete ----------------------------------------------------
      this.transition(ctx, 'LogComplete');
      await this.writeLog(ctx, request.serviceId, lookupKey, {
        outcome: 'success',
        failureCode: null,
        source: resolved.record.source,
        creditsCharged: service.cost,
      });
      await this.gate.recordUse(ctx.entitlement.keyId, this.now());

      this.log.info(
        {
          requestId: ctx.requestId,
          callerId: ctx.entitlement.callerId,
          serviceId: service.id,
          source: resolved.record.source,
          stale: resolved.stale,
        },
        'Request completed',
      );

      return {
        status: 'success',
        httpStatus: 200,
        requestId: ctx.requestId,
        serviceId: service.id,
        lookupKey,
        data: resolved.record.payload,
        source: resolved.record.source,
        stale: resolved.stale,
        fetchedAt: resolved.record.fetchedAt,
        creditsCharged: service.cost,
        balance: settled.balanceAfter,
      };
    } catch (err: unknown) {
      return this.fail(ctx, request.serviceId, lookupKey, err);
    }
  }

  /**
   * Answer a request whose body was refused before it could run. The key
   * is looked up only to attribute the usage entry; credits are untouched.
   */
  async reject(
    apiKey: string | undefined,
    fields: { serviceId: string; lookupKey: string },
    error: InvalidRequestError,
  ): Promise<VerifyFailure> {
    const ctx = newContext();
    try {
      ctx.grant = await this.gate.identify(apiKey);
    } catch (err: unknown) {
      if (!isGatewayError(err)) throw err;
      this.log.debug({ requestId: ctx.requestId, reason: err.message }, 'Malformed request from unidentified key');
    }
    return this.fail(ctx, fields.serviceId, fields.lookupKey, error);
  }

  // -----------------------------------------------------------------------
  // Failure path
  // -----------------------------------------------------------------------

  private async fail(ctx: RequestContext, serviceId: string, lookupKey: string, err: unknown): Promise<VerifyFailure> {
    const failedIn = ctx.state;
    this.transition(ctx, 'Failed');

    await this.releaseIfPending(ctx);

    const failure: VerifyFailure = isGatewayError(err)
      ? {
          status: err.status,
          httpStatus: err.httpStatus,
          requestId: ctx.requestId,
          serviceId,
          lookupKey,
          code: err.code,
          message: err.message,
          details: err.context,
        }
      : {
          status: 'service_unavailable',
          httpStatus: 500,
          requestId: ctx.requestId,
          serviceId,
          lookupKey,
          code: 'INTERNAL',
          message: 'Internal error',
        };

    if (ctx.balance !== null) {
      failure.balance = ctx.balance;
    }

    const logFields = {
      requestId: ctx.requestId,
      keyPrefix: ctx.grant?.keyPrefix,
      serviceId,
      stage: failedIn,
      code: failure.code,
    };
    if (!isGatewayError(err)) {
      this.log.error({ ...logFields, err }, 'Request failed unexpectedly');
    } else if (failure.code === 'RECORD_NOT_FOUND') {
      this.log.info(logFields, 'Record not found');
    } else {
      this.log.info({ ...logFields, reason: errorMessage(err) }, 'Request rejected');
    }

    await this.writeLog(ctx, serviceId, lookupKey, {
      outcome: 'error',
      failureCode: failure.code,
      source: null,
      creditsCharged: 0,
    });

    return failure;
  }

  /**
   * Refund a reservation that was neither committed nor released yet. The
   * ledger outlasts contention on its own; a refund the store refuses stays
   * owed to the caller and lands on their next ledger operation.
   */
  private async releaseIfPending(ctx: RequestContext): Promise<void> {
    const token = ctx.token;
    if (!token || !this.ledger.isPending(token.id)) return;

    try {
      const released = await this.ledger.release(token);
      ctx.balance = released.balanceAfter;
    } catch (err: unknown) {
      this.log.warn(
        { requestId: ctx.requestId, callerId: token.callerId, reservationId: token.id, amount: token.amount, err },
        'Refund deferred',
      );
    }
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private transition(ctx: RequestContext, to: PipelineState): void {
    const from = ctx.state;
    ctx.state = to;
    this.log.debug({ requestId: ctx.requestId, from, to }, 'Pipeline transition');
    this.onTransition?.(ctx.requestId, from, to);
  }

  private writeLog(
    ctx: RequestContext,
    serviceId: string,
    lookupKey: string,
    result: Pick<UsageLogEntry, 'outcome' | 'failureCode' | 'source' | 'creditsCharged'>,
  ): Promise<void> {
    return this.usage.record({
      id: ctx.requestId,
      callerId: ctx.grant?.callerId ?? null,
      keyId: ctx.grant?.keyId ?? null,
      serviceId,
      lookupKey,
      ...result,
      balanceAfter: ctx.balance,
      durationMs: Math.round(performance.now() - ctx.startedAt),
      createdAt: this.now().toISOString(),
    });
  }
}

function newContext(): RequestContext {
  return {
    requestId: nanoid(),
    state: 'Authorizing',
    startedAt: performance.now(),
    grant: null,
    entitlement: null,
    service: null,
    token: null,
    balance: null,
  };
}
