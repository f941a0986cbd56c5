/**
 * @verigate/core - Error taxonomy
 *
 * Every failure a request can end in has its own class, a stable `code`, and
 * the wire `status` / HTTP code the gateway reports it with.
 */

// ---------------------------------------------------------------------------
// Wire statuses
// ---------------------------------------------------------------------------

export type ResponseStatus =
  | 'success'
  | 'unauthenticated'
  | 'forbidden'
  | 'service_unavailable'
  | 'insufficient_credits'
  | 'not_found'
  | 'invalid_request'
  | 'aborted';

export type ErrorCode =
  | 'UNAUTHENTICATED'
  | 'FORBIDDEN'
  | 'CALLER_SUSPENDED'
  | 'SERVICE_NOT_FOUND'
  | 'SERVICE_INACTIVE'
  | 'INSUFFICIENT_CREDITS'
  | 'RECORD_NOT_FOUND'
  | 'PROVIDER_UNAVAILABLE'
  | 'LEDGER_CONFLICT'
  | 'RESERVATION_STATE'
  | 'INVALID_REQUEST'
  | 'KEY_NOT_FOUND'
  | 'REQUEST_ABORTED'
  | 'INTERNAL';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: Exclude<ResponseStatus, 'success'>,
    public readonly httpStatus: number,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

// ---------------------------------------------------------------------------
// Gating failures (terminal, never retried)
// ---------------------------------------------------------------------------

export class UnauthenticatedError extends GatewayError {
  constructor(reason: string) {
    super(`Invalid API key: ${reason}`, 'UNAUTHENTICATED', 'unauthenticated', 401, { reason });
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends GatewayError {
  constructor(serviceId: string) {
    super(`API key is not entitled to service "${serviceId}"`, 'FORBIDDEN', 'forbidden', 403, {
      serviceId,
    });
    this.name = 'ForbiddenError';
  }
}

export class CallerSuspendedError extends GatewayError {
  constructor(callerId: string) {
    super(`Caller "${callerId}" is suspended`, 'CALLER_SUSPENDED', 'forbidden', 403, { callerId });
    this.name = 'CallerSuspendedError';
  }
}

export class ServiceNotFoundError extends GatewayError {
  constructor(serviceId: string) {
    super(`Service "${serviceId}" is not registered`, 'SERVICE_NOT_FOUND', 'service_unavailable', 404, {
      serviceId,
    });
    this.name = 'ServiceNotFoundError';
  }
}

export class ServiceInactiveError extends GatewayError {
  constructor(serviceId: string) {
    super(`Service "${serviceId}" is disabled`, 'SERVICE_INACTIVE', 'service_unavailable', 503, {
      serviceId,
    });
    this.name = 'ServiceInactiveError';
  }
}

export class InsufficientCreditsError extends GatewayError {
  constructor(
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Insufficient credits. Required: ${required}, Available: ${available}`,
      'INSUFFICIENT_CREDITS',
      'insufficient_credits',
      402,
      { required, available },
    );
    this.name = 'InsufficientCreditsError';
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', 'invalid_request', 400, context);
    this.name = 'InvalidRequestError';
  }
}

/** Admin operation named an API key id that does not exist. */
export class KeyNotFoundError extends GatewayError {
  constructor(keyId: string) {
    super(`API key "${keyId}" does not exist`, 'KEY_NOT_FOUND', 'not_found', 404, { keyId });
    this.name = 'KeyNotFoundError';
  }
}

// ---------------------------------------------------------------------------
// Resolution failures
// ---------------------------------------------------------------------------

/** Summary of one provider attempt, carried on RecordNotFoundError. */
export interface AttemptSummary {
  provider: string;
  outcome: 'skipped' | 'not_found' | 'unavailable' | 'found' | 'discarded';
  error?: string;
  durationMs: number;
}

export class RecordNotFoundError extends GatewayError {
  constructor(
    serviceId: string,
    lookupKey: string,
    public readonly attempts: AttemptSummary[] = [],
  ) {
    super(
      `No record for "${lookupKey}" in service "${serviceId}"`,
      'RECORD_NOT_FOUND',
      'not_found',
      404,
      { serviceId, lookupKey },
    );
    this.name = 'RecordNotFoundError';
  }
}

/** Internal only: absorbed by the fallback chain, never sent to a caller. */
export class ProviderUnavailableError extends GatewayError {
  constructor(provider: string, reason: string) {
    super(`Provider "${provider}" unavailable: ${reason}`, 'PROVIDER_UNAVAILABLE', 'service_unavailable', 503, {
      provider,
      reason,
    });
    this.name = 'ProviderUnavailableError';
  }
}

export class RequestAbortedError extends GatewayError {
  constructor(stage: string) {
    super(`Request abandoned by caller during ${stage}`, 'REQUEST_ABORTED', 'aborted', 499, { stage });
    this.name = 'RequestAbortedError';
  }
}

// ---------------------------------------------------------------------------
// Ledger failures
// ---------------------------------------------------------------------------

/** A concurrent writer changed the account; retried by the ledger. */
export class LedgerConflictError extends GatewayError {
  constructor(callerId: string, operation: string) {
    super(
      `Concurrent update on account "${callerId}" during ${operation}`,
      'LEDGER_CONFLICT',
      'service_unavailable',
      503,
      { callerId, operation },
    );
    this.name = 'LedgerConflictError';
  }
}

export class ReservationStateError extends GatewayError {
  constructor(reservationId: string, state: string, operation: string) {
    super(
      `Cannot ${operation} reservation "${reservationId}" in state "${state}"`,
      'RESERVATION_STATE',
      'service_unavailable',
      500,
      { reservationId, state, operation },
    );
    this.name = 'ReservationStateError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
