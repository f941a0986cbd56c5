/**
 * Gateway - Wire Protocol
 *
 * WebSocket frames exchanged with event subscribers, and the TypeBox
 * schemas of the HTTP request bodies.
 *
 * All WebSocket messages are serialized as JSON strings on the wire.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { isPlainObject, type UsageLogEntry } from '@verigate/core';

// ---------------------------------------------------------------------------
// Client -> Server
// ---------------------------------------------------------------------------

export type ClientMessageType = 'auth' | 'ping';

export interface ClientMessage {
  /** Message type discriminator. */
  type: ClientMessageType;
  /** Unique message ID for request/response correlation. */
  id: string;
  /** Type-specific payload. */
  payload: unknown;
}

/** First frame on every connection: an API key or the admin token. */
export interface AuthPayload {
  token: string;
}

// ---------------------------------------------------------------------------
// Server -> Client
// ---------------------------------------------------------------------------

export type ServerMessageType = 'api_call' | 'credit_balance' | 'status' | 'error' | 'pong';

export interface ServerMessage {
  type: ServerMessageType;
  /** Correlation ID; `0` for unsolicited events. */
  id: string;
  payload: unknown;
}

/** Sent after every finished verification request. */
export interface ApiCallPayload {
  requestId: string;
  callerId: string | null;
  serviceId: string;
  lookupKey: string;
  outcome: UsageLogEntry['outcome'];
  failureCode: string | null;
  source: string | null;
  creditsCharged: number;
  durationMs: number;
  createdAt: string;
}

export interface CreditBalancePayload {
  callerId: string;
  balance: number;
}

export interface ErrorPayload {
  code: string;
  message: string;
}

export function apiCallPayload(entry: UsageLogEntry): ApiCallPayload {
  return {
    requestId: entry.id,
    callerId: entry.callerId,
    serviceId: entry.serviceId,
    lookupKey: entry.lookupKey,
    outcome: entry.outcome,
    failureCode: entry.failureCode,
    source: entry.source,
    creditsCharged: entry.creditsCharged,
    durationMs: entry.durationMs,
    createdAt: entry.createdAt,
  };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const VALID_CLIENT_TYPES: readonly ClientMessageType[] = ['auth', 'ping'];

const VALID_SERVER_TYPES: readonly ServerMessageType[] = ['api_call', 'credit_balance', 'status', 'error', 'pong'];

function isClientType(value: unknown): value is ClientMessageType {
  return VALID_CLIENT_TYPES.some((t) => t === value);
}

function isServerType(value: unknown): value is ServerMessageType {
  return VALID_SERVER_TYPES.some((t) => t === value);
}

/**
 * Token carried by an auth frame, or null if the frame is not one.
 */
export function authToken(msg: ClientMessage): string | null {
  if (msg.type !== 'auth' || !isPlainObject(msg.payload)) return null;
  const token = msg.payload['token'];
  return typeof token === 'string' && token.length > 0 ? token : null;
}

// ---------------------------------------------------------------------------
// Encode / Decode
// ---------------------------------------------------------------------------

export function encode(msg: ServerMessage | ClientMessage): string {
  return JSON.stringify(msg);
}

function parseObject(data: string | Buffer): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof data === 'string' ? data : data.toString('utf-8'));
  } catch {
    return null;
  }
  return isPlainObject(parsed) ? parsed : null;
}

/**
 * Decode a raw wire string into a ClientMessage.
 * Returns null if the data is not valid JSON or fails validation.
 */
export function decode(data: string | Buffer): ClientMessage | null {
  const obj = parseObject(data);
  if (!obj) return null;

  const type = obj['type'];
  const id = obj['id'];
  if (!isClientType(type) || typeof id !== 'string' || id.length === 0) {
    return null;
  }
  return { type, id, payload: obj['payload'] ?? null };
}

/**
 * Decode a raw wire string into a ServerMessage (used by clients and tests).
 */
export function decodeServerMessage(data: string | Buffer): ServerMessage | null {
  const obj = parseObject(data);
  if (!obj) return null;

  const type = obj['type'];
  const id = obj['id'];
  if (!isServerType(type) || typeof id !== 'string') {
    return null;
  }
  return { type, id, payload: obj['payload'] ?? null };
}

export function serverMsg(type: ServerMessageType, id: string, payload: unknown): ServerMessage {
  return { type, id, payload };
}

export function clientMsg(type: ClientMessageType, id: string, payload: unknown): ClientMessage {
  return { type, id, payload };
}

// ---------------------------------------------------------------------------
// HTTP request bodies
// ---------------------------------------------------------------------------

export const VerifyBodySchema = Type.Object({
  serviceId: Type.String({ minLength: 1 }),
  lookupKey: Type.String(),
});
export type VerifyBody = Static<typeof VerifyBodySchema>;

export const CreateKeyBodySchema = Type.Object({
  callerId: Type.String({ minLength: 1 }),
  name: Type.String({ default: '' }),
  services: Type.Array(Type.String({ minLength: 1 }), { default: [] }),
});
export type CreateKeyBody = Static<typeof CreateKeyBodySchema>;

export const TopUpBodySchema = Type.Object({
  amount: Type.Integer({ minimum: 1 }),
});
export type TopUpBody = Static<typeof TopUpBodySchema>;

export type BodyResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

/**
 * Apply schema defaults to a parsed body and check it.
 */
export function parseBody<S extends TSchema>(schema: S, body: unknown): BodyResult<Static<S>> {
  const value = Value.Default(schema, Value.Clone(body));
  if (Value.Check(schema, value)) {
    return { ok: true, value };
  }
  return {
    ok: false,
    errors: Array.from(Value.Errors(schema, value)).map((e) => `${e.path || '/'}: ${e.message}`),
  };
}
