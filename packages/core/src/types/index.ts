/**
 * @verigate/core - Domain type definitions using TypeBox schemas
 * Services, API key grants, credit accounts, verification records, usage log.
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Service catalog
// ---------------------------------------------------------------------------

export const ServiceDefinitionSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  active: Type.Boolean(),
  /** Credits charged per successful call. */
  cost: Type.Integer({ minimum: 0 }),
  /** Provider ids, tried in declared order after a local miss. */
  fallbackChain: Type.Array(Type.String()),
  /** Local records older than this are refreshed; absent = never stale. */
  maxAgeHours: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  /** Regular expression every lookup key must match. */
  keyPattern: Type.Optional(Type.String()),
});
export type ServiceDefinition = Static<typeof ServiceDefinitionSchema>;

// ---------------------------------------------------------------------------
// API keys
// ---------------------------------------------------------------------------

export const ApiKeyGrantSchema = Type.Object({
  keyId: Type.String(),
  /** SHA-256 of the plaintext key; the plaintext is never stored. */
  keyHash: Type.String(),
  /** First characters of the key, safe to show and log. */
  keyPrefix: Type.String(),
  callerId: Type.String(),
  name: Type.String(),
  /** Entitled service ids; `ALL_SERVICES` entitles every service. */
  services: Type.Array(Type.String()),
  active: Type.Boolean(),
  createdAt: Type.String(),
  lastUsedAt: Type.Union([Type.String(), Type.Null()]),
});
export type ApiKeyGrant = Static<typeof ApiKeyGrantSchema>;

/** Wildcard entitlement. */
export const ALL_SERVICES = '*';

/** Result of a successful AccessGate check. */
export interface Entitlement {
  keyId: string;
  keyPrefix: string;
  callerId: string;
  serviceId: string;
}

// ---------------------------------------------------------------------------
// Credits
// ---------------------------------------------------------------------------

export interface CreditAccount {
  callerId: string;
  /** Never negative. */
  balance: number;
  /** Bumped on every balance change; guards against lost updates. */
  version: number;
}

export type LedgerEntryKind = 'reserve' | 'commit' | 'release' | 'top_up';

export interface LedgerEntry {
  id: string;
  callerId: string;
  kind: LedgerEntryKind;
  amount: number;
  balanceAfter: number;
  reservationId: string | null;
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Verification records
// ---------------------------------------------------------------------------

/** `local` or the id of the provider the payload came from. */
export type RecordSource = string;

export const LOCAL_SOURCE = 'local';

export interface VerificationRecord {
  serviceId: string;
  lookupKey: string;
  payload: unknown;
  source: RecordSource;
  /** ISO-8601. */
  fetchedAt: string;
}

// ---------------------------------------------------------------------------
// Usage log
// ---------------------------------------------------------------------------

/** A miss is `error` with failureCode RECORD_NOT_FOUND. */
export const UsageOutcomeSchema = Type.Union([Type.Literal('success'), Type.Literal('error')]);
export type UsageOutcome = Static<typeof UsageOutcomeSchema>;

export interface UsageLogEntry {
  id: string;
  /** Null when the key could not be authenticated. */
  callerId: string | null;
  keyId: string | null;
  serviceId: string;
  lookupKey: string;
  outcome: UsageOutcome;
  /** Error code of the terminal failure, null on success. */
  failureCode: string | null;
  source: RecordSource | null;
  creditsCharged: number;
  balanceAfter: number | null;
  durationMs: number;
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export interface RecordStore {
  get(serviceId: string, lookupKey: string): Promise<VerificationRecord | null>;
  /** Upsert: at most one record per (serviceId, lookupKey). */
  put(serviceId: string, lookupKey: string, record: VerificationRecord): Promise<void>;
}

export interface GrantStore {
  findByHash(keyHash: string): Promise<ApiKeyGrant | null>;
  findById(keyId: string): Promise<ApiKeyGrant | null>;
  listByCaller(callerId: string): Promise<ApiKeyGrant[]>;
  insert(grant: ApiKeyGrant): Promise<void>;
  setActive(keyId: string, active: boolean): Promise<boolean>;
  /** Add one entitlement; resolves with the updated grant, or null for an unknown key. */
  addService(keyId: string, serviceId: string): Promise<ApiKeyGrant | null>;
  /** Withdraw one entitlement; resolves with the updated grant, or null for an unknown key. */
  removeService(keyId: string, serviceId: string): Promise<ApiKeyGrant | null>;
  touch(keyId: string, at: string): Promise<void>;
}

export interface AccountStore {
  get(callerId: string): Promise<CreditAccount | null>;
  /**
   * Write `balance` only if the stored version still equals
   * `expectedVersion`. Creates the account when `expectedVersion` is 0 and
   * none exists. Returns false on a version mismatch.
   */
  compareAndSet(callerId: string, expectedVersion: number, balance: number): Promise<boolean>;
  appendEntry(entry: LedgerEntry): Promise<void>;
  listEntries(callerId: string, limit?: number): Promise<LedgerEntry[]>;
}

export interface UsageLogSink {
  append(entry: UsageLogEntry): Promise<void>;
  listByCaller(callerId: string, limit?: number): Promise<UsageLogEntry[]>;
  listRecent(limit?: number): Promise<UsageLogEntry[]>;
}

export interface ServiceStateStore {
  /** Persisted active-flag overrides made at runtime. */
  loadOverrides(): Promise<Map<string, boolean>>;
  saveOverride(serviceId: string, active: boolean): Promise<void>;
}

/** Callers an admin has suspended. Keys of a suspended caller are refused. */
export interface CallerStatusStore {
  isSuspended(callerId: string): Promise<boolean>;
  /** Returns true when the caller's status changed. */
  setSuspended(callerId: string, suspended: boolean): Promise<boolean>;
  listSuspended(): Promise<string[]>;
}
