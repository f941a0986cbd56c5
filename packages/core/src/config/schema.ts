/**
 * @verigate/core - Full TypeBox schema for verigate.json configuration
 *
 * Sections: gateway, storage, ledger, providers, services, health
 */

import { Type, type Static } from '@sinclair/typebox';
import { ServiceDefinitionSchema } from '../types/index.js';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const GatewaySchema = Type.Object({
  host: Type.String({ default: '127.0.0.1' }),
  port: Type.Number({ minimum: 0, maximum: 65535, default: 8420 }),
  adminToken: Type.Optional(Type.String({ description: 'Bearer token for /api/v1/admin routes' })),
  maxBodyBytes: Type.Number({ minimum: 1024, default: 64 * 1024 }),
});

const StorageSchema = Type.Object({
  backend: Type.Union([Type.Literal('sqlite'), Type.Literal('memory')], { default: 'sqlite' }),
  path: Type.Optional(Type.String({ description: 'SQLite file; defaults to <stateDir>/data/verigate.db' })),
  timeoutMs: Type.Number({ minimum: 1, default: 2000 }),
});

const LedgerSchema = Type.Object({
  lockTimeoutMs: Type.Number({ minimum: 1, default: 5000 }),
  maxConflictRetries: Type.Number({ minimum: 0, default: 3 }),
});

const ProviderEndpointSchema = Type.Object({
  path: Type.String({ description: 'Appended to baseUrl, e.g. "rc"' }),
  keyField: Type.String({ description: 'Request body field carrying the lookup key' }),
});
export type ProviderEndpoint = Static<typeof ProviderEndpointSchema>;

export const ProviderConfigSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  baseUrl: Type.Optional(Type.String()),
  apiKey: Type.Optional(Type.String()),
  timeoutMs: Type.Number({ minimum: 1, default: 5000 }),
  endpoints: Type.Record(Type.String(), ProviderEndpointSchema, { default: {} }),
});
export type ProviderConfig = Static<typeof ProviderConfigSchema>;

const HealthSchema = Type.Object({
  intervalMs: Type.Number({ minimum: 1000, default: 60_000 }),
  degradedThreshold: Type.Number({ minimum: 1, default: 3 }),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const GatewayConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  gateway: GatewaySchema,
  storage: StorageSchema,
  ledger: LedgerSchema,
  providers: Type.Array(ProviderConfigSchema, { default: [] }),
  services: Type.Array(ServiceDefinitionSchema, { default: [] }),
  health: HealthSchema,
});

export type GatewayConfig = Static<typeof GatewayConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Endpoint layout shared by the stock upstream aggregators. */
const STOCK_ENDPOINTS: Record<string, ProviderEndpoint> = {
  'vehicle-rc-verification': { path: 'rc', keyField: 'reg_no' },
  'driving-licence': { path: 'dl', keyField: 'dl_no' },
  'vehicle-challan': { path: 'challan', keyField: 'vehicle_no' },
  'pan-verification': { path: 'pan', keyField: 'pan_number' },
  'gst-verification': { path: 'gst', keyField: 'gstin' },
  'msme-verification': { path: 'msme', keyField: 'udyam_number' },
  'voter-id-verification': { path: 'voter-id', keyField: 'epic_number' },
};

const STOCK_CHAIN = ['api1', 'api2', 'api3'];

export const DEFAULT_CONFIG: GatewayConfig = {
  version: 1,
  gateway: {
    host: '127.0.0.1',
    port: 8420,
    adminToken: '$env:VERIGATE_ADMIN_TOKEN',
    maxBodyBytes: 64 * 1024,
  },
  storage: {
    backend: 'sqlite',
    timeoutMs: 2000,
  },
  ledger: {
    lockTimeoutMs: 5000,
    maxConflictRetries: 3,
  },
  providers: STOCK_CHAIN.map((id, i) => ({
    id,
    baseUrl: `$env:VERIGATE_PROVIDER_${i + 1}_URL`,
    apiKey: `$env:VERIGATE_PROVIDER_${i + 1}_KEY`,
    timeoutMs: 5000,
    endpoints: STOCK_ENDPOINTS,
  })),
  services: [
    {
      id: 'vehicle-rc-verification',
      name: 'Vehicle RC Verification',
      active: true,
      cost: 2,
      fallbackChain: STOCK_CHAIN,
      maxAgeHours: 24,
      keyPattern: '^[A-Z]{2}[0-9A-Z]{4,9}$',
    },
    {
      id: 'driving-licence',
      name: 'Driving Licence Verification',
      active: true,
      cost: 2,
      fallbackChain: STOCK_CHAIN,
      maxAgeHours: 168,
    },
    {
      id: 'vehicle-challan',
      name: 'Vehicle Challan Lookup',
      active: true,
      cost: 1,
      fallbackChain: STOCK_CHAIN,
      maxAgeHours: 12,
    },
    {
      id: 'pan-verification',
      name: 'PAN Verification',
      active: true,
      cost: 1,
      fallbackChain: STOCK_CHAIN,
      keyPattern: '^[A-Z]{5}[0-9]{4}[A-Z]$',
    },
    {
      id: 'gst-verification',
      name: 'GST Verification',
      active: true,
      cost: 1,
      fallbackChain: STOCK_CHAIN,
      keyPattern: '^[0-9]{2}[A-Z0-9]{13}$',
    },
    {
      id: 'msme-verification',
      name: 'MSME / Udyam Verification',
      active: true,
      cost: 1,
      fallbackChain: STOCK_CHAIN,
    },
    {
      id: 'voter-id-verification',
      name: 'Voter ID Verification',
      active: true,
      cost: 1,
      fallbackChain: STOCK_CHAIN,
    },
    {
      id: 'fuel-price',
      name: 'Fuel Price by City',
      active: true,
      cost: 0,
      fallbackChain: [],
    },
  ],
  health: {
    intervalMs: 60_000,
    degradedThreshold: 3,
  },
};
