/**
 * @verigate/core - Configuration loader
 *
 * Loads verigate.json from VERIGATE_HOME, merges with defaults, resolves
 * $env: references, and validates. The result is frozen: it is the
 * immutable snapshot every component is built from.
 */

import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { Value } from '@sinclair/typebox/value';
import { GatewayConfigSchema, DEFAULT_CONFIG, type GatewayConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { ensureDirectories } from './paths.js';
import { isPlainObject } from '../utils/index.js';

const ENV_REF = '$env:';

/**
 * Secret resolver interface. `$env:NAME` values are looked up through it;
 * an unresolved reference removes the field.
 */
export interface SecretResolver {
  resolve(name: string): Promise<string | undefined>;
}

/** Default resolver reading process.env */
export const envResolver: SecretResolver = {
  resolve: async (name: string) => {
    const value = process.env[name];
    return value && value.length > 0 ? value : undefined;
  },
};

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const key of Object.keys(override)) {
    const overVal = override[key];
    const baseVal = result[key];

    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * Recursively walk a value and resolve any string beginning with "$env:".
 * Object fields whose reference does not resolve are dropped.
 */
async function resolveEnvRefs(obj: unknown, resolver: SecretResolver): Promise<unknown> {
  if (typeof obj === 'string' && obj.startsWith(ENV_REF)) {
    return resolver.resolve(obj.slice(ENV_REF.length));
  }

  if (Array.isArray(obj)) {
    return Promise.all(obj.map((item) => resolveEnvRefs(item, resolver)));
  }

  if (isPlainObject(obj)) {
    const entries = await Promise.all(
      Object.entries(obj).map(async ([k, v]) => [k, await resolveEnvRefs(v, resolver)] as const),
    );
    return Object.fromEntries(entries.filter(([, v]) => v !== undefined));
  }

  return obj;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Turn raw JSON into a validated config snapshot.
 *
 * 1. Deep-merge with DEFAULT_CONFIG (arrays in the file replace defaults)
 * 2. Apply TypeBox defaults
 * 3. Resolve $env: references
 * 4. Validate
 * 5. Freeze
 */
export async function parseConfig(
  rawJson: unknown,
  resolver: SecretResolver = envResolver,
): Promise<{ config: GatewayConfig; validation: ValidationResult }> {
  if (!isPlainObject(rawJson)) {
    throw new Error('Configuration root must be a JSON object');
  }

  const merged = deepMerge(Value.Clone(DEFAULT_CONFIG), rawJson);
  const withDefaults = Value.Default(GatewayConfigSchema, merged);
  const resolved = await resolveEnvRefs(withDefaults, resolver);

  const validation = validateConfig(resolved);
  deepFreeze(validation.config);

  return { config: validation.config, validation };
}

/**
 * Load the gateway configuration.
 *
 * Reads VERIGATE_HOME/verigate.json (created with defaults if missing) unless
 * an explicit path is given.
 */
export async function loadConfig(
  options: { configPath?: string; resolver?: SecretResolver } = {},
): Promise<{ config: GatewayConfig; validation: ValidationResult }> {
  const configPath = options.configPath ?? ensureDirectories().config;

  let rawJson: unknown;

  if (existsSync(configPath)) {
    const text = readFileSync(configPath, 'utf-8');
    try {
      rawJson = JSON.parse(text);
    } catch (err) {
      throw new Error(
        `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  } else {
    rawJson = DEFAULT_CONFIG;
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf-8');
  }

  return parseConfig(rawJson, options.resolver);
}
