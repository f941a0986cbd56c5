/**
 * @verigate/core - Configuration validator
 *
 * Validates a GatewayConfig object using TypeBox, then applies business rules
 * (unique ids, fallback chains naming known providers, key patterns that
 * compile).
 */

import { Value } from '@sinclair/typebox/value';
import { GatewayConfigSchema, DEFAULT_CONFIG, type GatewayConfig } from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  config: GatewayConfig;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

/**
 * Validate a config object.
 *
 * 1. TypeBox schema check (on failure the defaults are returned as `config`)
 * 2. Duplicate service / provider ids
 * 3. Fallback chains reference registered providers
 * 4. keyPattern compiles
 * 5. Soft warnings for providers that are unconfigured or lack an endpoint
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // ----- TypeBox schema validation -----
  if (!Value.Check(GatewayConfigSchema, raw)) {
    for (const err of Value.Errors(GatewayConfigSchema, raw)) {
      errors.push({ path: err.path, message: err.message });
    }
    return { valid: false, errors, warnings, config: Value.Clone(DEFAULT_CONFIG) };
  }

  const config = raw;

  // ----- Providers -----
  const providerIds = new Set<string>();
  config.providers.forEach((provider, i) => {
    const prefix = `/providers/${i}`;

    if (providerIds.has(provider.id)) {
      errors.push({ path: `${prefix}/id`, message: `Duplicate provider id "${provider.id}"` });
    }
    providerIds.add(provider.id);

    if (!provider.baseUrl || !provider.apiKey) {
      warnings.push({
        path: prefix,
        message: `Provider "${provider.id}" has no ${provider.baseUrl ? 'apiKey' : 'baseUrl'}; it will be skipped`,
      });
    }
  });

  // ----- Services -----
  const serviceIds = new Set<string>();
  config.services.forEach((service, i) => {
    const prefix = `/services/${i}`;

    if (serviceIds.has(service.id)) {
      errors.push({ path: `${prefix}/id`, message: `Duplicate service id "${service.id}"` });
    }
    serviceIds.add(service.id);

    service.fallbackChain.forEach((providerId, j) => {
      if (!providerIds.has(providerId)) {
        errors.push({
          path: `${prefix}/fallbackChain/${j}`,
          message: `Service "${service.id}" names unknown provider "${providerId}"`,
        });
        return;
      }
      const provider = config.providers.find((p) => p.id === providerId);
      if (provider && !provider.endpoints[service.id]) {
        warnings.push({
          path: `${prefix}/fallbackChain/${j}`,
          message: `Provider "${providerId}" has no endpoint for "${service.id}"; it will be skipped`,
        });
      }
    });

    if (service.keyPattern !== undefined && !isValidPattern(service.keyPattern)) {
      errors.push({
        path: `${prefix}/keyPattern`,
        message: `keyPattern "${service.keyPattern}" is not a valid regular expression`,
      });
    }
  });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}

/**
 * Whether a string compiles as a regular expression.
 */
export function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
