/**
 * @verigate/core - Core package for the verification gateway
 *
 * Re-exports domain types, configuration, the error taxonomy and utilities.
 */

// Types & Schemas
export * from './types/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export {
  sleep,
  retry,
  withTimeout,
  TimeoutError,
  hash,
  generateApiKey,
  hashApiKey,
  keyPrefixOf,
  isPlainObject,
  safeJsonParse,
  API_KEY_PREFIX,
  type GeneratedApiKey,
} from './utils/index.js';
