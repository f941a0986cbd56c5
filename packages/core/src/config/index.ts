export { GatewayConfigSchema, ProviderConfigSchema, DEFAULT_CONFIG, type GatewayConfig, type ProviderConfig, type ProviderEndpoint } from './schema.js';
export { loadConfig, parseConfig, envResolver, type SecretResolver } from './loader.js';
export { validateConfig, isValidPattern, type ValidationResult, type ValidationError, type ValidationWarning } from './validator.js';
export { resolveHome, resolveStateDir, buildPaths, ensureDirectories, SUBDIR_NAMES, type GatewayPaths } from './paths.js';
