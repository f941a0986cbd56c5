/**
 * @verigate/fallback - Record resolution across the local store and
 * external providers
 *
 * Provides ordered provider failover with:
 *   - Per-provider timeouts; unconfigured providers are skipped
 *   - A registry mapping provider ids to instances
 *   - Local-first resolution with write-back and optional TTL
 *   - Background health checking with degradation detection
 *
 * @packageDocumentation
 */

// Chain - core execution engine
export {
  FallbackChain,
  FallbackChainError,
  type ExternalProvider,
  type ProviderFetchResult,
  type FetchOptions,
  type FallbackAttempt,
  type FallbackResult,
  type FallbackChainOptions,
} from './chain.js';

// Registry - provider id -> instance
export {
  ProviderRegistry,
  type ProviderStatus,
  type ChainStatus,
  type ChainHooks,
} from './registry.js';

// Resolver - store first, then the chain
export {
  FallbackResolver,
  type ResolveResult,
  type FallbackResolverOptions,
} from './resolver.js';

// Health - background monitoring
export {
  HealthChecker,
  type ProviderHealth,
  type ServiceHealth,
  type HealthReport,
  type HealthCheckerOptions,
  type OverallStatus,
} from './health.js';
