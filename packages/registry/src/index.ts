/**
 * @armory/registry
 *
 * RegistryClient implementations: a directory-backed registry plus
 * composable wrappers for multiple sources, caching and retries.
 */

export {
  type CacheTierStats,
  CachingRegistryClient,
  type RegistryCacheConfig,
  type RegistryCacheStats,
} from "./caching.js";
export { FileSystemRegistry, type FileSystemRegistryOptions } from "./filesystem.js";
export {
  getCacheAccess,
  getFetchDuration,
  getRetryCount,
  recordCacheAccess,
  recordFetchTime,
  recordRetry,
} from "./metrics.js";
export { MultiSourceRegistry, type MultiSourceRegistryOptions, type RegistrySource } from "./multi-source.js";
export { DEFAULT_RETRY_POLICY, type RetryPolicy, RetryingRegistryClient } from "./retrying.js";

export const PACKAGE_NAME = "@armory/registry";
