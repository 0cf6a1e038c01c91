/**
 * CachingRegistryClient: bounded LRU caches in front of another client.
 *
 * In-flight fetches are cached too, so concurrent requests for the same key
 * share one call to the inner client. Rejected fetches are evicted. Each
 * instance owns its caches; nothing is shared between instances.
 */

import type { Bundle, Manifest, RegistryClient } from "@armory/core";
import { LRUCache } from "lru-cache";

import { recordCacheAccess } from "./metrics.js";

const DEFAULT_MAX_MANIFESTS = 500;
const DEFAULT_MAX_BUNDLES = 100;

export interface RegistryCacheConfig {
  /** Max cached manifest lookups (default: 500) */
  readonly maxManifests?: number;
  /** Max cached bundles (default: 100) */
  readonly maxBundles?: number;
}

export interface CacheTierStats {
  readonly size: number;
  readonly max: number;
  readonly hits: number;
  readonly misses: number;
}

export interface RegistryCacheStats {
  readonly manifests: CacheTierStats;
  readonly bundles: CacheTierStats;
}

interface Counters {
  hits: number;
  misses: number;
}

export class CachingRegistryClient implements RegistryClient {
  readonly name: string;
  private readonly inner: RegistryClient;
  private readonly manifests: LRUCache<string, Promise<Manifest>>;
  private readonly bundles: LRUCache<string, Promise<Bundle>>;
  private readonly manifestCounters: Counters = { hits: 0, misses: 0 };
  private readonly bundleCounters: Counters = { hits: 0, misses: 0 };

  constructor(inner: RegistryClient, config: RegistryCacheConfig = {}) {
    this.inner = inner;
    this.name = `cached(${inner.name})`;
    this.manifests = new LRUCache<string, Promise<Manifest>>({
      max: config.maxManifests ?? DEFAULT_MAX_MANIFESTS,
    });
    this.bundles = new LRUCache<string, Promise<Bundle>>({
      max: config.maxBundles ?? DEFAULT_MAX_BUNDLES,
    });
  }

  fetchManifest(name: string, versionConstraint: string): Promise<Manifest> {
    return this.cached(
      this.manifests,
      this.manifestCounters,
      "manifest",
      cacheKey(name, versionConstraint),
      () => this.inner.fetchManifest(name, versionConstraint),
    );
  }

  fetchBundle(name: string, version: string): Promise<Bundle> {
    return this.cached(this.bundles, this.bundleCounters, "bundle", cacheKey(name, version), () =>
      this.inner.fetchBundle(name, version),
    );
  }

  /**
   * Drops cached entries for `name`, or everything when no name is given.
   */
  invalidate(name?: string): void {
    if (name === undefined) {
      this.manifests.clear();
      this.bundles.clear();
      return;
    }
    const prefix = cacheKey(name, "");
    for (const cache of [this.manifests, this.bundles]) {
      for (const key of [...cache.keys()]) {
        if (key.startsWith(prefix)) cache.delete(key);
      }
    }
  }

  stats(): RegistryCacheStats {
    return {
      manifests: {
        size: this.manifests.size,
        max: this.manifests.max,
        ...this.manifestCounters,
      },
      bundles: {
        size: this.bundles.size,
        max: this.bundles.max,
        ...this.bundleCounters,
      },
    };
  }

  private cached<T>(
    cache: LRUCache<string, Promise<T>>,
    counters: Counters,
    kind: "manifest" | "bundle",
    key: string,
    load: () => Promise<T>,
  ): Promise<T> {
    const hit = cache.get(key);
    if (hit !== undefined) {
      counters.hits++;
      recordCacheAccess(kind, true);
      return hit;
    }

    counters.misses++;
    recordCacheAccess(kind, false);
    const pending = load();
    cache.set(key, pending);
    void pending.catch(() => {
      if (cache.peek(key) === pending) cache.delete(key);
    });
    return pending;
  }
}

function cacheKey(name: string, requested: string): string {
  return `${name}\0${requested}`;
}
