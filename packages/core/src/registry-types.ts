import type { Manifest } from "./manifest-types.js";

/**
 * Raw file contents of one component version, keyed by `files[].src`.
 */
export type Bundle = ReadonlyMap<string, Uint8Array>;

/**
 * Source of manifests and bundles.
 *
 * Implementations fail with `RegistryFetchError` when a component is unknown,
 * when no version satisfies the constraint, or when the source is unreachable.
 * Retry and caching policy belong to the implementation, not to callers.
 */
export interface RegistryClient {
  /** Client name (for logging and debugging) */
  readonly name: string;
  /** Highest version of `name` that satisfies `versionConstraint` */
  fetchManifest(name: string, versionConstraint: string): Promise<Manifest>;
  /** Bundle for an exact `name@version` previously returned by fetchManifest() */
  fetchBundle(name: string, version: string): Promise<Bundle>;
}
