/**
 * MultiSourceRegistry: several registries searched in priority order.
 *
 * Sources are tried by descending `priority`; ties keep declaration order.
 * The first source holding a satisfying version serves the manifest, and the
 * bundle for that `name@version` is fetched from the same source.
 */

import type { Bundle, Manifest, RegistryClient, WarningHandler } from "@armory/core";
import { resolveWarningHandler } from "@armory/core";
import { RegistryFetchError, type RegistryFetchReason } from "@armory/errors";

export interface RegistrySource {
  readonly alias: string;
  readonly client: RegistryClient;
  /** Higher is searched first (default 0) */
  readonly priority?: number;
}

export interface MultiSourceRegistryOptions {
  readonly onWarning?: WarningHandler;
}

/** Reasons after which the next source is tried */
const FALL_THROUGH: ReadonlySet<RegistryFetchReason> = new Set([
  "not-found",
  "no-matching-version",
  "unavailable",
]);

export class MultiSourceRegistry implements RegistryClient {
  readonly name: string;
  private readonly sources: readonly RegistrySource[];
  private readonly onWarning: WarningHandler;
  /** `name@version` → source that served the manifest */
  private readonly origins = new Map<string, RegistrySource>();

  constructor(sources: readonly RegistrySource[], options?: MultiSourceRegistryOptions) {
    if (sources.length === 0) {
      throw new Error("MultiSourceRegistry requires at least one source");
    }
    this.sources = sources
      .map((source, index) => ({ source, index }))
      .sort((a, b) => (b.source.priority ?? 0) - (a.source.priority ?? 0) || a.index - b.index)
      .map(({ source }) => source);
    this.name = `multi(${this.sources.map((s) => s.alias).join(",")})`;
    this.onWarning = resolveWarningHandler("armory:registry", options?.onWarning);
  }

  /** Aliases in search order */
  get searchOrder(): readonly string[] {
    return this.sources.map((s) => s.alias);
  }

  async fetchManifest(name: string, versionConstraint: string): Promise<Manifest> {
    const failures: RegistryFetchError[] = [];
    for (const source of this.sources) {
      try {
        const manifest = await source.client.fetchManifest(name, versionConstraint);
        this.origins.set(`${manifest.name}@${manifest.version}`, source);
        return manifest;
      } catch (error: unknown) {
        failures.push(this.fallThrough(error, source, name));
      }
    }
    throw this.exhausted(name, versionConstraint, failures);
  }

  async fetchBundle(name: string, version: string): Promise<Bundle> {
    const origin = this.origins.get(`${name}@${version}`);
    if (origin !== undefined) {
      return origin.client.fetchBundle(name, version);
    }

    const failures: RegistryFetchError[] = [];
    for (const source of this.sources) {
      try {
        return await source.client.fetchBundle(name, version);
      } catch (error: unknown) {
        failures.push(this.fallThrough(error, source, name));
      }
    }
    throw this.exhausted(name, version, failures);
  }

  /**
   * Returns the error when the next source may be tried, rethrows otherwise.
   */
  private fallThrough(error: unknown, source: RegistrySource, name: string): RegistryFetchError {
    if (!(error instanceof RegistryFetchError) || !FALL_THROUGH.has(error.reason)) {
      throw error;
    }
    if (error.reason === "unavailable") {
      this.onWarning({
        code: "REGISTRY_SOURCE_FAILED",
        message: `source '${source.alias}' unavailable for ${name}: ${error.message}`,
        component: name,
      });
    }
    return error;
  }

  private exhausted(
    name: string,
    requested: string,
    failures: readonly RegistryFetchError[],
  ): RegistryFetchError {
    const reasons = new Set(failures.map((f) => f.reason));
    const reason: RegistryFetchReason = reasons.has("no-matching-version")
      ? "no-matching-version"
      : reasons.has("unavailable")
        ? "unavailable"
        : "not-found";
    const last = failures[failures.length - 1];
    return new RegistryFetchError(
      name,
      requested,
      reason,
      `searched ${this.searchOrder.join(", ")}`,
      last ? { cause: last } : undefined,
    );
  }
}
