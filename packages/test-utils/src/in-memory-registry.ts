/**
 * InMemoryRegistryClient for testing resolver and installer consumers.
 *
 * Holds published manifests and bundles in maps, records every call, and can
 * be told to fail or delay specific fetches.
 */

import type { Bundle, Manifest, RegistryClient } from "@armory/core";
import { RegistryFetchError } from "@armory/errors";
import { maxSatisfying, parseConstraint } from "@armory/manifest";

import { createManifest, type ManifestInit } from "./manifest-builder.js";

export interface RegistryCall {
  readonly method: "fetchManifest" | "fetchBundle";
  readonly name: string;
  readonly requested: string;
}

export type BundleContents = Readonly<Record<string, string | Uint8Array>>;

const encoder = new TextEncoder();

export class InMemoryRegistryClient implements RegistryClient {
  readonly name: string;
  readonly calls: RegistryCall[] = [];
  private readonly manifests = new Map<string, Map<string, Manifest>>();
  private readonly bundles = new Map<string, Bundle>();
  private readonly failures = new Map<string, Error>();
  private delayMs = 0;
  private active = 0;
  private peak = 0;

  constructor(name = "memory") {
    this.name = name;
  }

  /**
   * Publishes a manifest and its files. Files default to `"<src> contents"`
   * for every `files[].src` not given in `contents`.
   */
  publish(manifest: Manifest, contents: BundleContents = {}): this {
    let versions = this.manifests.get(manifest.name);
    if (versions === undefined) {
      versions = new Map();
      this.manifests.set(manifest.name, versions);
    }
    versions.set(manifest.version, manifest);

    const bundle = new Map<string, Uint8Array>();
    for (const file of manifest.files) {
      const content = contents[file.src] ?? `${file.src} contents`;
      bundle.set(file.src, typeof content === "string" ? encoder.encode(content) : content);
    }
    for (const [src, content] of Object.entries(contents)) {
      if (!bundle.has(src)) {
        bundle.set(src, typeof content === "string" ? encoder.encode(content) : content);
      }
    }
    this.bundles.set(`${manifest.name}@${manifest.version}`, bundle);
    return this;
  }

  /** createManifest() + publish() */
  add(init: ManifestInit, contents?: BundleContents): Manifest {
    const manifest = createManifest(init);
    this.publish(manifest, contents);
    return manifest;
  }

  /** Removes a file from a published bundle (the manifest still lists it). */
  dropFile(name: string, version: string, src: string): void {
    const bundle = this.bundles.get(`${name}@${version}`);
    if (bundle === undefined) return;
    const copy = new Map(bundle);
    copy.delete(src);
    this.bundles.set(`${name}@${version}`, copy);
  }

  /** Every fetch for `name` fails with `error` until cleared. */
  failWith(name: string, error: Error): void {
    this.failures.set(name, error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Delays every fetch, so concurrent calls overlap. */
  setDelay(ms: number): void {
    this.delayMs = ms;
  }

  /** Highest number of fetches that were in flight at the same time */
  get peakConcurrency(): number {
    return this.peak;
  }

  callsFor(method: RegistryCall["method"], name?: string): RegistryCall[] {
    return this.calls.filter((c) => c.method === method && (name === undefined || c.name === name));
  }

  async fetchManifest(name: string, versionConstraint: string): Promise<Manifest> {
    this.calls.push({ method: "fetchManifest", name, requested: versionConstraint });
    return this.track(name, () => {
      const versions = this.manifests.get(name);
      if (versions === undefined) {
        throw new RegistryFetchError(name, versionConstraint, "not-found");
      }
      const version = maxSatisfying([...versions.keys()], parseConstraint(versionConstraint));
      const manifest = version === undefined ? undefined : versions.get(version);
      if (manifest === undefined) {
        throw new RegistryFetchError(name, versionConstraint, "no-matching-version");
      }
      return manifest;
    });
  }

  async fetchBundle(name: string, version: string): Promise<Bundle> {
    this.calls.push({ method: "fetchBundle", name, requested: version });
    return this.track(name, () => {
      const bundle = this.bundles.get(`${name}@${version}`);
      if (bundle === undefined) {
        throw new RegistryFetchError(name, version, "not-found");
      }
      return bundle;
    });
  }

  private async track<T>(name: string, produce: () => T): Promise<T> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      if (this.delayMs > 0) {
        await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));
      }
      const failure = this.failures.get(name);
      if (failure !== undefined) throw failure;
      return produce();
    } finally {
      this.active--;
    }
  }
}
