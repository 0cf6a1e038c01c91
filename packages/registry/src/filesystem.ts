/**
 * FileSystemRegistry: a registry laid out as plain directories.
 *
 *   <root>/<name>/<version>/component.json
 *   <root>/<name>/<version>/<files[].src>
 *
 * Versions are the directory names under `<root>/<name>` that parse as
 * semantic versions; anything else is ignored. Caches nothing.
 */

import { readdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";

import type { Bundle, Manifest, RegistryClient } from "@armory/core";
import { getErrnoCode, isArmoryError, RegistryFetchError } from "@armory/errors";
import {
  ComponentNameSchema,
  compareVersionsDesc,
  findManifestFile,
  isSafeRelativePath,
  isValidVersion,
  loadManifest,
  maxSatisfying,
  parseConstraint,
  type VersionConstraint,
} from "@armory/manifest";

import { recordFetchTime } from "./metrics.js";

export interface FileSystemRegistryOptions {
  /** Client name used in logs and errors (default: `fs:<root>`) */
  readonly name?: string;
}

export class FileSystemRegistry implements RegistryClient {
  readonly name: string;
  private readonly root: string;

  constructor(root: string, options?: FileSystemRegistryOptions) {
    this.root = resolve(root);
    this.name = options?.name ?? `fs:${this.root}`;
  }

  /**
   * Published versions of `name`, highest first.
   *
   * @throws {RegistryFetchError} `not-found` when the component is unknown
   */
  async listVersions(name: string): Promise<string[]> {
    if (!ComponentNameSchema.safeParse(name).success) {
      throw new RegistryFetchError(name, "*", "not-found", `invalid component name in ${this.name}`);
    }
    const componentDir = join(this.root, name);
    let entries: string[];
    try {
      const dirents = await readdir(componentDir, { withFileTypes: true });
      entries = dirents.filter((d) => d.isDirectory()).map((d) => d.name);
    } catch (error: unknown) {
      throw this.toFetchError(error, name, "*");
    }
    const versions = entries.filter(isValidVersion).sort(compareVersionsDesc);
    if (versions.length === 0) {
      throw new RegistryFetchError(name, "*", "not-found", `no versions published in ${this.name}`);
    }
    return versions;
  }

  async fetchManifest(name: string, versionConstraint: string): Promise<Manifest> {
    const start = performance.now();
    const constraint = this.parseRequested(name, versionConstraint);
    const versions = await this.listVersions(name);
    const version = maxSatisfying(versions, constraint);
    if (version === undefined) {
      throw new RegistryFetchError(
        name,
        versionConstraint,
        "no-matching-version",
        `available: ${versions.join(", ")}`,
      );
    }
    const manifest = await this.readManifest(name, version);
    recordFetchTime("manifest", this.name, performance.now() - start);
    return manifest;
  }

  async fetchBundle(name: string, version: string): Promise<Bundle> {
    const start = performance.now();
    if (!ComponentNameSchema.safeParse(name).success || !isValidVersion(version)) {
      throw new RegistryFetchError(name, version, "not-found", `not published in ${this.name}`);
    }
    const manifest = await this.readManifest(name, version);
    const versionDir = join(this.root, name, version);

    const bundle = new Map<string, Uint8Array>();
    for (const file of manifest.files) {
      if (!isSafeRelativePath(file.src) || bundle.has(file.src)) continue;
      try {
        bundle.set(file.src, new Uint8Array(await readFile(join(versionDir, file.src))));
      } catch (error: unknown) {
        // A missing file is left out; the installer reports it against the manifest.
        if (getErrnoCode(error) === "ENOENT") continue;
        throw this.toFetchError(error, name, version);
      }
    }
    recordFetchTime("bundle", this.name, performance.now() - start);
    return bundle;
  }

  private parseRequested(name: string, versionConstraint: string): VersionConstraint {
    try {
      return parseConstraint(versionConstraint);
    } catch (error: unknown) {
      throw new RegistryFetchError(
        name,
        versionConstraint,
        "invalid",
        "unparseable version constraint",
        isArmoryError(error) ? { cause: error } : undefined,
      );
    }
  }

  private async readManifest(name: string, version: string): Promise<Manifest> {
    const versionDir = join(this.root, name, version);
    let manifestPath: string | undefined;
    try {
      manifestPath = await findManifestFile(versionDir);
    } catch (error: unknown) {
      throw this.toFetchError(error, name, version);
    }
    if (manifestPath === undefined) {
      throw new RegistryFetchError(name, version, "not-found", `no manifest in ${versionDir}`);
    }

    const manifest = await loadManifest(manifestPath);
    if (manifest.name !== name || manifest.version !== version) {
      throw new RegistryFetchError(
        name,
        version,
        "invalid",
        `manifest at ${manifestPath} declares ${manifest.name}@${manifest.version}`,
      );
    }
    return manifest;
  }

  private toFetchError(error: unknown, name: string, requested: string): RegistryFetchError {
    const code = getErrnoCode(error);
    const cause = error instanceof Error ? { cause: error } : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      return new RegistryFetchError(name, requested, "not-found", `not published in ${this.name}`, cause);
    }
    return new RegistryFetchError(
      name,
      requested,
      "unavailable",
      `${this.name}: ${code ?? "read failed"}`,
      cause,
    );
  }
}
