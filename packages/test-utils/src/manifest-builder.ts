/**
 * Manifest builders for tests.
 *
 * Every builder goes through parseManifest(), so a built manifest obeys the
 * same invariants as one read from a registry.
 */

import type { ComponentType, Manifest } from "@armory/core";
import { parseManifest } from "@armory/manifest";

export interface ManifestInit {
  readonly name: string;
  readonly version?: string;
  readonly componentType?: ComponentType;
  /** `{ dependencyName: versionConstraint }` */
  readonly dependencies?: Readonly<Record<string, string>>;
  /** `{ src: dest }`, or a list of paths used as both */
  readonly files?: Readonly<Record<string, string>> | readonly string[];
  readonly templateVariables?: readonly string[];
  readonly templateDefaults?: Readonly<Record<string, string>>;
  readonly description?: string;
  readonly postInstallMessage?: string;
}

export function createManifest(init: ManifestInit): Manifest {
  return parseManifest(
    JSON.stringify({
      name: init.name,
      componentType: init.componentType ?? "tool",
      version: init.version ?? "1.0.0",
      description: init.description ?? "",
      dependencies: Object.entries(init.dependencies ?? {}).map(([name, versionConstraint]) => ({
        name,
        versionConstraint,
      })),
      files: toFileEntries(init.files),
      templateVariables: init.templateVariables ?? [],
      templateDefaults: init.templateDefaults ?? {},
      ...(init.postInstallMessage !== undefined ? { postInstallMessage: init.postInstallMessage } : {}),
    }),
  );
}

type FileSpec = NonNullable<ManifestInit["files"]>;

function isPathList(files: FileSpec): files is readonly string[] {
  return Array.isArray(files);
}

function toFileEntries(files: FileSpec | undefined): { src: string; dest: string }[] {
  if (files === undefined) return [];
  if (isPathList(files)) return files.map((path) => ({ src: path, dest: path }));
  return Object.entries(files).map(([src, dest]) => ({ src, dest }));
}
