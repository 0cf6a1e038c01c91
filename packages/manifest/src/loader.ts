/**
 * Async file-based manifest loader.
 * Reads a manifest file from disk and delegates to parseManifest().
 */

import { readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";

import type { Manifest } from "@armory/core";
import { getErrnoCode, ManifestError } from "@armory/errors";

import { parseManifest } from "./parser.js";

/** File names probed, in order, when a directory holds a component */
export const MANIFEST_FILENAMES = ["component.json", "component.yaml", "component.yml"] as const;

/**
 * Reads a manifest file and returns a validated, frozen Manifest.
 *
 * @param filePath — path to the manifest (relative or absolute)
 * @throws {ManifestError} when the file is missing or invalid
 */
export async function loadManifest(filePath: string): Promise<Manifest> {
  const absolutePath = resolve(filePath);

  let content: Buffer;
  try {
    content = await readFile(absolutePath);
  } catch (error: unknown) {
    if (getErrnoCode(error) === "ENOENT") {
      throw new ManifestError([{ field: "manifest", message: `file not found: ${absolutePath}` }]);
    }
    throw error;
  }

  return parseManifest(content, { source: absolutePath });
}

/**
 * Finds the manifest file inside a component directory.
 * Returns undefined when none of {@link MANIFEST_FILENAMES} exists.
 */
export async function findManifestFile(directory: string): Promise<string | undefined> {
  for (const fileName of MANIFEST_FILENAMES) {
    const candidate = join(directory, fileName);
    try {
      const s = await stat(candidate);
      if (s.isFile()) return candidate;
    } catch (error: unknown) {
      if (getErrnoCode(error) !== "ENOENT") throw error;
    }
  }
  return undefined;
}
