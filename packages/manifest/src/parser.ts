/**
 * Synchronous manifest parser.
 * Decodes raw bytes, parses JSON (YAML is accepted too), normalizes legacy
 * fields, validates with Zod, and deep-freezes.
 *
 * Only the manifest's self-consistency is checked here. Whether the files'
 * placeholders match `templateVariables` is checked at render time, since
 * bundle contents are fetched separately.
 */

import type { JsonValue, Manifest } from "@armory/core";
import { ManifestError, type ManifestIssue } from "@armory/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodIssue } from "zod";

import { deepFreeze } from "./freeze.js";
import { normalizeManifest } from "./normalize.js";
import { KNOWN_MANIFEST_KEYS, type ManifestDocument, ManifestSchema } from "./schema.js";

export interface ParseManifestOptions {
  /** Where the bytes came from (file path or `name@version`), used in error messages */
  readonly source?: string;
}

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Parses raw manifest bytes into a validated, frozen Manifest.
 *
 * Pipeline:
 * 1. Decode UTF-8 and strip a BOM
 * 2. Parse (JSON is a subset of the YAML grammar)
 * 3. Normalize legacy and shorthand fields
 * 4. Validate against the Zod schema
 * 5. Split unknown top-level fields into `extra`
 * 6. Deep freeze result
 *
 * @throws {ManifestError} listing every invalid field
 */
export function parseManifest(raw: string | Uint8Array, options?: ParseManifestOptions): Manifest {
  const text = decode(raw, options?.source);

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error: unknown) {
    const pos = error instanceof YAMLParseError ? error.linePos?.[0] : undefined;
    const location = pos ? ` at line ${pos.line}:${pos.col}` : "";
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError([{ field: "manifest", message: `parse failed${location}: ${message}` }], {
      componentName: options?.source,
      ...(error instanceof Error ? { cause: error } : {}),
    });
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ManifestError([{ field: "manifest", message: "must be a JSON object" }], {
      componentName: options?.source,
    });
  }

  const document = normalizeManifest(toRecord(parsed));
  const result = ManifestSchema.safeParse(document);
  if (!result.success) {
    const named = typeof document.name === "string" ? document.name : options?.source;
    throw new ManifestError(result.error.issues.map(toManifestIssue), {
      componentName: named,
      cause: result.error,
    });
  }

  return deepFreeze(buildManifest(result.data, collectExtra(document)));
}

function decode(raw: string | Uint8Array, source: string | undefined): string {
  let text: string;
  if (typeof raw === "string") {
    text = raw;
  } else {
    try {
      text = decoder.decode(raw);
    } catch (error: unknown) {
      throw new ManifestError([{ field: "manifest", message: "is not valid UTF-8" }], {
        componentName: source,
        ...(error instanceof Error ? { cause: error } : {}),
      });
    }
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

/**
 * Zod issue path → manifest field path: `["dependencies", 0, "versionConstraint"]`
 * becomes `dependencies[0].versionConstraint`.
 */
export function formatFieldPath(path: readonly (string | number)[]): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out === "" ? segment : `.${segment}`;
    }
  }
  return out === "" ? "manifest" : out;
}

function toManifestIssue(issue: ZodIssue): ManifestIssue {
  const field = formatFieldPath(issue.path);
  const missing = issue.code === "invalid_type" && issue.received === "undefined";
  return { field, message: missing ? "Required" : issue.message };
}

function collectExtra(document: Record<string, unknown>): Record<string, JsonValue> {
  const extra: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(document)) {
    if (KNOWN_MANIFEST_KEYS.has(key)) continue;
    const json = toJsonValue(value);
    if (json !== undefined) {
      extra[key] = json;
    }
  }
  return extra;
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const json = toJsonValue(item);
      if (json !== undefined) items.push(json);
    }
    return items;
  }
  if (typeof value === "object") {
    const out: Record<string, JsonValue> = {};
    for (const [key, inner] of Object.entries(value)) {
      const json = toJsonValue(inner);
      if (json !== undefined) out[key] = json;
    }
    return out;
  }
  return undefined;
}

function buildManifest(doc: ManifestDocument, extra: Record<string, JsonValue>): Manifest {
  return {
    name: doc.name,
    componentType: doc.componentType,
    version: doc.version,
    description: doc.description,
    ...(doc.author !== undefined ? { author: doc.author } : {}),
    tags: distinct(doc.tags),
    dependencies: doc.dependencies.map((d) => ({
      name: d.name,
      versionConstraint: d.versionConstraint,
    })),
    ...(doc.minLanguageVersion !== undefined ? { minLanguageVersion: doc.minLanguageVersion } : {}),
    files: doc.files.map((f) => ({ src: f.src, dest: f.dest })),
    templateVariables: distinct(doc.templateVariables),
    templateDefaults: { ...doc.templateDefaults },
    environmentVariables: distinct(doc.environmentVariables),
    ...(doc.postInstallMessage !== undefined ? { postInstallMessage: doc.postInstallMessage } : {}),
    extra,
  };
}

function distinct(values: readonly string[]): string[] {
  return [...new Set(values)];
}
