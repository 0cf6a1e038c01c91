/**
 * Sugar and legacy-format normalizer for component manifests.
 *
 * Registries still serve manifests in the older snake_case layout
 * (`type`, `files_to_copy`, `registry_dependencies`, ...). This module maps
 * both those and a few shorthand forms onto the canonical field names the
 * Zod schema expects. Always returns a new object — never mutates the input.
 */

/** Legacy key → canonical key, for fields that need no value conversion */
const RENAMED_KEYS: ReadonlyArray<readonly [string, string]> = [
  ["type", "componentType"],
  ["component_type", "componentType"],
  ["mirascope_version_min", "minLanguageVersion"],
  ["min_language_version", "minLanguageVersion"],
  ["post_install_notes", "postInstallMessage"],
  ["post_install_message", "postInstallMessage"],
  ["environment_variables", "environmentVariables"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * `"name"` or `"name@constraint"` → `{ name, versionConstraint }`.
 * A leading `@` belongs to the name, not the separator.
 */
function parseDependencyString(spec: string): { name: string; versionConstraint: string } {
  const at = spec.indexOf("@", 1);
  if (at === -1) {
    return { name: spec.trim(), versionConstraint: "*" };
  }
  return { name: spec.slice(0, at).trim(), versionConstraint: spec.slice(at + 1).trim() };
}

function normalizeDependencies(dependencies: unknown): unknown {
  if (!Array.isArray(dependencies)) {
    return dependencies;
  }
  return dependencies.map((dep: unknown) => {
    if (typeof dep === "string") {
      return parseDependencyString(dep);
    }
    if (isRecord(dep) && dep.versionConstraint === undefined) {
      const { version, constraint, ...rest } = dep;
      const range = constraint ?? version;
      return { ...rest, versionConstraint: range === undefined ? "*" : range };
    }
    return dep;
  });
}

function normalizeFiles(files: unknown): unknown {
  if (!Array.isArray(files)) {
    return files;
  }
  return files.map((file: unknown) => {
    if (typeof file === "string") {
      return { src: file, dest: file };
    }
    if (isRecord(file)) {
      const { source, destination, ...rest } = file;
      const src = rest.src ?? source;
      return { ...rest, src, dest: rest.dest ?? destination ?? src };
    }
    return file;
  });
}

interface NormalizedVariables {
  readonly names: unknown;
  readonly defaults: Record<string, unknown>;
}

/**
 * Template variables may be plain names or `{ name, description, default }`
 * objects; the objects' defaults are lifted into `templateDefaults`.
 */
function normalizeTemplateVariables(variables: unknown): NormalizedVariables {
  if (!Array.isArray(variables)) {
    return { names: variables, defaults: {} };
  }
  const defaults: Record<string, unknown> = {};
  const names = variables.map((variable: unknown) => {
    if (isRecord(variable) && typeof variable.name === "string") {
      if (variable.default !== undefined && variable.default !== null) {
        defaults[variable.name] =
          typeof variable.default === "string" ? variable.default : String(variable.default);
      }
      return variable.name;
    }
    return variable;
  });
  return { names, defaults };
}

/**
 * `author: { name }` and `authors: [{ name }, ...]` → first author's name.
 */
function normalizeAuthor(author: unknown, authors: unknown): unknown {
  const candidate = author ?? (Array.isArray(authors) ? authors[0] : undefined);
  if (isRecord(candidate) && typeof candidate.name === "string") {
    return candidate.name;
  }
  return candidate;
}

/**
 * Normalizes a parsed manifest document:
 *
 * - legacy snake_case keys → camelCase (`type` → `componentType`, ...)
 * - `files_to_copy: [{ source, destination }]` → `files: [{ src, dest }]`
 * - `registry_dependencies: ["lib@^1.0.0"]` → `dependencies: [{ name, versionConstraint }]`
 * - `template_variables: [{ name, default }]` → `templateVariables` + `templateDefaults`
 * - `authors: [{ name }]` → `author`
 *
 * Canonical keys win over legacy keys when both are present.
 */
export function normalizeManifest(raw: Record<string, unknown>): Record<string, unknown> {
  const {
    files_to_copy: legacyFiles,
    registry_dependencies: legacyDependencies,
    template_variables: legacyVariables,
    authors,
    ...rest
  } = raw;

  const normalized: Record<string, unknown> = { ...rest };

  for (const [legacy, canonical] of RENAMED_KEYS) {
    if (legacy in normalized) {
      if (normalized[canonical] === undefined) {
        normalized[canonical] = normalized[legacy];
      }
      delete normalized[legacy];
    }
  }

  const author = normalizeAuthor(normalized.author, authors);
  if (author !== undefined) {
    normalized.author = author;
  }

  const files = normalized.files ?? legacyFiles;
  if (files !== undefined) {
    normalized.files = normalizeFiles(files);
  }

  const dependencies = normalized.dependencies ?? legacyDependencies;
  if (dependencies !== undefined) {
    normalized.dependencies = normalizeDependencies(dependencies);
  }

  const variables = normalized.templateVariables ?? legacyVariables;
  if (variables !== undefined) {
    const { names, defaults } = normalizeTemplateVariables(variables);
    normalized.templateVariables = names;
    if (Object.keys(defaults).length > 0) {
      normalized.templateDefaults = isRecord(normalized.templateDefaults)
        ? { ...defaults, ...normalized.templateDefaults }
        : normalized.templateDefaults ?? defaults;
    }
  }

  return normalized;
}
