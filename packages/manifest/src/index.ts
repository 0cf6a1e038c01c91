/**
 * @armory/manifest
 *
 * Component manifest loader for Armory.
 * Reads component.json files, validates them with Zod, and returns
 * typed, frozen Manifest objects. Also owns the version-constraint
 * grammar used by dependencies.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export { findManifestFile, loadManifest, MANIFEST_FILENAMES } from "./loader.js";
export { normalizeManifest } from "./normalize.js";
export { formatFieldPath, type ParseManifestOptions, parseManifest } from "./parser.js";

// ============================================================================
// VERSION CONSTRAINTS
// ============================================================================

export {
  ANY_VERSION,
  compareVersionsDesc,
  intersectConstraints,
  isSatisfiable,
  isValidConstraint,
  isValidVersion,
  maxSatisfying,
  parseConstraint,
  satisfies,
  type VersionConstraint,
} from "./constraint.js";

// ============================================================================
// SCHEMA
// ============================================================================

export {
  ComponentNameSchema,
  DependencySchema,
  isSafeRelativePath,
  KNOWN_MANIFEST_KEYS,
  type ManifestDocument,
  ManifestFileSchema,
  ManifestSchema,
  normalizeDest,
  TEMPLATE_VARIABLE_PATTERN,
  TemplateVariableNameSchema,
  VersionSchema,
} from "./schema.js";

// ============================================================================
// UTILITIES
// ============================================================================

export { deepFreeze } from "./freeze.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@armory/manifest";
