/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised anywhere in the Armory monorepo is declared here.
 * Each code maps to the domain that raises it and whether the condition is
 * an expected, user-actionable outcome (bad manifest, file conflict) or a
 * fault in Armory itself.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // MANIFEST ERRORS - Parsing and validating component manifests
  // ============================================================================
  MANIFEST_INVALID: {
    domain: "manifest",
    isExpected: true,
    title: "Invalid manifest",
    description: "A component manifest is malformed or fails validation",
  },
  MANIFEST_CONSTRAINT_INVALID: {
    domain: "manifest",
    isExpected: true,
    title: "Invalid version constraint",
    description: "A version constraint uses an unsupported operator or malformed version",
  },

  // ============================================================================
  // RESOLUTION ERRORS - Building the dependency graph
  // ============================================================================
  RESOLUTION_CYCLE: {
    domain: "resolution",
    isExpected: true,
    title: "Dependency cycle",
    description: "The requested components depend on each other in a cycle",
  },
  RESOLUTION_CONFLICT: {
    domain: "resolution",
    isExpected: true,
    title: "Version conflict",
    description: "Two or more requesters place constraints on a component that no version satisfies",
  },
  RESOLUTION_LIMIT_EXCEEDED: {
    domain: "resolution",
    isExpected: false,
    title: "Resolution did not converge",
    description: "Version selection kept changing beyond the configured number of rounds",
  },

  // ============================================================================
  // REGISTRY ERRORS - Fetching manifests and bundles
  // ============================================================================
  REGISTRY_FETCH_FAILED: {
    domain: "registry",
    isExpected: true,
    title: "Registry fetch failed",
    description: "A manifest or bundle could not be fetched from the registry",
  },

  // ============================================================================
  // TEMPLATE ERRORS - Rendering component files
  // ============================================================================
  TEMPLATE_VARIABLES_INVALID: {
    domain: "template",
    isExpected: true,
    title: "Template variables invalid",
    description: "A template references variables that were not supplied or not declared",
  },

  // ============================================================================
  // INSTALL ERRORS - Writing components into the target tree
  // ============================================================================
  INSTALL_FILE_CONFLICT: {
    domain: "install",
    isExpected: true,
    title: "File conflict",
    description: "A destination file already exists and is not managed by this component",
  },
  INSTALL_IO_FAILED: {
    domain: "install",
    isExpected: false,
    title: "I/O failure",
    description: "Writing, renaming, or hashing a file failed",
  },
  INSTALL_DEPENDENCY_FAILED: {
    domain: "install",
    isExpected: true,
    title: "Skipped due to dependency failure",
    description: "A component was not attempted because one of its dependencies did not install",
  },
  INSTALL_CANCELLED: {
    domain: "install",
    isExpected: true,
    title: "Install cancelled",
    description: "The install run was cancelled before the component completed",
  },
  INSTALL_LEDGER_INVALID: {
    domain: "install",
    isExpected: false,
    title: "Ledger invalid",
    description: "The install ledger could not be read or contains malformed entries",
  },

  // ============================================================================
  // CONFIG ERRORS
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    isExpected: true,
    title: "Invalid configuration",
    description: "The project configuration file or environment overrides are invalid",
  },
} as const satisfies Record<string, ErrorCatalogEntry>;

export interface ErrorCatalogEntry {
  readonly domain: string;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

export type ErrorCode = keyof typeof ERROR_CATALOG;

export type ErrorDomain = (typeof ERROR_CATALOG)[ErrorCode]["domain"];
