/**
 * Manifest errors — raised while parsing and validating component manifests.
 *
 * Abstract base: ManifestDomainError
 * Concrete:
 *   - ManifestError        (MANIFEST_INVALID)
 *   - ConstraintParseError (MANIFEST_CONSTRAINT_INVALID)
 */

import { ArmoryError } from "./base.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class ManifestDomainError extends ArmoryError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

/**
 * A manifest field is missing, malformed, or inconsistent.
 *
 * `field` is a dotted path into the manifest (e.g. `dependencies[2].versionConstraint`).
 * When several fields are invalid, `issues` lists every one and `field` is the first.
 */
export class ManifestError extends ManifestDomainError {
  readonly _tag = "ManifestError" as const;
  readonly code = "MANIFEST_INVALID" as const;
  readonly field: string;
  readonly issues: readonly ManifestIssue[];
  readonly componentName: string | undefined;

  constructor(
    issues: readonly ManifestIssue[],
    options?: { readonly componentName?: string | undefined; readonly cause?: Error },
  ) {
    const first = issues[0] ?? { field: "manifest", message: "invalid manifest" };
    const subject = options?.componentName ? ` for '${options.componentName}'` : "";
    const message =
      issues.length <= 1
        ? `Invalid manifest${subject}: ${first.field}: ${first.message}`
        : `Invalid manifest${subject}:\n${issues.map((i) => `  - ${i.field}: ${i.message}`).join("\n")}`;
    super(
      message,
      options?.componentName ? { component: options.componentName } : undefined,
      options?.cause ? { cause: options.cause } : undefined,
    );
    this.field = first.field;
    this.issues = issues;
    this.componentName = options?.componentName;
  }
}

export interface ManifestIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * A version constraint could not be parsed under the supported operator set.
 */
export class ConstraintParseError extends ManifestDomainError {
  readonly _tag = "ConstraintParseError" as const;
  readonly code = "MANIFEST_CONSTRAINT_INVALID" as const;
  readonly constraint: string;
  readonly reason: string;

  constructor(constraint: string, reason: string) {
    super(`Invalid version constraint '${constraint}': ${reason}`, { constraint });
    this.constraint = constraint;
    this.reason = reason;
  }
}
