/**
 * Version constraints for component dependencies.
 *
 * Convention: SemVer-style ranges as understood by the `semver` package.
 * Supported operators: `==` (alias of `=`), `=`, `>=`, `<=`, `>`, `<`, `^`, `~`,
 * a bare version (exact match) and `*`. Several comparators separated by
 * whitespace form a conjunction (`>=1.2.0 <2.0.0`). Disjunctions (`||`) and
 * hyphen ranges are rejected because the resolver intersects constraints by
 * conjunction.
 */

import { ConstraintParseError } from "@armory/errors";
import semver from "semver";

/** `MAJOR.MINOR.PATCH[-pre]`, no leading `v`, no build metadata */
const STRICT_VERSION = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

/** One comparator: optional operator, then a full or partial version */
const COMPARATOR =
  /^(==|=|>=|<=|>|<|\^|~)?((?:0|[1-9]\d*)(?:\.(?:0|[1-9]\d*)){0,2}(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?)$/;

export interface VersionConstraint {
  /** Constraint as written (whitespace-collapsed), `*` when unconstrained */
  readonly raw: string;
  /** Equivalent range in `semver` syntax */
  readonly range: string;
}

export const ANY_VERSION: VersionConstraint = Object.freeze({ raw: "*", range: "*" });

/**
 * Checks that `version` is a strict semantic version (`1.2.3`, `1.2.3-beta.1`).
 */
export function isValidVersion(version: string): boolean {
  return STRICT_VERSION.test(version) && semver.valid(version) !== null;
}

/**
 * Parses a constraint string.
 *
 * @throws {ConstraintParseError} on an unsupported operator, a malformed
 *   version, or a range `semver` rejects
 */
export function parseConstraint(text: string): VersionConstraint {
  const trimmed = text.trim();
  if (trimmed === "" || trimmed === "*") {
    return ANY_VERSION;
  }
  if (trimmed.includes("||")) {
    throw new ConstraintParseError(text, "disjunctions (||) are not supported");
  }

  const tokens = joinDetachedOperators(trimmed.split(/\s+/));
  const comparators: string[] = [];
  for (const token of tokens) {
    if (token === "*") continue;
    const match = COMPARATOR.exec(token);
    if (match === null) {
      throw new ConstraintParseError(text, `unrecognized comparator '${token}'`);
    }
    const operator = match[1] === "==" ? "=" : (match[1] ?? "");
    comparators.push(`${operator}${match[2] ?? ""}`);
  }

  if (comparators.length === 0) {
    return ANY_VERSION;
  }

  const range = comparators.join(" ");
  if (semver.validRange(range) === null) {
    throw new ConstraintParseError(text, "not a valid version range");
  }
  return { raw: tokens.join(" "), range };
}

/**
 * Returns true when `text` parses under the supported operator set.
 */
export function isValidConstraint(text: string): boolean {
  try {
    parseConstraint(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Conjunction of two constraints. The result may be unsatisfiable; check
 * with {@link isSatisfiable}.
 */
export function intersectConstraints(a: VersionConstraint, b: VersionConstraint): VersionConstraint {
  if (a.range === "*") return b;
  if (b.range === "*") return a;
  if (a.raw === b.raw) return a;
  return { raw: `${a.raw} ${b.raw}`, range: `${a.range} ${b.range}` };
}

/**
 * True when at least one release version could satisfy the constraint.
 */
export function isSatisfiable(constraint: VersionConstraint): boolean {
  return semver.minVersion(constraint.range) !== null;
}

export function satisfies(version: string, constraint: VersionConstraint): boolean {
  return semver.satisfies(version, constraint.range);
}

/**
 * Highest version in `versions` satisfying `constraint`, or undefined.
 */
export function maxSatisfying(
  versions: readonly string[],
  constraint: VersionConstraint,
): string | undefined {
  return semver.maxSatisfying([...versions], constraint.range) ?? undefined;
}

/**
 * Descending semver order (highest first).
 */
export function compareVersionsDesc(a: string, b: string): number {
  return semver.rcompare(a, b);
}

/**
 * `>= 1.0.0` is written with a space often enough to accept it:
 * re-attach an operator token to the version that follows it.
 */
function joinDetachedOperators(tokens: readonly string[]): string[] {
  const joined: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";
    const next = tokens[i + 1];
    if (/^(==|=|>=|<=|>|<|\^|~)$/.test(token) && next !== undefined) {
      joined.push(`${token}${next}`);
      i++;
    } else {
      joined.push(token);
    }
  }
  return joined;
}
