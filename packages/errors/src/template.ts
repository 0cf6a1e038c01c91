import { ArmoryError } from "./base.js";

/**
 * A template references variables that cannot be substituted.
 *
 * - `missing`: referenced but no value was supplied
 * - `undeclared`: referenced but absent from the manifest's `templateVariables`
 *
 * Both lists hold every distinct offending name, in first-appearance order.
 */
export class TemplateError extends ArmoryError {
  readonly _tag = "TemplateError" as const;
  readonly code = "TEMPLATE_VARIABLES_INVALID" as const;
  readonly missing: readonly string[];
  readonly undeclared: readonly string[];
  readonly file: string | undefined;

  constructor(
    missing: readonly string[],
    options?: { readonly undeclared?: readonly string[]; readonly file?: string },
  ) {
    const undeclared = options?.undeclared ?? [];
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`missing variable${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`);
    }
    if (undeclared.length > 0) {
      parts.push(
        `undeclared variable${undeclared.length > 1 ? "s" : ""}: ${undeclared.join(", ")}`,
      );
    }
    const where = options?.file ? ` in ${options.file}` : "";
    super(`Template rendering failed${where}: ${parts.join("; ")}`);
    this.missing = missing;
    this.undeclared = undeclared;
    this.file = options?.file;
  }
}
