import { ArmoryError } from "./base.js";

/**
 * Project configuration (armory.json or environment overrides) is invalid.
 */
export class ConfigError extends ArmoryError {
  readonly _tag = "ConfigError" as const;
  readonly code = "CONFIG_INVALID" as const;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[], options?: ErrorOptions) {
    super(
      `Invalid configuration (${source}):\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      { source },
      options,
    );
    this.issues = issues;
  }
}
