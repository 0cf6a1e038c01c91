import { ArmoryError } from "./base.js";

/**
 * Catch-all for failures that are not part of the taxonomy; produced by
 * `wrapError` for foreign errors.
 */
export class InternalError extends ArmoryError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
}
