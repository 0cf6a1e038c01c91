/**
 * Non-fatal conditions surfaced through `onWarning` callbacks.
 */
export type ArmoryWarningCode =
  | "UNUSED_TEMPLATE_VARIABLE"
  | "REQUIREMENT_WITHDRAWN"
  | "REGISTRY_SOURCE_FAILED"
  | "ROLLBACK_INCOMPLETE"
  | "PROGRESS_HANDLER_FAILED"
  | "LEDGER_TAIL_DISCARDED";

export interface ArmoryWarning {
  readonly code: ArmoryWarningCode;
  readonly message: string;
  /** Component the warning concerns, when there is one */
  readonly component?: string;
}

export type WarningHandler = (warning: ArmoryWarning) => void;

/**
 * Returns `handler`, or a fallback that writes `[tag] message` to stderr.
 */
export function resolveWarningHandler(tag: string, handler?: WarningHandler): WarningHandler {
  if (handler !== undefined) return handler;
  return (warning) => {
    console.warn(`[${tag}] ${warning.message}`);
  };
}
