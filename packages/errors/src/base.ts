import { ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * JSON shape produced by {@link ArmoryError.toJSON}.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

/**
 * Root of the Armory error hierarchy.
 *
 * Subclasses declare a `_tag` discriminant and a catalog `code`; the domain
 * and `isExpected` flag are read from {@link ERROR_CATALOG} so they can never
 * drift from the catalog.
 */
export abstract class ArmoryError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;

  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    Error.captureStackTrace?.(this, new.target);
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

export function isArmoryError(error: unknown): error is ArmoryError {
  return error instanceof ArmoryError;
}
