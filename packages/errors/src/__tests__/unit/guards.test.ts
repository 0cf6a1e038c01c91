import { describe, expect, it } from "vitest";
import {
  CycleError,
  FileConflictError,
  getErrnoCode,
  getErrorMessage,
  hasCode,
  InternalError,
  isArmoryError,
  isExpectedError,
  isInstallError,
  isManifestDomainError,
  isResolutionError,
  ManifestError,
  wrapError,
} from "../../index.js";

describe("family guards", () => {
  it("should match errors by family", () => {
    const cycle = new CycleError(["A", "A"]);
    const conflict = new FileConflictError("/t/a");
    const manifest = new ManifestError([{ field: "name", message: "Required" }]);

    expect(isResolutionError(cycle)).toBe(true);
    expect(isInstallError(cycle)).toBe(false);
    expect(isInstallError(conflict)).toBe(true);
    expect(isManifestDomainError(manifest)).toBe(true);
    expect(isArmoryError(new Error("plain"))).toBe(false);
  });

  it("should narrow by code", () => {
    const error = new CycleError(["A", "A"]);
    expect(hasCode(error, "RESOLUTION_CYCLE")).toBe(true);
    expect(hasCode(error, "RESOLUTION_CONFLICT")).toBe(false);
  });

  it("should only treat catalog-expected errors as expected", () => {
    expect(isExpectedError(new FileConflictError("/t/a"))).toBe(true);
    expect(isExpectedError(new InternalError("boom"))).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
  });
});

describe("wrapError", () => {
  it("should pass Armory errors through", () => {
    const error = new CycleError(["A", "A"]);
    expect(wrapError(error)).toBe(error);
  });

  it("should wrap foreign errors and keep the cause", () => {
    const cause = new TypeError("bad");
    const wrapped = wrapError(cause);
    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("bad");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.cause).toBe(cause);
  });

  it("should wrap strings and unknown values", () => {
    expect(wrapError("oops").message).toBe("oops");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });
});

describe("getErrorMessage / getErrnoCode", () => {
  it("should read messages from anything", () => {
    expect(getErrorMessage(new Error("m"))).toBe("m");
    expect(getErrorMessage("s")).toBe("s");
    expect(getErrorMessage(undefined)).toBe("An unknown error occurred");
  });

  it("should read Node errno codes", () => {
    const error = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(getErrnoCode(error)).toBe("ENOENT");
    expect(getErrnoCode(new Error("no code"))).toBeUndefined();
  });
});
