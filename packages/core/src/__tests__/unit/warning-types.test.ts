import { afterEach, describe, expect, it, vi } from "vitest";
import { type ArmoryWarning, resolveWarningHandler } from "../../warning-types.js";

const warning: ArmoryWarning = { code: "REQUIREMENT_WITHDRAWN", message: "lib moved from 1.0.0 to 2.0.0" };

describe("resolveWarningHandler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return the given handler", () => {
    const handler = vi.fn();
    resolveWarningHandler("armory:test", handler)(warning);
    expect(handler).toHaveBeenCalledWith(warning);
  });

  it("should fall back to console.warn with the tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    resolveWarningHandler("armory:test")(warning);
    expect(warn).toHaveBeenCalledWith("[armory:test] lib moved from 1.0.0 to 2.0.0");
  });
});
