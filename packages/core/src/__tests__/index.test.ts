import { describe, expect, it } from "vitest";
import { COMPONENT_TYPES, componentId, PACKAGE_NAME } from "../index.js";

describe("@armory/core", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@armory/core");
  });

  it("should list the component types", () => {
    expect(COMPONENT_TYPES).toEqual(["agent", "tool", "prompt_template"]);
  });

  it("should format component ids", () => {
    expect(componentId({ name: "fmt", version: "1.2.0" })).toBe("fmt@1.2.0");
  });
});
