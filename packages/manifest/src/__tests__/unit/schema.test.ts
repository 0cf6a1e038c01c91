import { describe, expect, it } from "vitest";
import {
  ComponentNameSchema,
  isSafeRelativePath,
  KNOWN_MANIFEST_KEYS,
  ManifestSchema,
  normalizeDest,
} from "../../schema.js";

describe("isSafeRelativePath", () => {
  it.each(["a.txt", "dir/a.txt", "./dir/a.txt", "deep/er/file.py", "file..name.txt"])(
    "accepts %s",
    (path) => {
      expect(isSafeRelativePath(path)).toBe(true);
    },
  );

  it.each(["", "..", "../a", "a/../b", "a\\..\\b", "/abs", "\\abs", "C:/x", "a//b", "dir/", "a\0b"])(
    "rejects %j",
    (path) => {
      expect(isSafeRelativePath(path)).toBe(false);
    },
  );
});

describe("normalizeDest", () => {
  it("drops . segments and converts backslashes", () => {
    expect(normalizeDest("./a/./b.txt")).toBe("a/b.txt");
    expect(normalizeDest("a\\b.txt")).toBe("a/b.txt");
  });
});

describe("ComponentNameSchema", () => {
  it("accepts letters, digits, dots, underscores and dashes", () => {
    expect(ComponentNameSchema.safeParse("web_search-agent.v2").success).toBe(true);
    expect(ComponentNameSchema.safeParse("A").success).toBe(true);
  });

  it("rejects names starting with punctuation or containing spaces", () => {
    expect(ComponentNameSchema.safeParse("-agent").success).toBe(false);
    expect(ComponentNameSchema.safeParse("my agent").success).toBe(false);
  });
});

describe("ManifestSchema", () => {
  it("fills defaults for optional collections", () => {
    const result = ManifestSchema.parse({ name: "a", componentType: "agent", version: "1.0.0" });
    expect(result.files).toEqual([]);
    expect(result.templateDefaults).toEqual({});
    expect(result.description).toBe("");
  });

  it("strips unknown keys from its own output", () => {
    const result = ManifestSchema.parse({
      name: "a",
      componentType: "agent",
      version: "1.0.0",
      homepage: "x",
    });
    expect(result).not.toHaveProperty("homepage");
  });
});

describe("KNOWN_MANIFEST_KEYS", () => {
  it("lists every schema field", () => {
    expect([...KNOWN_MANIFEST_KEYS].sort()).toEqual(
      [
        "author",
        "componentType",
        "dependencies",
        "description",
        "environmentVariables",
        "files",
        "minLanguageVersion",
        "name",
        "postInstallMessage",
        "tags",
        "templateDefaults",
        "templateVariables",
        "version",
      ].sort(),
    );
  });
});
