import { describe, expect, it } from "vitest";
import { normalizeManifest } from "../../normalize.js";

describe("normalizeManifest", () => {
  it("passes canonical documents through unchanged", () => {
    const doc = {
      name: "a",
      componentType: "tool",
      version: "1.0.0",
      files: [{ src: "a.txt", dest: "a.txt" }],
      dependencies: [{ name: "b", versionConstraint: "^1.0.0" }],
    };
    expect(normalizeManifest(doc)).toEqual(doc);
  });

  it("never mutates its input", () => {
    const doc = { type: "agent", files_to_copy: [{ source: "x", destination: "y" }] };
    const snapshot = JSON.parse(JSON.stringify(doc));
    normalizeManifest(doc);
    expect(doc).toEqual(snapshot);
  });

  it("renames legacy keys", () => {
    expect(
      normalizeManifest({
        type: "agent",
        mirascope_version_min: "0.1.0",
        post_install_notes: "hi",
        environment_variables: ["K"],
      }),
    ).toEqual({
      componentType: "agent",
      minLanguageVersion: "0.1.0",
      postInstallMessage: "hi",
      environmentVariables: ["K"],
    });
  });

  it("prefers the canonical key when both forms are present", () => {
    expect(normalizeManifest({ type: "agent", componentType: "tool" })).toEqual({
      componentType: "tool",
    });
  });

  it("expands string file entries", () => {
    expect(normalizeManifest({ files: ["prompt.txt"] })).toEqual({
      files: [{ src: "prompt.txt", dest: "prompt.txt" }],
    });
  });

  it("defaults a missing dest to the src", () => {
    expect(normalizeManifest({ files: [{ src: "a.txt" }] })).toEqual({
      files: [{ src: "a.txt", dest: "a.txt" }],
    });
  });

  it("parses name@constraint dependency strings", () => {
    expect(
      normalizeManifest({ registry_dependencies: ["base", "fmt@>=1.0.0 <2.0.0", "@scope/x@^1.0.0"] }),
    ).toEqual({
      dependencies: [
        { name: "base", versionConstraint: "*" },
        { name: "fmt", versionConstraint: ">=1.0.0 <2.0.0" },
        { name: "@scope/x", versionConstraint: "^1.0.0" },
      ],
    });
  });

  it("accepts version or constraint as the dependency range key", () => {
    expect(
      normalizeManifest({
        dependencies: [
          { name: "a", version: "^1.0.0" },
          { name: "b", constraint: "~2.1.0" },
          { name: "c" },
        ],
      }),
    ).toEqual({
      dependencies: [
        { name: "a", versionConstraint: "^1.0.0" },
        { name: "b", versionConstraint: "~2.1.0" },
        { name: "c", versionConstraint: "*" },
      ],
    });
  });

  it("lifts template variable defaults", () => {
    expect(
      normalizeManifest({
        templateVariables: ["plain", { name: "timeout", default: 30 }, { name: "flag", default: false }],
      }),
    ).toEqual({
      templateVariables: ["plain", "timeout", "flag"],
      templateDefaults: { timeout: "30", flag: "false" },
    });
  });

  it("lets explicit templateDefaults override lifted ones", () => {
    expect(
      normalizeManifest({
        templateVariables: [{ name: "timeout", default: "30" }],
        templateDefaults: { timeout: "60" },
      }),
    ).toEqual({
      templateVariables: ["timeout"],
      templateDefaults: { timeout: "60" },
    });
  });

  it("takes the first author's name", () => {
    expect(normalizeManifest({ authors: [{ name: "First" }, { name: "Second" }] })).toEqual({
      author: "First",
    });
    expect(normalizeManifest({ author: { name: "Solo" } })).toEqual({ author: "Solo" });
  });
});
