import { RegistryFetchError } from "@armory/errors";
import { describe, expect, it } from "vitest";
import { createManifest, InMemoryRegistryClient, PACKAGE_NAME } from "../index.js";

const decoder = new TextDecoder();

describe("@armory/test-utils", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@armory/test-utils");
  });
});

describe("createManifest", () => {
  it("builds a validated manifest from shorthand", () => {
    const manifest = createManifest({
      name: "a",
      dependencies: { b: "^1.0.0" },
      files: { "a.py": "agents/a.py" },
    });
    expect(manifest.version).toBe("1.0.0");
    expect(manifest.componentType).toBe("tool");
    expect(manifest.dependencies).toEqual([{ name: "b", versionConstraint: "^1.0.0" }]);
    expect(manifest.files).toEqual([{ src: "a.py", dest: "agents/a.py" }]);
    expect(Object.isFrozen(manifest)).toBe(true);
  });

  it("accepts a list of paths as files", () => {
    expect(createManifest({ name: "a", files: ["x.txt"] }).files).toEqual([{ src: "x.txt", dest: "x.txt" }]);
  });
});

describe("InMemoryRegistryClient", () => {
  it("serves the highest satisfying version", async () => {
    const registry = new InMemoryRegistryClient();
    registry.add({ name: "a", version: "1.0.0" });
    registry.add({ name: "a", version: "1.4.0" });
    registry.add({ name: "a", version: "2.0.0" });

    const manifest = await registry.fetchManifest("a", "^1.0.0");
    expect(manifest.version).toBe("1.4.0");
    expect(registry.calls).toEqual([{ method: "fetchManifest", name: "a", requested: "^1.0.0" }]);
  });

  it("fills bundle contents for declared files", async () => {
    const registry = new InMemoryRegistryClient();
    registry.add({ name: "a", files: ["x.txt", "y.txt"] }, { "y.txt": "custom" });

    const bundle = await registry.fetchBundle("a", "1.0.0");
    expect(decoder.decode(bundle.get("x.txt"))).toBe("x.txt contents");
    expect(decoder.decode(bundle.get("y.txt"))).toBe("custom");
  });

  it("distinguishes unknown components from unmatched constraints", async () => {
    const registry = new InMemoryRegistryClient();
    registry.add({ name: "a", version: "1.0.0" });

    await expect(registry.fetchManifest("zzz", "*")).rejects.toMatchObject({ reason: "not-found" });
    await expect(registry.fetchManifest("a", ">=2.0.0")).rejects.toMatchObject({
      reason: "no-matching-version",
    });
  });

  it("fails configured fetches", async () => {
    const registry = new InMemoryRegistryClient();
    registry.add({ name: "a" });
    registry.failWith("a", new RegistryFetchError("a", "*", "unavailable"));

    await expect(registry.fetchManifest("a", "*")).rejects.toBeInstanceOf(RegistryFetchError);
    registry.clearFailures();
    await expect(registry.fetchManifest("a", "*")).resolves.toMatchObject({ name: "a" });
  });
});
