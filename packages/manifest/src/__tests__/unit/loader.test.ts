import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { ManifestError } from "@armory/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findManifestFile, loadManifest } from "../../loader.js";
import { VALID_FULL_JSON, VALID_MINIMAL_JSON, VALID_MINIMAL_YAML } from "../helpers/fixtures.js";

describe("loadManifest", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "armory-manifest-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("loads a JSON manifest from disk", async () => {
    const filePath = join(tmpDir, "component.json");
    await writeFile(filePath, VALID_MINIMAL_JSON, "utf-8");

    const manifest = await loadManifest(filePath);
    expect(manifest.name).toBe("echo-tool");
    expect(manifest.version).toBe("1.0.0");
  });

  it("loads a full manifest", async () => {
    const filePath = join(tmpDir, "component.json");
    await writeFile(filePath, VALID_FULL_JSON, "utf-8");

    const manifest = await loadManifest(filePath);
    expect(manifest.componentType).toBe("agent");
    expect(manifest.dependencies.length).toBeGreaterThan(0);
  });

  it("loads a YAML manifest", async () => {
    const filePath = join(tmpDir, "component.yaml");
    await writeFile(filePath, VALID_MINIMAL_YAML, "utf-8");

    const manifest = await loadManifest(filePath);
    expect(manifest.name).toBe("prompt-pack");
  });

  it("reports a missing file with its absolute path", async () => {
    const missing = join(tmpDir, "nope.json");
    try {
      await loadManifest(missing);
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestError);
      if (error instanceof ManifestError) {
        expect(error.field).toBe("manifest");
        expect(error.message).toContain(`file not found: ${resolve(missing)}`);
      }
    }
  });

  it("names the file in validation errors when the manifest has no name", async () => {
    const filePath = join(tmpDir, "component.json");
    await writeFile(filePath, JSON.stringify({ componentType: "tool", version: "1.0.0" }), "utf-8");

    try {
      await loadManifest(filePath);
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestError);
      if (error instanceof ManifestError) {
        expect(error.componentName).toBe(resolve(filePath));
        expect(error.field).toBe("name");
      }
    }
  });
});

describe("findManifestFile", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "armory-manifest-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("returns undefined for a directory without a manifest", async () => {
    expect(await findManifestFile(tmpDir)).toBeUndefined();
  });

  it("prefers component.json over component.yaml", async () => {
    await writeFile(join(tmpDir, "component.yaml"), VALID_MINIMAL_YAML, "utf-8");
    await writeFile(join(tmpDir, "component.json"), VALID_MINIMAL_JSON, "utf-8");
    expect(await findManifestFile(tmpDir)).toBe(join(tmpDir, "component.json"));
  });

  it("falls back to component.yml", async () => {
    await writeFile(join(tmpDir, "component.yml"), VALID_MINIMAL_YAML, "utf-8");
    expect(await findManifestFile(tmpDir)).toBe(join(tmpDir, "component.yml"));
  });

  it("ignores a directory named like a manifest", async () => {
    await mkdir(join(tmpDir, "component.json"));
    await writeFile(join(tmpDir, "component.yaml"), VALID_MINIMAL_YAML, "utf-8");
    expect(await findManifestFile(tmpDir)).toBe(join(tmpDir, "component.yaml"));
  });
});
