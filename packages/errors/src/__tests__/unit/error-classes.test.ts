import { describe, expect, it } from "vitest";
import {
  ArmoryError,
  ConfigError,
  ConflictError,
  ConstraintParseError,
  CycleError,
  FileConflictError,
  InstallCancelledError,
  IOError,
  LedgerError,
  ManifestError,
  RegistryFetchError,
  ResolutionLimitError,
  SkippedDueToDependencyFailure,
  TemplateError,
} from "../../index.js";

describe("ArmoryError base class", () => {
  it("should derive name, domain and expectation from the class and catalog", () => {
    const error = new CycleError(["A", "B", "A"]);

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ArmoryError);
    expect(error.name).toBe("CycleError");
    expect(error._tag).toBe("CycleError");
    expect(error.code).toBe("RESOLUTION_CYCLE");
    expect(error.domain).toBe("resolution");
    expect(error.isExpected).toBe(true);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should serialize to JSON without a cause", () => {
    const error = new FileConflictError("/target/a.txt");
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "FileConflictError",
      name: "FileConflictError",
      code: "INSTALL_FILE_CONFLICT",
      message: "File already exists: /target/a.txt",
      domain: "install",
      metadata: { path: "/target/a.txt" },
    });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });

  it("should keep the cause", () => {
    const cause = new Error("EACCES");
    expect(new IOError("write", "/t/a.txt", cause).cause).toBe(cause);
  });
});

describe("manifest errors", () => {
  it("should format a single issue on one line", () => {
    const error = new ManifestError([{ field: "version", message: "Required" }], { componentName: "fmt" });
    expect(error.message).toBe("Invalid manifest for 'fmt': version: Required");
    expect(error.field).toBe("version");
  });

  it("should list several issues", () => {
    const error = new ManifestError([
      { field: "name", message: "Required" },
      { field: "files[0].dest", message: "Must be relative" },
    ]);
    expect(error.message).toBe("Invalid manifest:\n  - name: Required\n  - files[0].dest: Must be relative");
    expect(error.field).toBe("name");
    expect(error.componentName).toBeUndefined();
  });

  it("should name the constraint that failed to parse", () => {
    const error = new ConstraintParseError("^1 || ^2", "alternatives are not supported");
    expect(error.message).toBe("Invalid version constraint '^1 || ^2': alternatives are not supported");
  });
});

describe("resolution errors", () => {
  it("should pair requesters with their constraints", () => {
    const error = new ConflictError("lib", ["X", "Y"], [">=2.0.0", "<2.0.0"]);
    expect(error.message).toBe("No version of 'lib' satisfies all requesters: X requires '>=2.0.0', Y requires '<2.0.0'");
    expect(error.requesters).toEqual(["X", "Y"]);
  });

  it("should print the cycle path", () => {
    expect(new CycleError(["A", "B", "A"]).message).toBe("Dependency cycle detected: A -> B -> A");
  });

  it("should report the round limit", () => {
    expect(new ResolutionLimitError(5).message).toBe("Dependency resolution did not converge within 5 rounds");
  });
});

describe("registry errors", () => {
  it("should only retry unavailable sources", () => {
    expect(new RegistryFetchError("a", "^1.0.0", "unavailable").retryable).toBe(true);
    expect(new RegistryFetchError("a", "^1.0.0", "no-matching-version").retryable).toBe(false);
  });

  it("should append the detail", () => {
    const error = new RegistryFetchError("a", "^2.0.0", "no-matching-version", "available: 1.0.0");
    expect(error.message).toBe("Failed to fetch 'a@^2.0.0' (no-matching-version): available: 1.0.0");
  });
});

describe("template errors", () => {
  it("should list missing and undeclared variables", () => {
    const error = new TemplateError(["a", "b"], { undeclared: ["x"], file: "main.py" });
    expect(error.message).toBe(
      "Template rendering failed in main.py: missing variables: a, b; undeclared variable: x",
    );
    expect(error.missing).toEqual(["a", "b"]);
    expect(error.undeclared).toEqual(["x"]);
  });
});

describe("install errors", () => {
  it("should name the owner of a conflicting file", () => {
    const error = new FileConflictError("/t/a.txt", { name: "A", version: "1.0.0" });
    expect(error.message).toBe("File already exists: /t/a.txt (installed by A@1.0.0)");
  });

  it("should describe the failed operation", () => {
    const error = new IOError("rename", "/t/a.txt", new Error("EXDEV"));
    expect(error.message).toBe("Failed to rename /t/a.txt: EXDEV");
    expect(error.isExpected).toBe(false);
  });

  it("should name the dependency behind a skip", () => {
    const error = new SkippedDueToDependencyFailure("B", "A");
    expect(error.message).toBe("Skipped 'B': dependency 'A' did not install");
    expect(error.failedDependency).toBe("A");
  });

  it("should report cancellation", () => {
    expect(new InstallCancelledError("B").message).toBe("Install of 'B' was cancelled");
  });

  it("should include the ledger line", () => {
    expect(new LedgerError("/t/ledger.jsonl", "invalid JSON", 3).message).toBe(
      "Ledger /t/ledger.jsonl at line 3: invalid JSON",
    );
  });
});

describe("config errors", () => {
  it("should list every issue", () => {
    const error = new ConfigError("armory.json", ["concurrency: too big", "ledgerPath: Required"]);
    expect(error.message).toBe("Invalid configuration (armory.json):\n  - concurrency: too big\n  - ledgerPath: Required");
  });
});
