import { ConstraintParseError } from "@armory/errors";
import { describe, expect, it } from "vitest";
import {
  ANY_VERSION,
  intersectConstraints,
  isSatisfiable,
  isValidConstraint,
  isValidVersion,
  maxSatisfying,
  parseConstraint,
  satisfies,
} from "../../constraint.js";

describe("isValidVersion", () => {
  it("accepts MAJOR.MINOR.PATCH", () => {
    expect(isValidVersion("1.0.0")).toBe(true);
    expect(isValidVersion("10.20.30")).toBe(true);
  });

  it("accepts a prerelease suffix", () => {
    expect(isValidVersion("1.0.0-beta.1")).toBe(true);
  });

  it("rejects partial, prefixed, and build-tagged versions", () => {
    expect(isValidVersion("1.0")).toBe(false);
    expect(isValidVersion("v1.0.0")).toBe(false);
    expect(isValidVersion("1.0.0+build.5")).toBe(false);
    expect(isValidVersion("01.0.0")).toBe(false);
    expect(isValidVersion("")).toBe(false);
  });
});

describe("parseConstraint", () => {
  it("treats empty and * as unconstrained", () => {
    expect(parseConstraint("")).toBe(ANY_VERSION);
    expect(parseConstraint("  *  ")).toBe(ANY_VERSION);
  });

  it("maps == to semver's exact operator", () => {
    expect(parseConstraint("==1.4.2")).toEqual({ raw: "==1.4.2", range: "=1.4.2" });
  });

  it("parses each supported operator", () => {
    for (const text of ["=1.0.0", ">=1.0.0", "<=1.0.0", ">1.0.0", "<1.0.0", "^1.2.0", "~1.2.0", "1.2.3"]) {
      expect(parseConstraint(text).range).toBe(text);
    }
  });

  it("parses a space-separated conjunction", () => {
    expect(parseConstraint(">=1.0.0   <2.0.0")).toEqual({
      raw: ">=1.0.0 <2.0.0",
      range: ">=1.0.0 <2.0.0",
    });
  });

  it("re-attaches an operator separated from its version", () => {
    expect(parseConstraint(">= 1.0.0").range).toBe(">=1.0.0");
  });

  it("rejects disjunctions", () => {
    expect(() => parseConstraint("^1.0.0 || ^2.0.0")).toThrow(ConstraintParseError);
  });

  it("rejects unknown operators and malformed versions", () => {
    expect(() => parseConstraint("!=1.0.0")).toThrow(ConstraintParseError);
    expect(() => parseConstraint(">=one")).toThrow(ConstraintParseError);
    expect(() => parseConstraint("1.0.0 - 2.0.0")).toThrow(ConstraintParseError);
  });

  it("reports the offending comparator", () => {
    try {
      parseConstraint(">=1.0.0 ~>2.0");
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConstraintParseError);
      if (error instanceof ConstraintParseError) {
        expect(error.constraint).toBe(">=1.0.0 ~>2.0");
        expect(error.reason).toBe("unrecognized comparator '~>2.0'");
      }
    }
  });
});

describe("isValidConstraint", () => {
  it("mirrors parseConstraint without throwing", () => {
    expect(isValidConstraint("^1.0.0")).toBe(true);
    expect(isValidConstraint("latest")).toBe(false);
  });
});

describe("intersectConstraints", () => {
  it("returns the other side when one side is unconstrained", () => {
    const caret = parseConstraint("^1.0.0");
    expect(intersectConstraints(ANY_VERSION, caret)).toBe(caret);
    expect(intersectConstraints(caret, ANY_VERSION)).toBe(caret);
  });

  it("does not duplicate identical constraints", () => {
    const a = parseConstraint(">=1.0.0");
    expect(intersectConstraints(a, parseConstraint(">=1.0.0"))).toBe(a);
  });

  it("joins constraints into a conjunction", () => {
    const combined = intersectConstraints(parseConstraint(">=1.2.0"), parseConstraint("^1.0.0"));
    expect(combined.raw).toBe(">=1.2.0 ^1.0.0");
    expect(satisfies("1.5.0", combined)).toBe(true);
    expect(satisfies("1.1.0", combined)).toBe(false);
    expect(satisfies("2.0.0", combined)).toBe(false);
  });
});

describe("isSatisfiable", () => {
  it("is true for overlapping ranges", () => {
    expect(isSatisfiable(intersectConstraints(parseConstraint(">=1.0.0"), parseConstraint("<2.0.0")))).toBe(
      true,
    );
  });

  it("is false for disjoint ranges", () => {
    expect(isSatisfiable(intersectConstraints(parseConstraint(">=2.0.0"), parseConstraint("<2.0.0")))).toBe(
      false,
    );
    expect(isSatisfiable(intersectConstraints(parseConstraint("^1.0.0"), parseConstraint("^2.0.0")))).toBe(
      false,
    );
  });
});

describe("maxSatisfying", () => {
  it("picks the highest matching version", () => {
    expect(maxSatisfying(["1.0.0", "1.4.0", "2.0.0"], parseConstraint("^1.0.0"))).toBe("1.4.0");
  });

  it("returns undefined when nothing matches", () => {
    expect(maxSatisfying(["1.0.0"], parseConstraint(">=3.0.0"))).toBeUndefined();
  });
});
