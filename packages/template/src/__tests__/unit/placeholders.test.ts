import { describe, expect, it } from "vitest";
import { extractPlaceholders, hasPlaceholders } from "../../placeholders.js";

describe("extractPlaceholders", () => {
  it("returns distinct names in first-appearance order", () => {
    expect(extractPlaceholders("{{ b }} {{a}} {{ b }} {{c}}")).toEqual(["b", "a", "c"]);
  });

  it("accepts inner whitespace including newlines and tabs", () => {
    expect(extractPlaceholders("{{\tname\n}}")).toEqual(["name"]);
  });

  it.each(["{{ 1abc }}", "{{ a-b }}", "{ x }", "{{}}", "{{ a b }}"])("ignores %j", (content) => {
    expect(extractPlaceholders(content)).toEqual([]);
  });

  it("finds placeholders inside surrounding braces", () => {
    expect(extractPlaceholders("{{{ x }}}")).toEqual(["x"]);
  });
});

describe("hasPlaceholders", () => {
  it("is stable across repeated calls", () => {
    expect(hasPlaceholders("class {{ name }}:")).toBe(true);
    expect(hasPlaceholders("class {{ name }}:")).toBe(true);
    expect(hasPlaceholders("plain")).toBe(false);
  });
});
