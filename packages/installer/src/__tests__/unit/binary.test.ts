import { describe, expect, it } from "vitest";
import { BINARY_SNIFF_BYTES, decodeText } from "../../binary.js";

const encoder = new TextEncoder();

describe("decodeText", () => {
  it("decodes UTF-8 text", () => {
    expect(decodeText(encoder.encode("héllo {{name}}"))).toBe("héllo {{name}}");
  });

  it("treats a NUL byte in the first 8 KiB as binary", () => {
    expect(decodeText(new Uint8Array([0x61, 0x00, 0x62]))).toBeUndefined();
  });

  it("ignores a NUL byte past the sniffed prefix", () => {
    const bytes = new Uint8Array(BINARY_SNIFF_BYTES + 1).fill(0x61);
    bytes[BINARY_SNIFF_BYTES] = 0;
    expect(decodeText(bytes)).toBe(`${"a".repeat(BINARY_SNIFF_BYTES)}\u0000`);
  });

  it("treats invalid UTF-8 as binary", () => {
    expect(decodeText(new Uint8Array([0xc3, 0x28]))).toBeUndefined();
  });
});
