/** Bytes scanned for a NUL byte when deciding whether a file is binary */
export const BINARY_SNIFF_BYTES = 8192;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes `bytes` as template text, or returns undefined when the file must
 * be copied verbatim: a NUL byte in the first 8 KiB, or invalid UTF-8.
 */
export function decodeText(bytes: Uint8Array): string | undefined {
  if (bytes.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
    return undefined;
  }
  try {
    return utf8.decode(bytes);
  } catch {
    return undefined;
  }
}
