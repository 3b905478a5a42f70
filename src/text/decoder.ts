import os from "node:os";

/** Candidate encodings, in the order they are attempted. */
export const ENCODING_PRIORITY = ["utf-8", "utf-16", "utf-16le", "utf-16be", "ascii"] as const;

export type CandidateEncoding = (typeof ENCODING_PRIORITY)[number];

/**
 * Outcome of a decode attempt chain. `encoding` is the first candidate whose
 * decoder accepted the bytes, or null when every candidate rejected them and
 * the lossy UTF-8 fallback was used instead (`lossy` is then true).
 */
export interface DecodeResult {
  readonly text: string;
  readonly encoding: CandidateEncoding | null;
  readonly lossy: boolean;
}

/**
 * Try a single candidate in fatal mode.
 * @returns Decoded text, or null if the decoder rejected the byte sequence.
 */
export function tryDecode(bytes: Uint8Array, encoding: CandidateEncoding): string | null {
  switch (encoding) {
    case "utf-8":
    case "utf-16le":
    case "utf-16be":
      return fatalDecode(bytes, encoding);
    case "utf-16":
      return decodeNativeUtf16(bytes);
    case "ascii":
      return decodeAscii(bytes);
  }
}

/**
 * Decode raw file bytes by trying each candidate encoding in priority order.
 * A candidate "succeeds" when its decoder raises no fatal error; the result
 * may still be garbled text when the bytes were written in another encoding.
 */
export function decodeBytes(bytes: Uint8Array): DecodeResult {
  for (const encoding of ENCODING_PRIORITY) {
    const text = tryDecode(bytes, encoding);
    if (text !== null) return { text, encoding, lossy: false };
  }
  // Last resort: invalid sequences become U+FFFD instead of failing.
  const text = new TextDecoder("utf-8", { fatal: false }).decode(bytes);
  return { text, encoding: null, lossy: true };
}

/** Decode bytes to a string. Never throws. */
export function decode(bytes: Uint8Array): string {
  return decodeBytes(bytes).text;
}

function fatalDecode(bytes: Uint8Array, label: "utf-8" | "utf-16le" | "utf-16be"): string | null {
  // An odd byte count cannot be UTF-16, whatever the decoder would make of the tail.
  if (label !== "utf-8" && bytes.byteLength % 2 !== 0) return null;
  try {
    return new TextDecoder(label, { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

/**
 * UTF-16 in "native" form: a byte-order mark picks the byte order, otherwise
 * the host's own byte order is assumed.
 */
function decodeNativeUtf16(bytes: Uint8Array): string | null {
  if (bytes.byteLength >= 2) {
    if (bytes[0] === 0xff && bytes[1] === 0xfe) return fatalDecode(bytes, "utf-16le");
    if (bytes[0] === 0xfe && bytes[1] === 0xff) return fatalDecode(bytes, "utf-16be");
  }
  return fatalDecode(bytes, os.endianness() === "LE" ? "utf-16le" : "utf-16be");
}

function decodeAscii(bytes: Uint8Array): string | null {
  for (const b of bytes) {
    if (b > 0x7f) return null;
  }
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("ascii");
}
