import os from "node:os";
import { describe, expect, it } from "vitest";
import { decode, decodeBytes, tryDecode } from "../decoder";

const bytes = (...values: number[]) => Uint8Array.from(values);

describe("decodeBytes", () => {
  it("returns an empty string for empty input", () => {
    expect(decodeBytes(new Uint8Array(0))).toEqual({ text: "", encoding: "utf-8", lossy: false });
    expect(decode(new Uint8Array(0))).toBe("");
  });

  it("prefers UTF-8 and keeps wide characters intact", () => {
    const text = "第一章 héllo";
    const result = decodeBytes(new TextEncoder().encode(text));
    expect(result).toEqual({ text, encoding: "utf-8", lossy: false });
  });

  it("strips a UTF-8 byte-order mark", () => {
    expect(decode(bytes(0xef, 0xbb, 0xbf, 0x68, 0x69))).toBe("hi");
  });

  it("decodes UTF-16LE bytes that are not valid UTF-8", () => {
    // "café": the 0xE9 0x00 pair is not a valid UTF-8 sequence.
    const result = decodeBytes(bytes(0x63, 0x00, 0x61, 0x00, 0x66, 0x00, 0xe9, 0x00));
    expect(result.text).toBe("café");
    expect(result.lossy).toBe(false);
    expect(["utf-16", "utf-16le"]).toContain(result.encoding);
  });

  it("follows a big-endian byte-order mark", () => {
    const result = decodeBytes(bytes(0xfe, 0xff, 0x00, 0x63, 0x00, 0x61, 0x00, 0x66, 0x00, 0xe9));
    expect(result).toEqual({ text: "café", encoding: "utf-16", lossy: false });
  });

  it.runIf(os.endianness() === "LE")(
    "accepts a wrong-endian decode without flagging it",
    () => {
      // Big-endian "café" with no BOM decodes "successfully" as host-order UTF-16.
      const result = decodeBytes(bytes(0x00, 0x63, 0x00, 0x61, 0x00, 0x66, 0x00, 0xe9));
      expect(result.encoding).toBe("utf-16");
      expect(result.lossy).toBe(false);
      expect(result.text).toBe("\u6300\u6100\u6600\ue900");
    },
  );

  it("falls back to lossy UTF-8 when every candidate fails", () => {
    // Odd length rules out UTF-16; 0xFF rules out UTF-8 and ASCII.
    const result = decodeBytes(bytes(0x61, 0xff, 0x62));
    expect(result).toEqual({ text: "a\ufffdb", encoding: null, lossy: true });
  });
});

describe("tryDecode", () => {
  it("accepts only 7-bit bytes as ASCII", () => {
    expect(tryDecode(bytes(0x41, 0x42), "ascii")).toBe("AB");
    expect(tryDecode(bytes(0x41, 0x80), "ascii")).toBeNull();
  });

  it("rejects odd byte counts for UTF-16", () => {
    expect(tryDecode(bytes(0x61, 0x00, 0x62), "utf-16le")).toBeNull();
    expect(tryDecode(bytes(0x00, 0x61, 0x00), "utf-16be")).toBeNull();
    expect(tryDecode(bytes(0x61, 0x00, 0x62), "utf-16")).toBeNull();
  });

  it("rejects malformed UTF-8", () => {
    expect(tryDecode(bytes(0xc3), "utf-8")).toBeNull();
  });
});
