// Tests for encoding.ts — strict decoding and representable output.

import { describe, expect, it } from "vitest";

import { getCodec, normalizeEncoding } from "../encoding";
import { ConfigError } from "../errors";

const bytes = (...values: number[]) => Uint8Array.from(values);

describe("normalizeEncoding", () => {
  it("maps aliases to canonical names, ignoring case", () => {
    expect(normalizeEncoding("UTF8")).toBe("utf-8");
    expect(normalizeEncoding("utf16le")).toBe("utf-16le");
    expect(normalizeEncoding("ISO-8859-1")).toBe("latin1");
    expect(normalizeEncoding("us-ascii")).toBe("ascii");
  });

  it("returns undefined for unknown labels", () => {
    expect(normalizeEncoding("shift_jis")).toBeUndefined();
    expect(normalizeEncoding("constructor")).toBeUndefined();
  });
});

describe("getCodec", () => {
  it("throws on an unsupported encoding", () => {
    expect(() => getCodec("klingon")).toThrow(ConfigError);
  });

  describe("utf-8", () => {
    const codec = getCodec("utf-8");

    it("decodes valid multi-byte text", () => {
      expect(codec.decode(bytes(0x63, 0xc3, 0xa9))).toBe("cé");
    });

    it("rejects invalid sequences", () => {
      expect(codec.decode(bytes(0xc3, 0x28))).toBeNull();
      expect(codec.decode(bytes(0xff))).toBeNull();
    });

    it("rejects a truncated sequence at the end", () => {
      expect(codec.decode(bytes(0x61, 0xe2, 0x82))).toBeNull();
    });

    it("encodes to utf-8 bytes", () => {
      expect([...codec.encode("é")]).toEqual([0xc3, 0xa9]);
    });
  });

  describe("utf-16le", () => {
    const codec = getCodec("utf-16le");

    it("decodes little-endian code units", () => {
      expect(codec.decode(bytes(0x68, 0x00, 0x69, 0x00))).toBe("hi");
    });

    it("rejects an odd number of bytes", () => {
      expect(codec.decode(bytes(0x68, 0x00, 0x69))).toBeNull();
    });

    it("encodes to little-endian code units", () => {
      expect([...codec.encode("hi")]).toEqual([0x68, 0x00, 0x69, 0x00]);
    });
  });

  describe("latin1", () => {
    const codec = getCodec("latin1");

    it("decodes every byte", () => {
      expect(codec.decode(bytes(0x63, 0xe9, 0xff))).toBe("céÿ");
    });

    it("refuses characters outside the single-byte range", () => {
      expect(() => codec.encode("€")).toThrow(
        "Character U+20AC at offset 0 cannot be encoded as latin1",
      );
    });
  });

  describe("ascii", () => {
    const codec = getCodec("ascii");

    it("rejects bytes above 0x7f", () => {
      expect(codec.decode(bytes(0x61, 0x80))).toBeNull();
    });

    it("round trips plain ascii", () => {
      expect(codec.decode(codec.encode("plain text\n"))).toBe("plain text\n");
    });

    it("reports the offending offset when encoding", () => {
      expect(() => codec.encode("café")).toThrow(
        "Character U+00E9 at offset 3 cannot be encoded as ascii",
      );
    });
  });
});
