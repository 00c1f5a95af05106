/**
 * Strict text codecs for the supported encodings
 */
import { ConfigError, EncodeError } from "./errors";

export const SUPPORTED_ENCODINGS = ["utf-8", "utf-16le", "latin1", "ascii"] as const;

export type EncodingName = (typeof SUPPORTED_ENCODINGS)[number];

const ALIASES = new Map<string, EncodingName>([
  ["utf-8", "utf-8"],
  ["utf8", "utf-8"],
  ["utf-16le", "utf-16le"],
  ["utf16le", "utf-16le"],
  ["latin1", "latin1"],
  ["iso-8859-1", "latin1"],
  ["ascii", "ascii"],
  ["us-ascii", "ascii"],
]);

export interface TextCodec {
  readonly name: EncodingName;
  /** Decode the full byte content, or null when it is invalid under this encoding */
  decode(bytes: Uint8Array): string | null;
  encode(text: string): Buffer;
}

/**
 * Map a user-supplied encoding label to its canonical name
 */
export function normalizeEncoding(label: string): EncodingName | undefined {
  return ALIASES.get(label.trim().toLowerCase());
}

function strictDecoder(label: "utf-8" | "utf-16le") {
  // ignoreBOM keeps a leading byte-order mark as content
  const decoder = new TextDecoder(label, { fatal: true, ignoreBOM: true });
  return (bytes: Uint8Array): string | null => {
    try {
      return decoder.decode(bytes);
    } catch (err) {
      if (err instanceof TypeError) return null;
      throw err;
    }
  };
}

function firstCodeAbove(text: string, max: number): number {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > max) return i;
  }
  return -1;
}

function singleByteCodec(name: "latin1" | "ascii", max: number): TextCodec {
  return {
    name,
    decode(bytes) {
      for (const byte of bytes) {
        if (byte > max) return null;
      }
      return Buffer.from(bytes).toString("latin1");
    },
    encode(text) {
      const at = firstCodeAbove(text, max);
      if (at !== -1) {
        const char = text.codePointAt(at) ?? 0;
        throw new EncodeError(
          `Character U+${char.toString(16).toUpperCase().padStart(4, "0")} at offset ${at} cannot be encoded as ${name}`,
          name,
        );
      }
      return Buffer.from(text, "latin1");
    },
  };
}

/**
 * Get the codec for an encoding label. Throws ConfigError on an unsupported label.
 */
export function getCodec(label: string): TextCodec {
  const name = normalizeEncoding(label);

  switch (name) {
    case "utf-8":
      return {
        name,
        decode: strictDecoder("utf-8"),
        encode: (text) => Buffer.from(text, "utf8"),
      };
    case "utf-16le":
      return {
        name,
        decode: strictDecoder("utf-16le"),
        encode: (text) => Buffer.from(text, "utf16le"),
      };
    case "latin1":
      return singleByteCodec("latin1", 0xff);
    case "ascii":
      return singleByteCodec("ascii", 0x7f);
    default:
      throw new ConfigError(
        `Unsupported encoding: ${label}. Use one of ${SUPPORTED_ENCODINGS.join(", ")}`,
      );
  }
}
