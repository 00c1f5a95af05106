/**
 * Read one discovered entry into a tagged outcome
 */
import { readFileSync, statSync } from "fs";
import type { TextCodec } from "../encoding";
import { isErrnoException } from "../errors";
import type { DiscoveredEntry, ReadOutcome, SkipReason } from "./types";

/**
 * Map a filesystem error to a skip reason. Undefined means the error is not
 * a per-file condition and should propagate.
 */
export function classifyReadError(err: unknown): SkipReason | undefined {
  if (!isErrnoException(err)) return undefined;

  switch (err.code) {
    case "EACCES":
    case "EPERM":
      return "permission-denied";
    case "EISDIR":
    case "ENOENT":
    case "ENOTDIR":
    case "ELOOP":
      return "not-a-file";
    default:
      return undefined;
  }
}

export function readSourceFile(
  entry: DiscoveredEntry,
  codec: TextCodec,
): ReadOutcome {
  let bytes: Buffer;
  try {
    // Follows links; FIFOs and sockets would block or fail on read
    if (!statSync(entry.path).isFile()) {
      return { kind: "skip", entry, reason: "not-a-file" };
    }
    bytes = readFileSync(entry.path);
  } catch (err) {
    const reason = classifyReadError(err);
    if (!reason) throw err;
    return { kind: "skip", entry, reason };
  }

  const content = codec.decode(bytes);
  if (content === null) {
    return { kind: "skip", entry, reason: "decode-error" };
  }

  return {
    kind: "ok",
    file: { ...entry, content, size: bytes.length },
  };
}
