/**
 * Synchronous writer that owns the output file descriptor for one run
 */
import { closeSync, fstatSync, openSync, statSync, writeSync, type Stats } from "fs";
import type { TextCodec } from "./encoding";
import { isErrnoException, OutputOpenError } from "./errors";
import { formatSection } from "./format";

export class BundleWriter {
  readonly outputPath: string;
  private codec: TextCodec;
  private fd: number | null;
  private identity: { dev: number; ino: number };
  private written = 0;

  private constructor(
    outputPath: string,
    codec: TextCodec,
    fd: number,
    identity: Stats,
  ) {
    this.outputPath = outputPath;
    this.codec = codec;
    this.fd = fd;
    this.identity = { dev: identity.dev, ino: identity.ino };
  }

  /**
   * Create or truncate the output file
   */
  static open(outputPath: string, codec: TextCodec): BundleWriter {
    let fd: number;
    try {
      fd = openSync(outputPath, "w");
    } catch (err) {
      throw new OutputOpenError(outputPath, err);
    }

    let stats: Stats;
    try {
      stats = fstatSync(fd);
    } catch (err) {
      closeSync(fd);
      throw new OutputOpenError(outputPath, err);
    }
    return new BundleWriter(outputPath, codec, fd, stats);
  }

  /**
   * Whether `path` is the output file itself, through any symlink or hard link
   */
  isOutput(path: string): boolean {
    let stats: Stats;
    try {
      stats = statSync(path);
    } catch (err) {
      // Unstattable entries are classified by the reader
      if (isErrnoException(err)) return false;
      throw err;
    }
    return stats.dev === this.identity.dev && stats.ino === this.identity.ino;
  }

  /** Bytes written so far */
  get bytes(): number {
    return this.written;
  }

  get closed(): boolean {
    return this.fd === null;
  }

  /**
   * Encode the whole section before touching the file, so an encode
   * failure never leaves half a section behind.
   */
  writeSection(name: string, content: string): Buffer {
    const data = this.codec.encode(formatSection(name, content));
    this.writeBytes(data);
    return data;
  }

  private writeBytes(data: Buffer): void {
    if (this.fd === null) {
      throw new Error(`Output ${this.outputPath} is already closed`);
    }
    let offset = 0;
    while (offset < data.length) {
      offset += writeSync(this.fd, data, offset, data.length - offset);
    }
    this.written += data.length;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
