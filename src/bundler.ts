/**
 * Main bundler - walks the roots and writes one section per readable file
 */
import { parseConfig, type BundleConfig, type BundleConfigInput } from "./config";
import { getCodec } from "./encoding";
import {
  DirectorySource,
  readSourceFile,
  type DiscoveredEntry,
  type ReadOutcome,
  type SkippedEntry,
} from "./sources";
import { countTokens } from "./tokens";
import { BundleWriter } from "./writer";

export interface BundlerOptions extends BundleConfigInput {
  /** Progress callback */
  onProgress?: (message: string) => void;
  /** Called after each discovered entry has been written or skipped */
  onFile?: (outcome: ReadOutcome, index: number, total: number) => void;
}

export interface WrittenFile {
  /** Path to the file as discovered */
  path: string;
  /** Path relative to its root */
  relativePath: string;
  /** Name used in the marker line */
  name: string;
  /** Source size in bytes */
  size: number;
}

export interface BundleResult {
  /** Output file that was written */
  outputPath: string;
  /** Files written, in output order */
  files: WrittenFile[];
  /** Entries left out, with the reason */
  skipped: SkippedEntry[];
  /** Number of sections in the output */
  sections: number;
  /** Total bytes written */
  bytes: number;
  /** Estimated tokens (0 unless countTokens is set) */
  tokens: number;
}

export class Bundler {
  readonly config: BundleConfig;
  private progress: (message: string) => void;
  private onFile?: BundlerOptions["onFile"];

  constructor(options: BundlerOptions) {
    const { onProgress, onFile, ...config } = options;
    this.config = parseConfig(config);
    this.progress = onProgress || (() => {});
    this.onFile = onFile;
  }

  /**
   * Run once: open the output, walk every root in order, close the output.
   * Throws OutputOpenError before scanning if the output cannot be opened.
   */
  bundle(): BundleResult {
    const { roots, outputPath, encoding, excludes } = this.config;
    const codec = getCodec(encoding);
    const writer = BundleWriter.open(outputPath, codec);

    const files: WrittenFile[] = [];
    const skipped: SkippedEntry[] = [];
    let tokens = 0;

    try {
      this.progress("Discovering files...");
      const entries: DiscoveredEntry[] = [];
      for (const root of roots) {
        const source = new DirectorySource(root, { excludes });
        for (const entry of source.discover()) {
          entries.push(entry);
        }
      }
      this.progress(`Found ${entries.length} files`);

      entries.forEach((entry, index) => {
        const outcome: ReadOutcome =
          writer.isOutput(entry.path)
            ? { kind: "skip", entry, reason: "output-file" }
            : readSourceFile(entry, codec);

        if (outcome.kind === "ok") {
          const { file } = outcome;
          writer.writeSection(file.name, file.content);
          if (this.config.countTokens) {
            tokens += countTokens(file.content);
          }
          files.push({
            path: file.path,
            relativePath: file.relativePath,
            name: file.name,
            size: file.size,
          });
        } else {
          skipped.push({ entry: outcome.entry, reason: outcome.reason });
        }

        this.onFile?.(outcome, index, entries.length);
      });
    } finally {
      writer.close();
    }

    this.progress(`Combined output written to ${outputPath}`);

    return {
      outputPath,
      files,
      skipped,
      sections: files.length,
      bytes: writer.bytes,
      tokens,
    };
  }
}
