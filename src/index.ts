/**
 * dirbundle - concatenate a directory tree into one labelled text file
 * Programmatic API
 */
import { Bundler, type BundleResult, type BundlerOptions } from "./bundler";

export { Bundler } from "./bundler";
export type { BundlerOptions, BundleResult, WrittenFile } from "./bundler";

export { BundleWriter } from "./writer";
export { formatSection, SECTION_PREFIX } from "./format";

export { DirectorySource, readSourceFile, classifyReadError } from "./sources";
export type {
  DiscoveredEntry,
  ReadOutcome,
  SkipReason,
  SkippedEntry,
  SourceFile,
  SourceOptions,
} from "./sources";

export { getCodec, normalizeEncoding, SUPPORTED_ENCODINGS } from "./encoding";
export type { EncodingName, TextCodec } from "./encoding";

export { DEFAULT_CONFIG, parseConfig, bundleConfigSchema } from "./config";
export type { BundleConfig, BundleConfigInput } from "./config";

export { ConfigError, EncodeError, OutputOpenError } from "./errors";

export { countTokens, parseBudget } from "./tokens";

/**
 * Quick helper: concatenate every readable text file under `roots` into
 * `outputPath`
 */
export function concatenate(
  roots: string[],
  outputPath: string,
  encoding: string = "utf-8",
  options?: Omit<BundlerOptions, "roots" | "outputPath" | "encoding">,
): BundleResult {
  const bundler = new Bundler({ ...options, roots, outputPath, encoding });
  return bundler.bundle();
}
