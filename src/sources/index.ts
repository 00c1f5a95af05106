/**
 * Source adapters for local directory trees
 */
export { DirectorySource } from "./directory";
export { readSourceFile, classifyReadError } from "./reader";
export type {
  DiscoveredEntry,
  ReadOutcome,
  SkipReason,
  SkippedEntry,
  Source,
  SourceFile,
  SourceOptions,
} from "./types";
