/**
 * Source file type definitions
 */

/** A non-directory entry found while walking a root */
export interface DiscoveredEntry {
  /** Root directory the entry was found under */
  root: string;
  /** Path to the entry (root joined with relativePath) */
  path: string;
  /** Path relative to the root, forward slashes */
  relativePath: string;
  /** Base filename */
  name: string;
}

/** A read and decoded file, held only while its section is written */
export interface SourceFile extends DiscoveredEntry {
  /** Decoded file content */
  content: string;
  /** File size in bytes */
  size: number;
}

export type SkipReason =
  | "decode-error"
  | "permission-denied"
  | "not-a-file"
  | "output-file";

export interface SkippedEntry {
  entry: DiscoveredEntry;
  reason: SkipReason;
}

export type ReadOutcome =
  | { kind: "ok"; file: SourceFile }
  | ({ kind: "skip" } & SkippedEntry);

export interface SourceOptions {
  /** Gitignore-style patterns to exclude */
  excludes?: string[];
}

export interface Source {
  /** Root path of the source */
  readonly rootPath: string;

  /** Walk the root and yield every non-directory entry */
  discover(): Generator<DiscoveredEntry>;
}
