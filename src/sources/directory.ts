/**
 * Local directory source: deterministic recursive walk
 */
import ignore, { type Ignore } from "ignore";
import { readdirSync, type Dirent } from "fs";
import { join } from "path";
import { compareNames } from "../utils";
import type { DiscoveredEntry, Source, SourceOptions } from "./types";

export class DirectorySource implements Source {
  readonly rootPath: string;
  private excludes: Ignore | null;

  constructor(rootPath: string, options: SourceOptions = {}) {
    this.rootPath = rootPath;
    const patterns = options.excludes || [];
    this.excludes = patterns.length > 0 ? ignore().add(patterns) : null;
  }

  private isExcluded(relativePath: string, isDirectory: boolean): boolean {
    if (!this.excludes) return false;
    return this.excludes.ignores(isDirectory ? `${relativePath}/` : relativePath);
  }

  /**
   * Yield entries top-down. Within a directory, names are visited in
   * code-unit order and files come before subdirectories.
   */
  *discover(): Generator<DiscoveredEntry> {
    yield* this.walk(this.rootPath, "");
  }

  private *walk(
    absoluteDir: string,
    relativeDir: string,
  ): Generator<DiscoveredEntry> {
    let entries: Dirent[];
    try {
      entries = readdirSync(absoluteDir, { withFileTypes: true });
    } catch {
      // Missing, non-directory or unlistable: nothing to yield
      return;
    }

    entries.sort((a, b) => compareNames(a.name, b.name));

    const subdirs: Dirent[] = [];
    for (const entry of entries) {
      // Symlinks report isDirectory() false, so they are never descended into
      if (entry.isDirectory()) {
        subdirs.push(entry);
        continue;
      }

      const relativePath = relativeDir
        ? `${relativeDir}/${entry.name}`
        : entry.name;
      if (this.isExcluded(relativePath, false)) continue;

      yield {
        root: this.rootPath,
        path: join(absoluteDir, entry.name),
        relativePath,
        name: entry.name,
      };
    }

    for (const dir of subdirs) {
      const childRelative = relativeDir ? `${relativeDir}/${dir.name}` : dir.name;
      if (this.isExcluded(childRelative, true)) continue;
      yield* this.walk(join(absoluteDir, dir.name), childRelative);
    }
  }
}
