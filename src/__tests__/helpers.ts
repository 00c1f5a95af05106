// Shared fixtures: real temporary directory trees under os.tmpdir().

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "dirbundle-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write a tree of files; string values are UTF-8, Buffers are raw bytes. */
export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
}

export const INVALID_UTF8 = Buffer.from([0xc3, 0x28, 0xa0, 0xa1]);
