// Tests for cli.ts — runs the commander program in-process (stdout is not a TTY).

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createProgram } from "../cli";
import { INVALID_UTF8, makeTempDir, removeTempDir, writeTree } from "./helpers";

let tmp: string;
let logs: string[];
let errors: string[];

beforeEach(() => {
  tmp = makeTempDir();
  logs = [];
  errors = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    logs.push(args.join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    errors.push(args.join(" "));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  removeTempDir(tmp);
});

const runCli = (...args: string[]) =>
  createProgram().parse(["node", "dirbundle", ...args]);

describe("dirbundle CLI", () => {
  it("bundles the given roots into the output file", () => {
    writeTree(tmp, { "src/a.txt": "A", "shaders/b.glsl": "B" });
    const out = join(tmp, "bundle.txt");

    runCli(join(tmp, "src"), join(tmp, "shaders"), "-o", out);

    expect(readFileSync(out, "utf-8")).toBe("\n\n// a.txt\n\nA\n\n\n// b.glsl\n\nB\n");
    expect(logs).toHaveLength(3);
    expect(logs.slice(0, 2)).toEqual(["Discovering files...", "Found 2 files"]);
    expect(logs[2]).toContain(`✓ Combined output written to ${out}`);
    expect(logs.filter((line) => line.includes("Combined output written"))).toHaveLength(1);
  });

  it("lists skipped files with --verbose", () => {
    writeTree(tmp, { "src/a.txt": "A", "src/b.bin": INVALID_UTF8 });
    const out = join(tmp, "bundle.txt");

    runCli(join(tmp, "src"), "-o", out, "--verbose");

    expect(logs).toContainEqual(
      expect.stringContaining(`skip    ${join(tmp, "src", "b.bin")} (not valid text)`),
    );
  });

  it("warns when the bundle exceeds the token budget", () => {
    writeTree(tmp, { "src/a.txt": "one two three four five six seven eight nine ten" });
    const out = join(tmp, "bundle.txt");

    runCli(join(tmp, "src"), "-o", out, "--budget", "1");

    expect(logs).toContainEqual(expect.stringContaining("over the 1 budget"));
  });

  it("prints the error and exits 1 when the output cannot be opened", () => {
    const exit = vi.spyOn(process, "exit").mockImplementation((code): never => {
      throw new Error(`exit ${code}`);
    });
    const out = join(tmp, "missing", "bundle.txt");

    expect(() => runCli(tmp, "-o", out)).toThrow("exit 1");
    expect(exit).toHaveBeenCalledWith(1);
    expect(errors[0]).toContain(`Error: Cannot open output file ${out}:`);
  });

  it("exits 1 on an unsupported encoding", () => {
    vi.spyOn(process, "exit").mockImplementation((code): never => {
      throw new Error(`exit ${code}`);
    });

    expect(() => runCli(tmp, "-o", join(tmp, "o.txt"), "--encoding", "klingon")).toThrow(
      "exit 1",
    );
    expect(errors[0]).toContain('unsupported encoding "klingon"');
  });
});
