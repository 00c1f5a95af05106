/**
 * CLI interface for dirbundle
 */
import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { Presets, SingleBar } from "cli-progress";
import { Bundler, type BundleResult } from "./bundler";
import { DEFAULT_CONFIG } from "./config";
import type { SkipReason } from "./sources";
import { parseBudget } from "./tokens";
import { formatBytes, isPiped } from "./utils";
import { version } from "../package.json";

interface CliOptions {
  output: string;
  encoding: string;
  exclude?: string[];
  budget?: string;
  verbose?: boolean;
}

const SKIP_LABELS: Record<SkipReason, string> = {
  "decode-error": "not valid text",
  "permission-denied": "permission denied",
  "not-a-file": "not a readable file",
  "output-file": "output file",
};

function printSummary(result: BundleResult, budgetTokens: number | null) {
  console.log(
    chalk.dim("Files   ") +
      result.sections +
      chalk.dim(` (${formatBytes(result.bytes)})`),
  );
  if (result.skipped.length > 0) {
    console.log(chalk.dim("Skipped ") + result.skipped.length);
  }
  console.log(chalk.dim("Tokens  ") + result.tokens.toLocaleString());

  if (budgetTokens !== null) {
    const percentage = Math.round((result.tokens / budgetTokens) * 100);
    const barWidth = 20;
    const filled = Math.min(barWidth, Math.round((percentage / 100) * barWidth));
    const bar = "█".repeat(filled) + "░".repeat(barWidth - filled);
    console.log(
      chalk.dim("Budget  ") + chalk.yellow(`[${bar}]`) + " " + percentage + "%",
    );
  }
  console.log();
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("dirbundle")
    .description(
      "Concatenate every readable text file under a set of directories into one file",
    )
    .version(version)
    .argument(
      "[roots...]",
      `Directories to scan, in order (default: ${DEFAULT_CONFIG.roots.join(" ")})`,
    )
    .option("-o, --output <file>", "Output file", DEFAULT_CONFIG.outputPath)
    .option(
      "--encoding <encoding>",
      "Encoding for reading files and writing the output",
      DEFAULT_CONFIG.encoding,
    )
    .option("-e, --exclude <patterns...>", "Exclude patterns (gitignore syntax)")
    .option(
      "-b, --budget <budget>",
      "Warn when the bundle exceeds this token budget (e.g., 50k, 1m)",
    )
    .option("-v, --verbose", "List skipped files and why")
    .action((roots: string[], options: CliOptions) => {
      const isInteractive = !isPiped();

      let progressBar: SingleBar | null = null;
      let spinner: ReturnType<typeof ora> | null = null;

      const stopAll = () => {
        spinner?.stop();
        spinner = null;
        progressBar?.stop();
        progressBar = null;
      };

      const progress = (message: string) => {
        if (message.startsWith("Discovering") && isInteractive) {
          spinner = ora({
            text: "Discovering files...",
            spinner: "star",
            color: "yellow",
          }).start();
        } else if (message.startsWith("Found")) {
          spinner?.stop();
          spinner = null;
        }

        // The final confirmation is printed once, below
        if (!isInteractive && !message.startsWith("Combined")) {
          console.log(message);
        }
      };

      try {
        const budgetTokens = options.budget ? parseBudget(options.budget) : null;

        const bundler = new Bundler({
          roots: roots.length > 0 ? roots : DEFAULT_CONFIG.roots,
          outputPath: options.output,
          encoding: options.encoding,
          excludes: options.exclude,
          countTokens: isInteractive || budgetTokens !== null,
          onProgress: progress,
          onFile: (_outcome, index, total) => {
            if (!isInteractive) return;
            if (!progressBar) {
              progressBar = new SingleBar(
                {
                  format:
                    chalk.dim("Files   ") +
                    "{value}/{total} " +
                    chalk.yellow("[{bar}]") +
                    " {percentage}%",
                  barCompleteChar: "█",
                  barIncompleteChar: "░",
                  hideCursor: true,
                },
                Presets.legacy,
              );
              progressBar.start(total, 0);
            }
            progressBar.update(index + 1);
          },
        });

        const result = bundler.bundle();
        stopAll();

        if (isInteractive) {
          console.log();
          printSummary(result, budgetTokens);
        }

        if (options.verbose) {
          for (const { entry, reason } of result.skipped) {
            console.log(chalk.dim(`skip    ${entry.path} (${SKIP_LABELS[reason]})`));
          }
        }

        if (budgetTokens !== null && result.tokens > budgetTokens) {
          console.log(
            chalk.yellow(
              `! Bundle is ~${result.tokens.toLocaleString()} tokens, over the ${options.budget} budget`,
            ),
          );
        }

        console.log(chalk.green(`✓ Combined output written to ${result.outputPath}`));
      } catch (err) {
        stopAll();
        console.error(
          chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`),
        );
        process.exit(1);
      }
    });

  return program;
}

export function run(argv: string[] = process.argv) {
  createProgram().parse(argv);
}
