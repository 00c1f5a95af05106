/**
 * Bundle configuration, validated with zod
 */
import { z } from "zod";
import { normalizeEncoding, SUPPORTED_ENCODINGS } from "./encoding";
import { ConfigError } from "./errors";

export const bundleConfigSchema = z.object({
  /** Directories to scan, in order; missing ones yield nothing */
  roots: z.array(z.string()),
  /** File to create or truncate */
  outputPath: z.string().min(1, "output path must not be empty"),
  /** Encoding for every read and for the output */
  encoding: z
    .string()
    .default("utf-8")
    .transform((label, ctx) => {
      const name = normalizeEncoding(label);
      if (!name) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unsupported encoding "${label}" (use one of ${SUPPORTED_ENCODINGS.join(", ")})`,
        });
        return z.NEVER;
      }
      return name;
    }),
  /** Gitignore-style patterns, relative to each root */
  excludes: z.array(z.string()).default([]),
  /** Estimate tokens for each written section */
  countTokens: z.boolean().default(false),
});

export type BundleConfig = z.infer<typeof bundleConfigSchema>;
export type BundleConfigInput = z.input<typeof bundleConfigSchema>;

// Reference invocation: bundle an engine's sources and shaders into one file
export const DEFAULT_CONFIG = {
  roots: ["src/engine", "src/shaders"],
  outputPath: "stone.zig",
  encoding: "utf-8",
} satisfies BundleConfigInput;

/**
 * Validate raw options into a BundleConfig, throwing ConfigError on failure
 */
export function parseConfig(input: BundleConfigInput): BundleConfig {
  const result = bundleConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}
