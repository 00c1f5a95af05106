/**
 * Error types surfaced by the bundler
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The output file could not be created or truncated. Fatal: nothing is scanned.
 */
export class OutputOpenError extends Error {
  constructor(
    public readonly outputPath: string,
    cause: unknown,
  ) {
    super(
      `Cannot open output file ${outputPath}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = "OutputOpenError";
  }
}

export class EncodeError extends Error {
  constructor(
    message: string,
    public readonly encoding: string,
  ) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
