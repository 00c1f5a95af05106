/**
 * Utility functions
 */

/**
 * Check if running in a pipe (not interactive terminal)
 */
export function isPiped(): boolean {
  return !process.stdout.isTTY;
}

/**
 * Compare two names by UTF-16 code units, independent of locale
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Human readable byte size
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
