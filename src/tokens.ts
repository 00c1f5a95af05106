/**
 * Token estimates for the bundle, using tiktoken's cl100k_base
 */
import { getEncoding, type Tiktoken } from "js-tiktoken";

let encoder: Tiktoken | null = null;

// Loading the BPE ranks is slow; only pay for it when a count is requested
function getEncoder(): Tiktoken {
  if (!encoder) {
    encoder = getEncoding("cl100k_base");
  }
  return encoder;
}

/**
 * Count tokens in a string. Special-token text is counted as ordinary text
 * since bundled sources may legitimately contain it.
 */
export function countTokens(text: string): number {
  if (text.length === 0) return 0;
  return getEncoder().encode(text, "all").length;
}

/**
 * Parse a budget like "50k", "1.5m" or "12,000" into a token count
 */
export function parseBudget(budget: string): number {
  const match = budget.replace(/[,_]/g, "").match(/^(\d+(?:\.\d+)?)(k|m)?$/i);
  if (!match) {
    throw new Error(
      `Invalid budget format: ${budget}. Use formats like 50k, 100k, 1m`,
    );
  }

  const [, num, suffix] = match;
  const multiplier =
    suffix?.toLowerCase() === "k" ? 1_000 : suffix?.toLowerCase() === "m" ? 1_000_000 : 1;

  return Math.floor(parseFloat(num) * multiplier);
}
