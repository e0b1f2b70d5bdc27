/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a worker count (1-64)
 */
export function parseConcurrency(value: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("concurrency must be a positive integer");
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed < 1 || parsed > 64) {
    throw new InvalidArgumentError("concurrency must be between 1 and 64");
  }

  return parsed;
}

/**
 * Parse a comma-separated list, dropping blanks and duplicates
 */
export function parseList(value: string): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...new Set(items)];
}
