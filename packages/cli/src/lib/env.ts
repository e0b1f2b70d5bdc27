/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the site root directory
 * Priority: CLI option > DAYBOOK_ROOT env var > current directory
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.DAYBOOK_ROOT ?? ".";
  return path.resolve(expandTilde(root));
}

