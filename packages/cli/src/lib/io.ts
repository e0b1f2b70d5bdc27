/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorCode } from "@daybook/core";
import { CliError } from "./errors.js";

/**
 * Create a file that must not exist yet
 * @throws {CliError} if the file is already there
 */
export async function writeNewFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  try {
    await fs.writeFile(filePath, content, { encoding: "utf8", flag: "wx" });
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      throw new CliError(`File already exists: ${filePath}`, { cause: err });
    }
    throw err;
  }
}

