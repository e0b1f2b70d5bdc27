/**
 * File I/O for sources and rendered pages
 *
 * Invariants:
 * - Writes are atomic: never observe partial page contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only
 * - Listings are sorted for deterministic builds
 *
 * Pattern: write → fsync → rename
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { SourceReadError, OutputWriteError, DirectoryError, ListFilesError } from "./errors.js";

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    // Temp file may not exist if open failed
    await fs.unlink(tmp).catch(() => undefined);

    throw new OutputWriteError(filePath, { cause: err });
  }
}

/**
 * Read a source file
 * @param filePath - File path to read
 * @returns File contents as UTF-8 string
 * @throws SourceReadError on any read failure
 */
export async function readSource(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new SourceReadError(filePath, { cause: err });
  }
}

/**
 * List regular files in a directory
 * @param dirPath - Directory path to list
 * @param options.includeHidden - Include dotfiles (default: false)
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(
  dirPath: string,
  options: { includeHidden?: boolean } = {}
): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    // Filter to files only, exclude symlinks
    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name);

    if (!options.includeHidden) {
      files = files.filter((name) => !name.startsWith("."));
    }

    // Return sorted list for determinism
    return files.sort();
  } catch (err) {
    // Return empty array if directory doesn't exist (simplifies callers)
    if (errorCode(err) === "ENOENT") {
      return [];
    }

    throw new ListFilesError(dirPath, { cause: err });
  }
}

/**
 * Extract the errno code from an unknown thrown value
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
