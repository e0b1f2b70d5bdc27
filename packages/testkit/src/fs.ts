/**
 * File system test utilities
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "daybook-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempSiteRoot(prefix = "daybook-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write files relative to a root; keys are relative paths
 */
export async function writeFiles(root: string, files: Readonly<Record<string, string>>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = join(root, relative);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf8");
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempSiteRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a temp site root whose `_posts` directory holds
 * the given posts (file name → content)
 */
export async function withTempSite<T>(
  posts: Readonly<Record<string, string>>,
  fn: (root: string) => Promise<T>,
  extra: Readonly<Record<string, string>> = {}
): Promise<T> {
  return withTempDir(async (root) => {
    const prefixed = Object.fromEntries(
      Object.entries(posts).map(([name, content]) => [join("_posts", name), content])
    );
    await mkdir(join(root, "_posts"), { recursive: true });
    await writeFiles(root, { ...prefixed, ...extra });
    return fn(root);
  });
}
