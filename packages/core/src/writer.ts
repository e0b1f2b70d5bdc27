/**
 * Output stage: render published documents and write them under the
 * destination directory
 */

import * as path from "node:path";
import { atomicWrite } from "./io.js";
import { mapPool } from "./pool.js";
import { permalinkToFilePath } from "./permalink.js";
import { OutputWriteError } from "./errors.js";
import type { Renderer } from "./renderer.js";
import type { BuildResult, RenderedPage } from "./types.js";

/**
 * Render every published document, in chronological order
 */
export function renderSite(result: BuildResult, renderer: Renderer): RenderedPage[] {
  return result.index.chronological.map((document) => ({
    documentId: document.id,
    permalink: document.permalink,
    html: renderer.render(document, result.index),
  }));
}

/**
 * Output path for a permalink
 *
 * @throws {OutputWriteError} if the permalink escapes the destination
 */
export function outputPath(destination: string, permalink: string): string {
  const root = path.resolve(destination);
  const target = path.resolve(root, permalinkToFilePath(permalink));
  const relative = path.relative(root, target);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new OutputWriteError(target);
  }
  return target;
}

/**
 * Write pages atomically; returns the written paths in page order
 */
export async function writeSite(
  pages: readonly RenderedPage[],
  destination: string,
  concurrency = 16
): Promise<string[]> {
  const targets = pages.map((page) => outputPath(destination, page.permalink));
  return mapPool(pages, concurrency, async (page, i) => {
    const target = targets[i];
    await atomicWrite(target, page.html);
    return target;
  });
}
