/**
 * Source scanner
 *
 * Enumerates the posts directory and derives each document's identity from
 * its filename (`YYYY-MM-DD-slug.ext`).
 *
 * Invariants:
 * - Every candidate file yields exactly one entry: a file or an error
 * - Entries are produced in sorted filename order
 * - At most one file per (date, slug); the first in sorted order wins
 * - Iterating again re-reads the directory; no state is kept between passes
 */

import { join } from "node:path";
import { listFiles } from "./io.js";
import { DaybookError, DuplicateSlugError, InvalidFilenameError } from "./errors.js";
import type { PostDate, SourceFile } from "./types.js";

const FILENAME_RE = /^(\d{4})-(\d{2})-(\d{2})-(.+)\.([A-Za-z0-9]+)$/;

export type ScanEntry =
  | { kind: "file"; file: SourceFile }
  | { kind: "error"; fileName: string; error: DaybookError };

export interface ParsedFilename {
  date: PostDate;
  slug: string;
  ext: string;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Build a PostDate, or return null when the parts do not form a calendar date
 */
export function toPostDate(year: number, month: number, day: number): PostDate | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  if (day > daysInMonth(year, month)) {
    return null;
  }
  return { year, month, day, iso: `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` };
}

/**
 * Parse `YYYY-MM-DD` into a PostDate
 * @returns null if the text is not a valid calendar date
 */
export function parseIsoDate(value: string): PostDate | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  return toPostDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Extract date, slug and extension from a post filename
 * @throws {InvalidFilenameError} if the name does not follow the convention
 */
export function parseFilename(fileName: string): ParsedFilename {
  const match = FILENAME_RE.exec(fileName);
  if (!match) {
    throw new InvalidFilenameError(fileName, "expected YYYY-MM-DD-slug.ext");
  }

  const [, year, month, day, slug, ext] = match;
  const date = toPostDate(Number(year), Number(month), Number(day));
  if (!date) {
    throw new InvalidFilenameError(fileName, `${year}-${month}-${day} is not a calendar date`);
  }

  if (slug.trim() !== slug || /[\\/]/.test(slug)) {
    throw new InvalidFilenameError(fileName, `slug "${slug}" contains illegal characters`);
  }

  return { date, slug, ext };
}

/**
 * Create a lazy, restartable scan of a posts directory
 *
 * Each `for await` lists the directory afresh, so rescanning after the
 * files change is always safe.
 *
 * @param dir - Absolute path to the posts directory
 */
export function scanSources(dir: string): AsyncIterable<ScanEntry> {
  return {
    async *[Symbol.asyncIterator]() {
      const names = await listFiles(dir);
      const seen = new Map<string, string>();

      for (const fileName of names) {
        let parsed: ParsedFilename;
        try {
          parsed = parseFilename(fileName);
        } catch (err) {
          if (err instanceof DaybookError) {
            yield { kind: "error", fileName, error: err };
            continue;
          }
          throw err;
        }

        const id = `${parsed.date.iso}-${parsed.slug}`;
        const existing = seen.get(id);
        if (existing !== undefined) {
          yield { kind: "error", fileName, error: new DuplicateSlugError(fileName, existing) };
          continue;
        }
        seen.set(id, fileName);

        yield {
          kind: "file",
          file: { id, fileName, path: join(dir, fileName), ...parsed },
        };
      }
    },
  };
}

/**
 * Run a scan to completion, splitting files from failures
 */
export async function collectSources(
  dir: string
): Promise<{ files: SourceFile[]; failures: Array<{ fileName: string; error: DaybookError }> }> {
  const files: SourceFile[] = [];
  const failures: Array<{ fileName: string; error: DaybookError }> = [];

  for await (const entry of scanSources(dir)) {
    if (entry.kind === "file") {
      files.push(entry.file);
    } else {
      failures.push({ fileName: entry.fileName, error: entry.error });
    }
  }

  return { files, failures };
}
