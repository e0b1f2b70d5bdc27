/**
 * Permalink patterns
 *
 * A pattern is a URL path with `:token` placeholders:
 *
 * | token         | value for 2012-01-08, slug `hello` |
 * | ------------- | ---------------------------------- |
 * | `:year`       | 2012                               |
 * | `:short_year` | 12                                 |
 * | `:month`      | 01                                 |
 * | `:i_month`    | 1                                  |
 * | `:day`        | 08                                 |
 * | `:i_day`      | 8                                  |
 * | `:slug`       | hello                              |
 * | `:title`      | hello                              |
 * | `:categories` | categories joined by `/`           |
 */

import { posix } from "node:path";
import type { PostDate } from "./types.js";

export const DEFAULT_PERMALINK = "/:year/:month/:day/:slug/";

const TOKEN_RE = /:(short_year|year|i_month|month|i_day|day|slug|title|categories)\b/g;

export interface PermalinkParts {
  date: PostDate;
  slug: string;
  categories?: readonly string[];
}

/**
 * Substitute a document's date, slug and categories into a pattern
 */
export function expandPermalink(pattern: string, parts: PermalinkParts): string {
  const { date, slug, categories = [] } = parts;
  const values: Record<string, string> = {
    year: String(date.year).padStart(4, "0"),
    short_year: String(date.year % 100).padStart(2, "0"),
    month: String(date.month).padStart(2, "0"),
    i_month: String(date.month),
    day: String(date.day).padStart(2, "0"),
    i_day: String(date.day),
    slug: encodeURIComponent(slug),
    title: encodeURIComponent(slug),
    categories: categories.map((c) => encodeURIComponent(c)).join("/"),
  };

  return normalizePermalink(pattern.replace(TOKEN_RE, (_match: string, token: string) => values[token]));
}

/**
 * Collapse duplicate slashes and force a leading slash
 */
export function normalizePermalink(permalink: string): string {
  const collapsed = permalink.trim().replace(/\/{2,}/g, "/");
  return collapsed.startsWith("/") ? collapsed : `/${collapsed}`;
}

/**
 * Output file path (relative, POSIX) for a permalink
 *
 * Permalinks ending in `/` map to an `index.html` inside that directory.
 */
export function permalinkToFilePath(permalink: string): string {
  const decoded = permalink
    .split("/")
    .map((segment) => safeDecode(segment))
    .join("/");
  const relative = decoded.replace(/^\/+/, "");
  if (relative === "" || relative.endsWith("/")) {
    return `${relative}index.html`;
  }
  return relative;
}

/**
 * Whether the permalink's output file stays inside the destination
 * (no `..` segment climbs above the site root, decoded or not)
 */
export function isContainedPermalink(permalink: string): boolean {
  const relative = posix.normalize(permalinkToFilePath(permalink));
  return relative !== ".." && !relative.startsWith("../") && !posix.isAbsolute(relative);
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
