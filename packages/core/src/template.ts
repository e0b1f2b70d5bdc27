/**
 * Minimal `{{ path }}` templates for file-based layouts
 *
 * - `{{ content }}` inserts the page body HTML unescaped
 * - `{{ page.title }}`, `{{ page.previous.permalink }}`, `{{ site.title }}`
 *   insert escaped values; lists are joined with ", "
 * - Missing values render as the empty string
 */

import { escapeHtml } from "./highlight.js";
import type { PageRecord } from "./types.js";

const EXPRESSION_RE = /\{\{\s*([A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*)\s*\}\}/g;

function lookup(scope: Record<string, unknown>, path: string): unknown {
  let current: unknown = scope;
  for (const key of path.split(".")) {
    if (typeof current !== "object" || current === null || !Object.hasOwn(current, key)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (Array.isArray(value)) {
    return value.map((v) => stringify(v)).join(", ");
  }
  if (typeof value === "object") {
    return "";
  }
  return String(value);
}

/**
 * Compile template source into a layout function
 */
export function compileTemplate(source: string): (page: PageRecord) => string {
  return (page) => {
    const scope: Record<string, unknown> = { page, site: page.site, content: page.content };
    return source.replace(EXPRESSION_RE, (_match: string, path: string) => {
      const value = lookup(scope, path);
      return path === "content" ? stringify(value) : escapeHtml(stringify(value));
    });
  };
}
