/**
 * Layout registry
 *
 * The set of layouts is fixed when the build is configured: the built-in
 * layouts, plus any `.html` templates found in the layouts directory (a file
 * named like a built-in replaces it). Documents select one by name.
 */

import * as path from "node:path";
import { listFiles, readSource } from "./io.js";
import { escapeHtml } from "./highlight.js";
import { compileTemplate } from "./template.js";
import { UnknownLayoutError } from "./errors.js";
import type { PageRecord } from "./types.js";

export type Layout = (page: PageRecord) => string;

function shell(page: PageRecord, main: string): string {
  const title = page.title === page.site.title ? page.title : `${page.title} | ${page.site.title}`;
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    page.excerpt ? `<meta name="description" content="${escapeHtml(page.excerpt)}">` : "",
    "</head>",
    "<body>",
    main,
    "</body>",
    "</html>",
  ]
    .filter((line) => line !== "")
    .join("\n")
    .concat("\n");
}

function navLink(rel: "prev" | "next", link: PageRecord["previous"]): string {
  if (!link) {
    return "";
  }
  const label = rel === "prev" ? "Newer" : "Older";
  return `<a rel="${rel}" href="${escapeHtml(link.permalink)}">${label}: ${escapeHtml(link.title)}</a>`;
}

const defaultLayout: Layout = (page) => shell(page, page.content);

const pageLayout: Layout = (page) =>
  shell(page, `<main>\n<h1>${escapeHtml(page.title)}</h1>\n${page.content}\n</main>`);

const postLayout: Layout = (page) => {
  const tags =
    page.tags.length > 0
      ? `<ul class="tags">${page.tags.map((t) => `<li>${escapeHtml(t)}</li>`).join("")}</ul>`
      : "";
  const nav = [navLink("prev", page.previous), navLink("next", page.next)].filter(Boolean);
  const main = [
    "<article>",
    "<header>",
    `<h1>${escapeHtml(page.title)}</h1>`,
    `<time datetime="${page.date}">${page.date}</time>`,
    tags,
    "</header>",
    page.content,
    "</article>",
    nav.length > 0 ? `<nav>\n${nav.join("\n")}\n</nav>` : "",
  ];
  return shell(page, main.filter((part) => part !== "").join("\n"));
};

export const BUILTIN_LAYOUTS: Readonly<Record<string, Layout>> = Object.freeze({
  default: defaultLayout,
  page: pageLayout,
  post: postLayout,
});

/**
 * Closed name → layout mapping
 */
export class LayoutRegistry {
  readonly #layouts: ReadonlyMap<string, Layout>;

  constructor(layouts: Readonly<Record<string, Layout>>) {
    this.#layouts = new Map(Object.entries(layouts));
  }

  has(name: string): boolean {
    return this.#layouts.has(name);
  }

  /**
   * @throws {UnknownLayoutError} if no layout has this name
   */
  get(name: string): Layout {
    const layout = this.#layouts.get(name);
    if (!layout) {
      throw new UnknownLayoutError(name, this.names());
    }
    return layout;
  }

  /** Sorted layout names */
  names(): string[] {
    return [...this.#layouts.keys()].sort();
  }
}

/**
 * Assemble the registry from built-ins and an optional templates directory
 */
export async function createLayoutRegistry(
  options: { layoutsDir?: string; layouts?: Readonly<Record<string, Layout>> } = {}
): Promise<LayoutRegistry> {
  const layouts: Record<string, Layout> = { ...BUILTIN_LAYOUTS, ...options.layouts };

  if (options.layoutsDir) {
    for (const fileName of await listFiles(options.layoutsDir)) {
      if (path.extname(fileName) !== ".html") {
        continue;
      }
      const source = await readSource(path.join(options.layoutsDir, fileName));
      layouts[path.basename(fileName, ".html")] = compileTemplate(source);
    }
  }

  return new LayoutRegistry(layouts);
}
