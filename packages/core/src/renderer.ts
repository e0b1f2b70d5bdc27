/**
 * Page rendering
 *
 * Turns a Document into final markup through three collaborators:
 * a markup converter (markdown → HTML), a highlighter for code blocks,
 * and the layout registry. Layouts receive a plain PageRecord.
 */

import { Marked } from "marked";
import { PLACEHOLDER_RE } from "./code-blocks.js";
import { createPlainHighlighter, renderCodeBlock, type Highlighter } from "./highlight.js";
import type { LayoutRegistry } from "./layouts.js";
import type { CodeBlock, Document, PageLink, PageRecord, SiteIndex, SiteInfo } from "./types.js";

const PARAGRAPH_BLOCK_RE = /<p>\uE000B(\d+)\uE001<\/p>/g;

export interface MarkupConverter {
  convert(markdown: string): string;
}

/**
 * Markdown converter backed by marked (GFM)
 */
export function createMarkedConverter(): MarkupConverter {
  const marked = new Marked({ gfm: true });
  return {
    convert(markdown) {
      // Typed string | Promise<string>; a promise only comes back with async extensions
      const html = marked.parse(markdown, { async: false });
      if (typeof html !== "string") {
        throw new TypeError("Markdown conversion must be synchronous");
      }
      return html;
    },
  };
}

/**
 * Replace code placeholders in converted HTML with rendered code
 */
export function substituteCode(
  html: string,
  blocks: readonly CodeBlock[],
  highlighter: Highlighter
): string {
  const render = (token: string, index: string): string => {
    const block = blocks[Number(index)];
    return block === undefined ? token : renderCodeBlock(block, highlighter);
  };

  return html
    .replace(PARAGRAPH_BLOCK_RE, (token: string, index: string) => render(token, index))
    .replace(PLACEHOLDER_RE, (token: string, _type: string, index: string) => render(token, index));
}

function pageLink(doc: Document | null): PageLink | null {
  return doc ? { title: doc.title, permalink: doc.permalink } : null;
}

/**
 * Plain, inspectable record handed to a layout
 */
export function toPageRecord(
  document: Document,
  index: SiteIndex,
  content: string,
  site: SiteInfo
): PageRecord {
  const { previous, next } = index.neighbors(document.id);
  return {
    id: document.id,
    date: document.date.iso,
    slug: document.slug,
    title: document.title,
    excerpt: document.excerpt,
    permalink: document.permalink,
    metadata: document.metadata,
    tags: document.tags,
    categories: document.categories,
    content,
    previous: pageLink(previous),
    next: pageLink(next),
    site,
  };
}

export interface RendererOptions {
  layouts: LayoutRegistry;
  site: SiteInfo;
  converter?: MarkupConverter;
  highlighter?: Highlighter;
}

export class Renderer {
  #layouts: LayoutRegistry;
  #site: SiteInfo;
  #converter: MarkupConverter;
  #highlighter: Highlighter;

  constructor(options: RendererOptions) {
    this.#layouts = options.layouts;
    this.#site = options.site;
    this.#converter = options.converter ?? createMarkedConverter();
    this.#highlighter = options.highlighter ?? createPlainHighlighter();
  }

  /**
   * Body HTML: converted markup with code regions filled back in
   */
  renderBody(document: Document): string {
    const html = this.#converter.convert(document.body);
    return substituteCode(html, document.codeBlocks, this.#highlighter);
  }

  /**
   * Full page for a document; without a layout this is the body HTML
   *
   * @throws {UnknownLayoutError} if the document names a layout the registry lacks
   */
  render(document: Document, index: SiteIndex): string {
    const content = this.renderBody(document);
    if (document.layout === undefined) {
      return content;
    }
    const layout = this.#layouts.get(document.layout);
    return layout(toPageRecord(document, index, content, this.#site));
  }
}

export function createRenderer(options: RendererOptions): Renderer {
  return new Renderer(options);
}
