/**
 * Code block output
 *
 * Highlighting proper is delegated to a Highlighter; the default one only
 * escapes, which is also the pass-through for unrecognized languages.
 */

import type { CodeBlock } from "./types.js";

export interface Highlighter {
  /**
   * Render a block of code as HTML
   * @param language - Language tag from the opening marker, if any
   * @param text - Verbatim block text
   */
  highlight(language: string | undefined, text: string, block: CodeBlock): string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch]);
}

/**
 * Escape-only highlighter: `<pre><code class="language-x">…</code></pre>`
 */
export function createPlainHighlighter(): Highlighter {
  return {
    highlight(language, text, block) {
      const attrs: string[] = [];
      if (language) {
        attrs.push(`class="language-${escapeHtml(language)}"`);
      }
      if (block.flag) {
        attrs.push(`data-flag="${escapeHtml(block.flag)}"`);
      }
      const open = attrs.length > 0 ? `<code ${attrs.join(" ")}>` : "<code>";
      return `<pre>${open}${escapeHtml(text)}</code></pre>`;
    },
  };
}

/**
 * HTML for one extracted region
 *
 * Raw regions are emitted as written; inline spans become `<code>`.
 */
export function renderCodeBlock(block: CodeBlock, highlighter: Highlighter): string {
  switch (block.kind) {
    case "raw":
      return block.text;
    case "inline":
      return `<code>${escapeHtml(block.text)}</code>`;
    case "fence":
    case "highlight":
      return highlighter.highlight(block.language, block.text, block);
  }
}
