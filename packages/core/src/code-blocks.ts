/**
 * Code region extraction
 *
 * Lifts verbatim regions out of a body before any markup is interpreted, so
 * that text inside code can never be read as a link or reference definition.
 * Each region is replaced by an opaque placeholder token that later stages
 * pass through untouched.
 *
 * Recognized regions:
 * - ``` / ~~~ fences with an optional language tag and flag token
 * - {% highlight lang [flag] %} ... {% endhighlight %}
 * - {% raw %} ... {% endraw %}
 * - `inline` spans within a single line
 *
 * Invariants:
 * - Region text is kept byte-for-byte (whitespace and line breaks included)
 * - A block placeholder always sits alone in its own paragraph
 * - Inline placeholders never span lines
 */

import { UnbalancedCodeFenceError } from "./errors.js";
import type { CodeBlock, Segment } from "./types.js";

const FENCE_OPEN_RE = /^ {0,3}(`{3,}|~{3,})[ \t]*([^\s`]+)?(?:[ \t]+([^\s`]+))?[ \t]*$/;
const HIGHLIGHT_OPEN_RE = /^[ \t]*\{%-?[ \t]*highlight[ \t]+(\S+?)(?:[ \t]+(\S+?))?[ \t]*-?%\}[ \t]*$/;
const HIGHLIGHT_CLOSE_RE = /^[ \t]*\{%-?[ \t]*endhighlight[ \t]*-?%\}[ \t]*$/;
const RAW_OPEN_RE = /^[ \t]*\{%-?[ \t]*raw[ \t]*-?%\}[ \t]*$/;
const RAW_CLOSE_RE = /^[ \t]*\{%-?[ \t]*endraw[ \t]*-?%\}[ \t]*$/;
const INLINE_CODE_RE = /(?<!`)(`+)(?!`)(.+?)(?<!`)\1(?!`)/g;

/** Matches any placeholder; group 1 is B (block) or I (inline), group 2 the index */
export const PLACEHOLDER_RE = /\uE000([BI])(\d+)\uE001/g;
const BLOCK_PLACEHOLDER_RE = /^\uE000B(\d+)\uE001$/;

export interface ExtractionResult {
  /** Body with every region replaced by its placeholder */
  text: string;
  segments: Segment[];
  blocks: CodeBlock[];
}

/**
 * Placeholder token standing in for a block
 */
export function placeholder(block: Pick<CodeBlock, "index" | "kind">): string {
  return `\uE000${block.kind === "inline" ? "I" : "B"}${block.index}\uE001`;
}

interface OpenRegion {
  kind: Exclude<CodeBlock["kind"], "inline">;
  line: number;
  marker: string;
  language?: string;
  flag?: string;
  isClose: (line: string) => boolean;
  sourceLines: string[];
  innerLines: string[];
}

function stripEol(line: string): string {
  return line.replace(/\r?\n$/, "");
}

function eolOf(line: string): string {
  const match = /\r?\n$/.exec(line);
  return match ? match[0] : "";
}

function openRegion(content: string, line: number): OpenRegion | null {
  const fence = FENCE_OPEN_RE.exec(content);
  if (fence) {
    const marker = fence[1];
    const char = marker[0];
    const closeRe = new RegExp(`^ {0,3}\\${char}{${marker.length},}[ \\t]*$`);
    return {
      kind: "fence",
      line,
      marker,
      language: fence[2],
      flag: fence[3],
      isClose: (l) => closeRe.test(l),
      sourceLines: [],
      innerLines: [],
    };
  }

  const highlight = HIGHLIGHT_OPEN_RE.exec(content);
  if (highlight) {
    return {
      kind: "highlight",
      line,
      marker: "{% highlight %}",
      language: highlight[1],
      flag: highlight[2],
      isClose: (l) => HIGHLIGHT_CLOSE_RE.test(l),
      sourceLines: [],
      innerLines: [],
    };
  }

  if (RAW_OPEN_RE.test(content)) {
    return {
      kind: "raw",
      line,
      marker: "{% raw %}",
      isClose: (l) => RAW_CLOSE_RE.test(l),
      sourceLines: [],
      innerLines: [],
    };
  }

  return null;
}

/**
 * Replace inline code spans on one prose line with placeholders
 */
function extractInline(content: string, line: number, blocks: CodeBlock[]): string {
  return content.replace(INLINE_CODE_RE, (source: string, _ticks: string, text: string) => {
    const block: CodeBlock = { index: blocks.length, kind: "inline", text, source, line };
    blocks.push(block);
    return placeholder(block);
  });
}

/**
 * Extract fenced, highlight, raw and inline code regions from a body
 *
 * @throws {UnbalancedCodeFenceError} if a region is opened but not closed,
 *   or a closing tag appears with nothing open
 */
export function extractCodeBlocks(body: string): ExtractionResult {
  const lines = body.split(/(?<=\n)/);
  const blocks: CodeBlock[] = [];
  let out = "";
  let open: OpenRegion | null = null;
  // Line ending still owed after a placeholder paragraph, "" when none
  let blankLineOwed = "";

  const emit = (piece: string): void => {
    if (blankLineOwed !== "" && piece.trim() !== "") {
      out += blankLineOwed;
    }
    blankLineOwed = "";
    out += piece;
  };

  for (const [i, rawLine] of lines.entries()) {
    const lineNo = i + 1;
    const content = stripEol(rawLine);

    if (open) {
      open.sourceLines.push(rawLine);
      if (!open.isClose(content)) {
        open.innerLines.push(rawLine);
        continue;
      }

      const block: CodeBlock = {
        index: blocks.length,
        kind: open.kind,
        text: open.innerLines.join(""),
        source: open.sourceLines.join(""),
        line: open.line,
        ...(open.language !== undefined ? { language: open.language } : {}),
        ...(open.flag !== undefined ? { flag: open.flag } : {}),
      };
      blocks.push(block);

      // Keep the placeholder in a paragraph of its own
      const eol = eolOf(rawLine) || "\n";
      if (out !== "" && !/\r?\n\r?\n$/.test(out)) {
        out += /\r?\n$/.test(out) ? eol : eol + eol;
      }
      out += placeholder(block) + eol;
      blankLineOwed = eol;
      open = null;
      continue;
    }

    if (HIGHLIGHT_CLOSE_RE.test(content)) {
      throw new UnbalancedCodeFenceError(lineNo, "{% endhighlight %}");
    }
    if (RAW_CLOSE_RE.test(content)) {
      throw new UnbalancedCodeFenceError(lineNo, "{% endraw %}");
    }

    const region = openRegion(content, lineNo);
    if (region) {
      region.sourceLines.push(rawLine);
      open = region;
      continue;
    }

    emit(extractInline(content, lineNo, blocks) + eolOf(rawLine));
  }

  if (open) {
    throw new UnbalancedCodeFenceError(open.line, open.marker);
  }

  return { text: out, segments: segmentBody(out, blocks), blocks };
}

/**
 * Split placeholder text into prose and block-code segments, in order
 *
 * Inline placeholders stay inside their prose segment.
 */
export function segmentBody(text: string, blocks: readonly CodeBlock[]): Segment[] {
  const segments: Segment[] = [];
  let prose = "";

  for (const line of text.split(/(?<=\n)/)) {
    const match = BLOCK_PLACEHOLDER_RE.exec(stripEol(line));
    const block = match ? blocks[Number(match[1])] : undefined;
    if (block === undefined) {
      prose += line;
      continue;
    }
    if (prose !== "") {
      segments.push({ kind: "prose", text: prose });
      prose = "";
    }
    segments.push({ kind: "code", block });
  }

  if (prose !== "") {
    segments.push({ kind: "prose", text: prose });
  }
  return segments;
}

/**
 * Put inline code spans back as their original markdown
 */
export function restoreInlineCode(text: string, blocks: readonly CodeBlock[]): string {
  return text.replace(PLACEHOLDER_RE, (token: string, type: string, index: string) => {
    const block = blocks[Number(index)];
    return type === "I" && block !== undefined ? block.source : token;
  });
}

/**
 * Remove every placeholder, inline spans restored, block regions dropped
 */
export function stripBlockPlaceholders(text: string, blocks: readonly CodeBlock[]): string {
  return restoreInlineCode(text, blocks).replace(PLACEHOLDER_RE, "");
}
