/**
 * Reference-style link resolution
 *
 * Pass 1 collects every `[label]: target "title"` line into a label map, so a
 * definition may appear after its first use. The title may also sit alone on
 * the following line. Pass 2 rewrites each usage
 * (`[text][label]`, `[text][]`, `[label]`) into an inline link.
 *
 * Input must already have its code regions replaced by placeholders.
 *
 * Invariants:
 * - Labels compare NFKC-normalized, whitespace-collapsed and case-folded
 * - One definition per label; a second one is fatal
 * - Unknown labels stay as literal bracket text
 * - Inline links and escaped brackets are left untouched
 */

import { AmbiguousReferenceError } from "./errors.js";
import { restoreInlineCode } from "./code-blocks.js";
import { normalize } from "./slug.js";
import type { CodeBlock, ReferenceDefinition, ResolvedLink } from "./types.js";

const DEFINITION_RE =
  /^ {0,3}\[((?:[^[\]\\\n]|\\.)+)\]:[ \t]*(?:<([^>\n]*)>|(\S+))(?:[ \t]+(?:"([^"\n]*)"|'([^'\n]*)'|\(([^)\n]*)\)))?[ \t]*$/;
const TITLE_LINE_RE = /^[ \t]*(?:"([^"\n]*)"|'([^'\n]*)'|\(([^)\n]*)\))[ \t]*$/;

// Link text may hold one level of nested brackets, e.g. [![badge][img]][home]
const TEXT = String.raw`(?:[^[\]\\\n]|\\.|\[(?:[^[\]\\\n]|\\.)*\])*`;
const LABEL = String.raw`(?:[^[\]\\\n]|\\.)*`;
const USAGE_RE = new RegExp(
  String.raw`(\\?)(!?)\[(${TEXT})\](?:\[(${LABEL})\]|(\([^)\n]*\)))?`,
  "g"
);

/**
 * A full or collapsed usage whose label has no definition
 */
export interface UnresolvedUsage {
  text: string;
  label: string;
}

export interface ResolutionResult {
  /** Text with usages substituted and definition lines removed */
  text: string;
  definitions: ReferenceDefinition[];
  links: ResolvedLink[];
  unresolved: UnresolvedUsage[];
}

/**
 * Normalize a reference label for lookup
 */
export function normalizeLabel(label: string): string {
  // Full case folding beyond lowercase: ß/ẞ fold to "ss", final sigma to σ
  return normalize(label).replace(/\s+/g, " ").replace(/ß/g, "ss").replace(/ς/g, "σ");
}

function stripEol(line: string): string {
  return line.replace(/\r?\n$/, "");
}

/**
 * Pass 1: collect definitions and strip their lines
 *
 * Inline code placeholders in a label, target or title are restored to their
 * source text before storing.
 *
 * @throws {AmbiguousReferenceError} if a label is defined twice
 */
export function collectDefinitions(
  text: string,
  blocks: readonly CodeBlock[] = []
): {
  definitions: Map<string, ReferenceDefinition>;
  text: string;
} {
  const definitions = new Map<string, ReferenceDefinition>();
  const kept: string[] = [];
  const lines = text.split(/(?<=\n)/);

  for (let i = 0; i < lines.length; i++) {
    const match = DEFINITION_RE.exec(stripEol(lines[i]));
    if (!match) {
      kept.push(lines[i]);
      continue;
    }

    const [, rawLabel, bracketed, bare, dq, sq, paren] = match;
    const label = restoreInlineCode(rawLabel, blocks);
    const key = normalizeLabel(label);
    const line = i + 1;

    const existing = definitions.get(key);
    if (existing) {
      throw new AmbiguousReferenceError(label, [existing.line, line]);
    }

    let rawTitle = dq ?? sq ?? paren;
    if (rawTitle === undefined && i + 1 < lines.length) {
      const titleLine = TITLE_LINE_RE.exec(stripEol(lines[i + 1]));
      if (titleLine) {
        rawTitle = titleLine[1] ?? titleLine[2] ?? titleLine[3];
        i++;
      }
    }

    const title = rawTitle !== undefined ? restoreInlineCode(rawTitle, blocks) : undefined;
    definitions.set(key, {
      label,
      key,
      target: restoreInlineCode(bracketed ?? bare, blocks),
      ...(title !== undefined ? { title } : {}),
      line,
    });
  }

  if (definitions.size === 0) {
    return { definitions, text };
  }

  const stripped = kept.join("").replace(/\s+$/, "");
  return { definitions, text: stripped === "" ? "" : `${stripped}\n` };
}

function formatDestination(target: string, title: string | undefined): string {
  const dest = /[\s()<>]/.test(target) || target === "" ? `<${target}>` : target;
  if (title === undefined) {
    return dest;
  }
  return `${dest} "${title.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Resolve reference-style links in placeholder text
 *
 * @param blocks - code regions extracted from the text, used to restore
 *   inline code inside labels, targets and titles
 * @throws {AmbiguousReferenceError} if a label is defined twice
 */
export function resolveReferences(input: string, blocks: readonly CodeBlock[] = []): ResolutionResult {
  const { definitions, text } = collectDefinitions(input, blocks);
  const links: ResolvedLink[] = [];
  const unresolved: UnresolvedUsage[] = [];

  const substitute = (source: string): string =>
    source.replace(
      USAGE_RE,
      (
        match: string,
        escape: string,
        bang: string,
        inner: string,
        label: string | undefined,
        inlineDest: string | undefined
      ) => {
        if (escape) {
          return match;
        }

        const linkText = substitute(inner);

        if (inlineDest !== undefined) {
          return `${bang}[${linkText}]${inlineDest}`;
        }

        // Collapsed `[text][]` and shortcut `[text]` use the text as label
        const usedLabel = restoreInlineCode(label === undefined || label === "" ? inner : label, blocks);
        const definition = definitions.get(normalizeLabel(usedLabel));

        if (!definition) {
          if (label !== undefined) {
            unresolved.push({ text: restoreInlineCode(inner, blocks), label: usedLabel });
            return `${bang}[${linkText}][${label}]`;
          }
          return `${bang}[${linkText}]`;
        }

        links.push({
          text: restoreInlineCode(linkText, blocks),
          label: usedLabel,
          target: definition.target,
          ...(definition.title !== undefined ? { title: definition.title } : {}),
          image: bang === "!",
        });
        return `${bang}[${linkText}](${formatDestination(definition.target, definition.title)})`;
      }
    );

  return {
    text: substitute(text),
    definitions: [...definitions.values()].sort((a, b) => a.line - b.line),
    links,
    unresolved,
  };
}
