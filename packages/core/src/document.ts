/**
 * Document model builder
 *
 * Runs one source through front matter, code extraction and reference
 * resolution, then derives title, excerpt, permalink and layout.
 *
 * Invariants:
 * - Code regions are extracted before references are resolved
 * - The returned Document is frozen and holds only plain data
 * - Building is a pure function of (source, content, options)
 */

import { parseFrontMatter, metadataString, metadataTerms } from "./front-matter.js";
import { extractCodeBlocks, segmentBody, restoreInlineCode } from "./code-blocks.js";
import { resolveReferences } from "./references.js";
import {
  expandPermalink,
  isContainedPermalink,
  normalizePermalink,
  DEFAULT_PERMALINK,
} from "./permalink.js";
import { titleFromSlug } from "./slug.js";
import { InvalidPermalinkError, MissingLayoutError, UnknownLayoutError } from "./errors.js";
import type { CodeBlock, Diagnostic, Document, Metadata, Segment, SourceFile } from "./types.js";

export interface DocumentOptions {
  /** Permalink pattern (default: /:year/:month/:day/:slug/) */
  permalink?: string;
  /** Excerpt boundary (default: first blank line) */
  excerptSeparator?: string;
  /** Layout used when a document declares none */
  defaultLayout?: string;
  /** Names a `layout` key may use; undefined accepts any name */
  layouts?: readonly string[];
  /** Missing layout without a default is fatal (default: false) */
  strict?: boolean;
}

export interface BuiltDocument {
  document: Document;
  diagnostics: Diagnostic[];
}

export const DEFAULT_EXCERPT_SEPARATOR = "\n\n";

/**
 * Derive the excerpt from the first prose segment
 *
 * Stops at the separator or the first block of code, whichever comes first.
 */
export function deriveExcerpt(
  segments: readonly Segment[],
  blocks: readonly CodeBlock[],
  separator: string = DEFAULT_EXCERPT_SEPARATOR
): string {
  const first = segments.find(
    (s): s is Extract<Segment, { kind: "prose" }> => s.kind === "prose" && s.text.trim() !== ""
  );
  if (!first) {
    return "";
  }

  // Compare with LF line endings so CRLF sources split on the same boundary
  const text = toLf(first.text).replace(/^\s+/, "");
  const boundary = toLf(separator);
  const cut = boundary === "" ? -1 : text.indexOf(boundary);
  const excerpt = cut === -1 ? text : text.slice(0, cut);
  return restoreInlineCode(excerpt, blocks).trim();
}

function toLf(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function resolveLayout(
  id: string,
  metadata: Metadata,
  options: DocumentOptions,
  diagnostics: Diagnostic[]
): string | undefined {
  const declared = metadataString(metadata, "layout");
  const known = options.layouts;

  if (declared !== undefined) {
    if (known && !known.includes(declared)) {
      throw new UnknownLayoutError(declared, [...known]);
    }
    return declared;
  }

  if (options.defaultLayout !== undefined) {
    return options.defaultLayout;
  }

  if (options.strict) {
    throw new MissingLayoutError(id);
  }

  diagnostics.push({
    code: "MISSING_LAYOUT",
    documentId: id,
    message: `Document ${id} declares no layout and no default layout is configured`,
  });
  return undefined;
}

/**
 * Build a Document from a scanned source and its content
 *
 * @throws {MalformedFrontMatterError} for an unterminated or nested metadata block
 * @throws {UnbalancedCodeFenceError} for an unclosed code region
 * @throws {AmbiguousReferenceError} for a label defined twice
 * @throws {InvalidPermalinkError} when the permalink leaves the site root
 * @throws {UnknownLayoutError} when `layout` names an unknown layout
 * @throws {MissingLayoutError} in strict mode when no layout applies
 */
export function buildDocument(
  source: SourceFile,
  content: string,
  options: DocumentOptions = {}
): BuiltDocument {
  const diagnostics: Diagnostic[] = [];
  const { metadata, body: rawBody } = parseFrontMatter(content);

  const extracted = extractCodeBlocks(rawBody);
  const resolved = resolveReferences(extracted.text, extracted.blocks);

  for (const usage of resolved.unresolved) {
    diagnostics.push({
      code: "UNRESOLVED_REFERENCE",
      documentId: source.id,
      message: `No definition for reference [${usage.label}] in ${source.id}`,
      details: { label: usage.label, text: usage.text },
    });
  }

  const segments = segmentBody(resolved.text, extracted.blocks);
  const categories = metadataTerms(metadata, "categories");

  const title = metadataString(metadata, "title") ?? titleFromSlug(source.slug);
  const excerpt =
    metadataString(metadata, "excerpt") ??
    deriveExcerpt(segments, extracted.blocks, options.excerptSeparator);

  const declaredPermalink = metadataString(metadata, "permalink");
  const permalink =
    declaredPermalink !== undefined
      ? normalizePermalink(declaredPermalink)
      : expandPermalink(options.permalink ?? DEFAULT_PERMALINK, {
          date: source.date,
          slug: source.slug,
          categories,
        });

  if (!isContainedPermalink(permalink)) {
    throw new InvalidPermalinkError(permalink, source.id);
  }

  const layout = resolveLayout(source.id, metadata, options, diagnostics);

  const document: Document = {
    id: source.id,
    sourcePath: source.path,
    date: source.date,
    slug: source.slug,
    metadata,
    rawBody,
    segments,
    codeBlocks: extracted.blocks,
    definitions: resolved.definitions,
    links: resolved.links,
    body: resolved.text,
    title,
    excerpt,
    permalink,
    ...(layout !== undefined ? { layout } : {}),
    tags: metadataTerms(metadata, "tags"),
    categories,
    published: metadata.published !== false,
  };

  return { document: deepFreeze(document), diagnostics };
}
