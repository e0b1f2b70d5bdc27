/**
 * Front-matter splitting
 *
 * A document may open with a metadata block fenced by `---` lines:
 *
 * ```
 * ---
 * layout: post
 * title: Hello
 * tags: [a, b]
 * ---
 * Body text
 * ```
 *
 * Values are flat scalars or flat lists of scalars. Nothing inside the block
 * is treated as markup.
 */

import YAML from "yaml";
import { z } from "zod";
import { MalformedFrontMatterError } from "./errors.js";
import type { Metadata, MetadataScalar, MetadataValue } from "./types.js";

const OPEN_RE = /^\uFEFF?---[ \t]*\r?\n/;
const CLOSE_RE = /^(?:---|\.\.\.)[ \t]*$/;

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const metadataSchema = z.record(z.union([scalarSchema, z.array(scalarSchema)]));

export interface FrontMatterResult {
  metadata: Metadata;
  body: string;
  hasFrontMatter: boolean;
}

/**
 * Split raw file content into metadata and body
 *
 * Without an opening delimiter on the first line the whole content is the
 * body, unchanged, and metadata is empty.
 *
 * @throws {MalformedFrontMatterError} if the block is never closed or is not a flat mapping
 */
export function parseFrontMatter(content: string): FrontMatterResult {
  const open = OPEN_RE.exec(content);
  if (!open) {
    return { metadata: {}, body: content, hasFrontMatter: false };
  }

  let offset = open[0].length;
  let closeStart = -1;
  let bodyStart = -1;

  while (offset <= content.length) {
    const newline = content.indexOf("\n", offset);
    const end = newline === -1 ? content.length : newline;
    const line = content.slice(offset, end).replace(/\r$/, "");

    if (CLOSE_RE.test(line)) {
      closeStart = offset;
      bodyStart = newline === -1 ? content.length : newline + 1;
      break;
    }
    if (newline === -1) {
      break;
    }
    offset = newline + 1;
  }

  if (closeStart === -1) {
    throw new MalformedFrontMatterError("opening --- is never closed");
  }

  const block = content.slice(open[0].length, closeStart);
  return {
    metadata: parseMetadataBlock(block),
    body: content.slice(bodyStart),
    hasFrontMatter: true,
  };
}

/**
 * Parse the text between the delimiters
 */
export function parseMetadataBlock(block: string): Metadata {
  if (block.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(block);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedFrontMatterError(reason, { cause: err });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = metadataSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `"${issue.path.join(".")}"` : "block";
    throw new MalformedFrontMatterError(
      `${where} must be a flat mapping of scalars or scalar lists`,
      { cause: result.error }
    );
  }

  return result.data;
}

function isScalarList(value: MetadataValue | undefined): value is readonly MetadataScalar[] {
  return Array.isArray(value);
}

/**
 * Read a metadata value as a string, if it is a scalar
 */
export function metadataString(metadata: Metadata, key: string): string | undefined {
  const value = metadata[key];
  if (value === undefined || value === null || isScalarList(value)) {
    return undefined;
  }
  return String(value);
}

/**
 * Read a metadata value as a list of terms
 *
 * Accepts a list (`[a, b]`) or a whitespace-separated string (`a b`).
 * Duplicates are dropped, first occurrence kept.
 */
export function metadataTerms(metadata: Metadata, key: string): string[] {
  const value = metadata[key];
  let terms: string[];

  if (isScalarList(value)) {
    terms = value.filter((v) => v !== null).map((v) => String(v).trim());
  } else if (typeof value === "string") {
    terms = value.split(/\s+/);
  } else if (typeof value === "number" || typeof value === "boolean") {
    terms = [String(value)];
  } else {
    terms = [];
  }

  return [...new Set(terms.filter((t) => t.length > 0))];
}
