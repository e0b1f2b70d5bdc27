/**
 * Core types for Daybook
 */

import type { DaybookError } from "./errors.js";

/**
 * Calendar date taken from a post filename
 */
export interface PostDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  /** Zero-padded `YYYY-MM-DD` form */
  iso: string;
}

/**
 * A candidate post discovered by the scanner
 */
export interface SourceFile {
  /** Document identifier: `YYYY-MM-DD-slug` */
  id: string;
  /** Base name, e.g. `2012-01-28-hello-world.md` */
  fileName: string;
  /** Absolute path to the file */
  path: string;
  date: PostDate;
  slug: string;
  /** Extension without the dot */
  ext: string;
}

/**
 * Flat scalar allowed in front matter
 */
export type MetadataScalar = string | number | boolean | null;

/**
 * Front-matter value: a scalar or a flat list of scalars (e.g. `tags: [a, b]`)
 */
export type MetadataValue = MetadataScalar | readonly MetadataScalar[];

/**
 * Front-matter mapping, in declaration order
 */
export type Metadata = Readonly<Record<string, MetadataValue>>;

/**
 * How a verbatim region was delimited in the source
 *
 * - fence: ``` or ~~~ markers
 * - highlight: {% highlight lang %} ... {% endhighlight %}
 * - raw: {% raw %} ... {% endraw %}, emitted as-is with no wrapping
 * - inline: a single-line backtick span
 */
export type CodeBlockKind = "fence" | "highlight" | "raw" | "inline";

/**
 * Verbatim code region lifted out of a body before link resolution
 */
export interface CodeBlock {
  /** Position in the document's block list; the placeholder refers to it */
  index: number;
  kind: CodeBlockKind;
  language?: string;
  /** Auxiliary token after the language on the opening marker (e.g. `linenos`) */
  flag?: string;
  /** Content between the markers, whitespace and line breaks preserved */
  text: string;
  /** Original source text including the markers */
  source: string;
  /** 1-based line of the opening marker within the body */
  line: number;
}

export type Segment =
  | { readonly kind: "prose"; readonly text: string }
  | { readonly kind: "code"; readonly block: CodeBlock };

/**
 * `[label]: target "title"` line
 */
export interface ReferenceDefinition {
  /** Label as written */
  label: string;
  /** Normalized lookup key */
  key: string;
  target: string;
  title?: string;
  /** 1-based line within the body after code regions became placeholders */
  line: number;
}

/**
 * Reference usage substituted with its definition
 */
export interface ResolvedLink {
  text: string;
  label: string;
  target: string;
  title?: string;
  image: boolean;
}

export type DiagnosticCode = "UNRESOLVED_REFERENCE" | "MISSING_LAYOUT";

/**
 * Soft problem: reported, but the document still builds
 */
export interface Diagnostic {
  code: DiagnosticCode;
  documentId: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Fatal per-document problem: the document is excluded from the build
 */
export interface BuildFailure {
  /** Source file name */
  file: string;
  documentId?: string;
  error: DaybookError;
}

/**
 * A fully built post. Plain data, frozen after construction.
 */
export interface Document {
  readonly id: string;
  readonly sourcePath: string;
  readonly date: PostDate;
  readonly slug: string;
  readonly metadata: Metadata;
  /** Body exactly as it followed the front matter */
  readonly rawBody: string;
  readonly segments: readonly Segment[];
  readonly codeBlocks: readonly CodeBlock[];
  readonly definitions: readonly ReferenceDefinition[];
  readonly links: readonly ResolvedLink[];
  /** Resolved body: references substituted, code regions as placeholders */
  readonly body: string;
  readonly title: string;
  readonly excerpt: string;
  readonly permalink: string;
  readonly layout?: string;
  readonly tags: readonly string[];
  readonly categories: readonly string[];
  readonly published: boolean;
}

export interface Neighbors {
  previous: Document | null;
  next: Document | null;
}

/**
 * Read-only view over every published document of one build
 */
export interface SiteIndex {
  /** Date descending, ties by ascending slug */
  readonly chronological: readonly Document[];
  /** Tag to documents in chronological order; keys sorted */
  readonly tags: ReadonlyMap<string, readonly Document[]>;
  readonly categories: ReadonlyMap<string, readonly Document[]>;
  get(id: string): Document | undefined;
  neighbors(id: string): Neighbors;
}

/**
 * Milliseconds spent per build phase
 */
export interface BuildTimings {
  scan: number;
  documents: number;
  index: number;
  total: number;
}

export interface BuildReport {
  /** Documents built, published or not */
  documents: number;
  failures: BuildFailure[];
  diagnostics: Diagnostic[];
  timings: BuildTimings;
  /** No failures, and in strict mode no diagnostics either */
  ok: boolean;
}

export interface BuildResult {
  documents: Document[];
  index: SiteIndex;
  report: BuildReport;
}

/**
 * Plain record handed to layouts
 */
export interface PageLink {
  title: string;
  permalink: string;
}

export interface PageRecord {
  id: string;
  date: string;
  slug: string;
  title: string;
  excerpt: string;
  permalink: string;
  metadata: Metadata;
  tags: readonly string[];
  categories: readonly string[];
  /** Body HTML with highlighted code */
  content: string;
  previous: PageLink | null;
  next: PageLink | null;
  site: SiteInfo;
}

export interface SiteInfo {
  title: string;
  url?: string;
}

export interface RenderedPage {
  documentId: string;
  permalink: string;
  html: string;
}
