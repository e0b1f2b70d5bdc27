/**
 * Daybook SDK
 *
 * Builds a dated post corpus into a static site
 */

// Re-export types
export type {
  PostDate,
  SourceFile,
  MetadataScalar,
  MetadataValue,
  Metadata,
  CodeBlockKind,
  CodeBlock,
  Segment,
  ReferenceDefinition,
  ResolvedLink,
  DiagnosticCode,
  Diagnostic,
  BuildFailure,
  Document,
  Neighbors,
  SiteIndex,
  BuildTimings,
  BuildReport,
  BuildResult,
  PageLink,
  PageRecord,
  SiteInfo,
  RenderedPage,
} from "./types.js";

// Pipeline stages
export { scanSources, collectSources, parseFilename, parseIsoDate, toPostDate } from "./scanner.js";
export type { ScanEntry, ParsedFilename } from "./scanner.js";
export { parseFrontMatter, parseMetadataBlock, metadataString, metadataTerms } from "./front-matter.js";
export type { FrontMatterResult } from "./front-matter.js";
export {
  extractCodeBlocks,
  segmentBody,
  restoreInlineCode,
  stripBlockPlaceholders,
  placeholder,
} from "./code-blocks.js";
export type { ExtractionResult } from "./code-blocks.js";
export { normalizeLabel, collectDefinitions, resolveReferences } from "./references.js";
export type { ResolutionResult, UnresolvedUsage } from "./references.js";
export { buildDocument, deriveExcerpt, DEFAULT_EXCERPT_SEPARATOR } from "./document.js";
export type { DocumentOptions, BuiltDocument } from "./document.js";
export {
  expandPermalink,
  normalizePermalink,
  permalinkToFilePath,
  isContainedPermalink,
  DEFAULT_PERMALINK,
} from "./permalink.js";
export { buildSiteIndex, compareChronological, detectPermalinkCollisions } from "./site-index.js";

// Rendering
export { createRenderer, createMarkedConverter, toPageRecord, substituteCode, Renderer } from "./renderer.js";
export type { MarkupConverter, RendererOptions } from "./renderer.js";
export { createPlainHighlighter, renderCodeBlock, escapeHtml } from "./highlight.js";
export type { Highlighter } from "./highlight.js";
export { createLayoutRegistry, LayoutRegistry, BUILTIN_LAYOUTS } from "./layouts.js";
export type { Layout } from "./layouts.js";
export { compileTemplate } from "./template.js";

// Build
export { runBuild, exitCodeFor, summarizeReport } from "./build.js";
export type { BuildOptions } from "./build.js";
export { renderSite, writeSite, outputPath } from "./writer.js";
export { mapPool } from "./pool.js";
export { loadConfig, resolveConfig, configSchema, CONFIG_FILE } from "./config.js";
export type { SiteConfig, SiteConfigInput } from "./config.js";

// Utilities
export { generateSlug, titleFromSlug, normalize as normalizeText } from "./slug.js";
export { atomicWrite, readSource, ensureDirectory, listFiles, errorCode } from "./io.js";
export { logger, formatLogEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogFields, LogSink } from "./observability/logs.js";
export { BuildMetrics } from "./observability/metrics.js";

// Errors
export {
  DaybookError,
  InvalidFilenameError,
  DuplicateSlugError,
  MalformedFrontMatterError,
  UnbalancedCodeFenceError,
  AmbiguousReferenceError,
  UnknownLayoutError,
  MissingLayoutError,
  DuplicatePermalinkError,
  InvalidPermalinkError,
  InvalidDateError,
  SourceReadError,
  OutputWriteError,
  DirectoryError,
  ListFilesError,
  ConfigError,
} from "./errors.js";
