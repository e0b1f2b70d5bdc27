/**
 * Error types for Daybook builds
 *
 * Invariants:
 * - Errors raised while scanning name the file; per-document errors are
 *   reported in a BuildFailure that carries it
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all Daybook errors
 */
export abstract class DaybookError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a source filename does not follow `YYYY-MM-DD-slug.ext`
 */
export class InvalidFilenameError extends DaybookError {
  readonly code = "E_INVALID_FILENAME";

  constructor(
    public readonly fileName: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid post filename "${fileName}": ${reason}`, options);
  }
}

/**
 * Thrown when two sources share the same date and slug
 */
export class DuplicateSlugError extends DaybookError {
  readonly code = "E_DUPLICATE_SLUG";

  constructor(
    public readonly fileName: string,
    public readonly existing: string,
    options?: ErrorOptions
  ) {
    super(`Duplicate post "${fileName}": same date and slug as "${existing}"`, options);
  }
}

/**
 * Thrown when a front-matter block is unterminated or not a flat mapping
 */
export class MalformedFrontMatterError extends DaybookError {
  readonly code = "E_FRONT_MATTER";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Malformed front matter: ${reason}`, options);
  }
}

/**
 * Thrown when a code fence opens without a matching close
 */
export class UnbalancedCodeFenceError extends DaybookError {
  readonly code = "E_CODE_FENCE";

  constructor(
    public readonly line: number,
    public readonly marker: string,
    options?: ErrorOptions
  ) {
    super(`Unbalanced code fence "${marker}" opened at line ${line}`, options);
  }
}

/**
 * Thrown when a reference label is defined more than once in a document
 */
export class AmbiguousReferenceError extends DaybookError {
  readonly code = "E_AMBIGUOUS_REFERENCE";

  constructor(
    public readonly label: string,
    public readonly lines: [number, number],
    options?: ErrorOptions
  ) {
    super(
      `Reference "[${label}]" is defined more than once (lines ${lines[0]} and ${lines[1]})`,
      options
    );
  }
}

/**
 * Thrown when `layout` names a layout the site does not provide
 */
export class UnknownLayoutError extends DaybookError {
  readonly code = "E_UNKNOWN_LAYOUT";

  constructor(
    public readonly layout: string,
    public readonly known: string[],
    options?: ErrorOptions
  ) {
    super(`Unknown layout "${layout}" (known layouts: ${known.join(", ") || "none"})`, options);
  }
}

/**
 * Thrown in strict mode when a document has no layout and the site no default
 */
export class MissingLayoutError extends DaybookError {
  readonly code = "E_MISSING_LAYOUT";

  constructor(documentId: string, options?: ErrorOptions) {
    super(`Document ${documentId} declares no layout and no default layout is configured`, options);
  }
}

/**
 * Thrown when two documents resolve to the same permalink
 */
export class DuplicatePermalinkError extends DaybookError {
  readonly code = "E_DUPLICATE_PERMALINK";

  constructor(
    public readonly permalink: string,
    public readonly documentId: string,
    public readonly existingId: string,
    options?: ErrorOptions
  ) {
    super(`Permalink ${permalink} of ${documentId} is already used by ${existingId}`, options);
  }
}

/**
 * Thrown when a permalink would place a page outside the destination
 */
export class InvalidPermalinkError extends DaybookError {
  readonly code = "E_INVALID_PERMALINK";

  constructor(
    public readonly permalink: string,
    public readonly documentId: string,
    options?: ErrorOptions
  ) {
    super(`Permalink ${permalink} of ${documentId} points outside the site`, options);
  }
}

/**
 * Thrown when a date argument is not a valid calendar date
 */
export class InvalidDateError extends DaybookError {
  readonly code = "E_INVALID_DATE";

  constructor(value: string, options?: ErrorOptions) {
    super(`Invalid date "${value}": expected a calendar date as YYYY-MM-DD`, options);
  }
}

/**
 * Thrown when a source file cannot be read
 */
export class SourceReadError extends DaybookError {
  readonly code = "E_READ";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read source: ${filePath}`, options);
  }
}

/**
 * Thrown when a rendered page cannot be written
 */
export class OutputWriteError extends DaybookError {
  readonly code = "E_WRITE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write output: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends DaybookError {
  readonly code = "E_DIRECTORY";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends DaybookError {
  readonly code = "E_LIST";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when the site configuration is invalid
 */
export class ConfigError extends DaybookError {
  readonly code = "E_CONFIG";

  constructor(source: string, reason: string, options?: ErrorOptions) {
    super(`Invalid configuration in ${source}: ${reason}`, options);
  }
}
