/**
 * Site configuration
 *
 * Read from `daybook.config.json` at the site root when present; every field
 * is optional. Explicit overrides (CLI flags) win over the file.
 */

import * as path from "node:path";
import { z } from "zod";
import { readSource, errorCode } from "./io.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_PERMALINK } from "./permalink.js";
import { DEFAULT_EXCERPT_SEPARATOR } from "./document.js";

export const CONFIG_FILE = "daybook.config.json";

export const configSchema = z
  .object({
    title: z.string().min(1).default("Daybook"),
    url: z.string().url().optional(),
    source: z.string().min(1).default("_posts"),
    destination: z.string().min(1).default("_site"),
    permalink: z.string().min(1).default(DEFAULT_PERMALINK),
    excerptSeparator: z.string().default(DEFAULT_EXCERPT_SEPARATOR),
    defaultLayout: z.string().min(1).nullable().default("post"),
    layoutsDir: z.string().min(1).optional(),
    strict: z.boolean().default(false),
    concurrency: z.number().int().default(16),
  })
  .strict();

export type SiteConfigInput = z.input<typeof configSchema>;

/**
 * Fully resolved configuration; paths are absolute
 */
export interface SiteConfig {
  root: string;
  title: string;
  url?: string;
  /** Posts directory */
  source: string;
  /** Output directory */
  destination: string;
  permalink: string;
  excerptSeparator: string;
  /** Layout for documents that declare none; undefined means no default */
  defaultLayout?: string;
  layoutsDir?: string;
  strict: boolean;
  /** Worker count, clamped to 1-64 */
  concurrency: number;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate raw configuration and resolve paths against the site root
 *
 * @throws {ConfigError} if a field has the wrong type or is unknown
 */
export function resolveConfig(
  root: string,
  input: unknown = {},
  source: string = "configuration"
): SiteConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(source, describeIssues(parsed.error), { cause: parsed.error });
  }

  const data = parsed.data;
  const absRoot = path.resolve(root);

  return {
    root: absRoot,
    title: data.title,
    ...(data.url !== undefined ? { url: data.url } : {}),
    source: path.resolve(absRoot, data.source),
    destination: path.resolve(absRoot, data.destination),
    permalink: data.permalink,
    excerptSeparator: data.excerptSeparator,
    ...(data.defaultLayout !== null ? { defaultLayout: data.defaultLayout } : {}),
    ...(data.layoutsDir !== undefined ? { layoutsDir: path.resolve(absRoot, data.layoutsDir) } : {}),
    strict: data.strict,
    concurrency: Math.max(1, Math.min(64, data.concurrency)),
  };
}

/**
 * Load `daybook.config.json` from the site root, apply overrides, and resolve
 *
 * A missing file is not an error: defaults apply.
 *
 * @throws {ConfigError} if the file is not valid JSON or fails validation
 */
export async function loadConfig(
  root: string,
  overrides: Partial<SiteConfigInput> = {}
): Promise<SiteConfig> {
  const file = path.join(path.resolve(root), CONFIG_FILE);
  let fromFile: unknown = {};

  try {
    const content = await readSource(file);
    // Strip BOM if present
    fromFile = JSON.parse(content.charCodeAt(0) === 0xfeff ? content.slice(1) : content);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(file, `invalid JSON: ${err.message}`, { cause: err });
    }
    if (!(err instanceof Error && errorCode(err.cause) === "ENOENT")) {
      throw err;
    }
  }

  if (typeof fromFile !== "object" || fromFile === null || Array.isArray(fromFile)) {
    throw new ConfigError(file, "expected a JSON object");
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return resolveConfig(root, { ...fromFile, ...defined }, file);
}
