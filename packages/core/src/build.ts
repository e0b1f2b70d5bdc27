/**
 * Build orchestration
 *
 * scan → per-document workers → barrier → index → collision check
 *
 * Invariants:
 * - Each worker owns one document; nothing mutable is shared between workers
 * - The index is built only after every worker has finished
 * - A DaybookError for one document excludes that document and nothing else
 */

import { collectSources } from "./scanner.js";
import { buildDocument } from "./document.js";
import { buildSiteIndex, detectPermalinkCollisions } from "./site-index.js";
import { createLayoutRegistry, type LayoutRegistry } from "./layouts.js";
import { readSource } from "./io.js";
import { mapPool } from "./pool.js";
import { DaybookError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { BuildMetrics } from "./observability/metrics.js";
import type { SiteConfig } from "./config.js";
import type {
  BuildFailure,
  BuildReport,
  BuildResult,
  Diagnostic,
  Document,
  SourceFile,
} from "./types.js";

export interface BuildOptions {
  /** Layouts documents may name (default: built-ins plus `config.layoutsDir`) */
  layouts?: LayoutRegistry;
  metrics?: BuildMetrics;
}

type WorkerOutcome =
  | { ok: true; document: Document; diagnostics: Diagnostic[] }
  | { ok: false; failure: BuildFailure };

async function buildOne(
  file: SourceFile,
  config: SiteConfig,
  layouts: readonly string[],
  metrics: BuildMetrics
): Promise<WorkerOutcome> {
  const start = performance.now();
  try {
    const content = await readSource(file.path);
    const built = buildDocument(file, content, {
      permalink: config.permalink,
      excerptSeparator: config.excerptSeparator,
      layouts,
      strict: config.strict,
      ...(config.defaultLayout !== undefined ? { defaultLayout: config.defaultLayout } : {}),
    });
    logger.debug("document.built", { id: file.id, details: { diagnostics: built.diagnostics.length } });
    return { ok: true, ...built };
  } catch (err) {
    if (err instanceof DaybookError) {
      logger.warn("document.failed", { id: file.id, message: err.message, details: { code: err.code } });
      return { ok: false, failure: { file: file.fileName, documentId: file.id, error: err } };
    }
    throw err;
  } finally {
    metrics.recordDocument(file.id, performance.now() - start);
  }
}

/**
 * Build every post under `config.source`
 *
 * Fatal per-document errors land in `report.failures`; soft problems in
 * `report.diagnostics`. Only unexpected errors reject.
 */
export async function runBuild(config: SiteConfig, options: BuildOptions = {}): Promise<BuildResult> {
  const metrics = options.metrics ?? new BuildMetrics();
  const layouts =
    options.layouts ??
    (await createLayoutRegistry(config.layoutsDir !== undefined ? { layoutsDir: config.layoutsDir } : {}));

  logger.info("build.start", {
    message: config.source,
    details: { concurrency: config.concurrency, strict: config.strict },
  });

  const scanned = await metrics.phase("scan", () => collectSources(config.source));
  const failures: BuildFailure[] = scanned.failures.map(({ fileName, error }) => {
    logger.warn("document.failed", { file: fileName, message: error.message, details: { code: error.code } });
    return { file: fileName, error };
  });

  const names = layouts.names();
  const outcomes = await metrics.phase("documents", () =>
    mapPool(scanned.files, config.concurrency, (file) => buildOne(file, config, names, metrics))
  );

  let documents: Document[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      documents.push(outcome.document);
      diagnostics.push(...outcome.diagnostics);
    } else {
      failures.push(outcome.failure);
    }
  }

  const index = metrics.phaseSync("index", () => {
    const first = buildSiteIndex(documents);
    const collisions = detectPermalinkCollisions(first);
    if (collisions.length === 0) {
      return first;
    }
    for (const collision of collisions) {
      logger.warn("document.failed", {
        id: collision.documentId,
        message: collision.error.message,
        details: { code: collision.error.code },
      });
    }
    failures.push(...collisions);
    const excluded = new Set(collisions.map((c) => c.documentId));
    documents = documents.filter((doc) => !excluded.has(doc.id));
    return buildSiteIndex(documents);
  });

  for (const diagnostic of diagnostics) {
    logger.warn(diagnostic.code === "MISSING_LAYOUT" ? "layout.missing" : "reference.unresolved", {
      id: diagnostic.documentId,
      message: diagnostic.message,
    });
  }

  failures.sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));

  const report: BuildReport = {
    documents: documents.length,
    failures,
    diagnostics,
    timings: metrics.timings(),
    ok: failures.length === 0 && !(config.strict && diagnostics.length > 0),
  };

  logger.info("build.end", {
    message: `${report.documents} documents, ${failures.length} failed`,
    details: { ...report.timings, p95: metrics.p95(), slowest: metrics.slowest(3) },
  });

  return { documents, index, report };
}

/**
 * Process exit status for a finished build
 *
 * Non-strict builds always succeed; strict builds fail on any failure or
 * diagnostic.
 */
export function exitCodeFor(report: BuildReport, strict: boolean): number {
  if (!strict) {
    return 0;
  }
  return report.failures.length > 0 || report.diagnostics.length > 0 ? 1 : 0;
}

/**
 * One-line human summary of a report
 */
export function summarizeReport(report: BuildReport, verb = "Built"): string {
  const parts = [`${report.documents} document${report.documents === 1 ? "" : "s"}`];
  if (report.failures.length > 0) {
    parts.push(`${report.failures.length} failed`);
  }
  if (report.diagnostics.length > 0) {
    parts.push(`${report.diagnostics.length} warning${report.diagnostics.length === 1 ? "" : "s"}`);
  }
  return `${verb} ${parts.join(", ")} in ${report.timings.total}ms`;
}
