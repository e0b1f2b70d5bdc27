/**
 * Output rendering helpers
 */

import type { BuildReport, Document } from "@daybook/core";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout, indented
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * JSON-safe view of a build report (errors flattened to code and message)
 */
export function reportToJson(report: BuildReport): Record<string, unknown> {
  return {
    ok: report.ok,
    documents: report.documents,
    failures: report.failures.map((failure) => ({
      file: failure.file,
      ...(failure.documentId !== undefined ? { documentId: failure.documentId } : {}),
      code: failure.error.code,
      message: failure.error.message,
    })),
    diagnostics: report.diagnostics,
    timings: report.timings,
  };
}

/**
 * Problem lines for a report, failures first
 */
export function reportProblems(report: BuildReport): string[] {
  return [
    ...report.failures.map((failure) => `${failure.file}: ${failure.error.message}`),
    ...report.diagnostics.map((diagnostic) => `warning: ${diagnostic.message}`),
  ];
}

/**
 * One line per document: date, title and permalink
 */
export function documentLine(document: Document): string {
  return `${document.date.iso}  ${document.title}  ${document.permalink}`;
}
