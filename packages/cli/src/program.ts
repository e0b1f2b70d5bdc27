/**
 * Daybook CLI commands
 */

import * as path from "node:path";
import { Command, CommanderError } from "commander";
import {
  createLayoutRegistry,
  createRenderer,
  exitCodeFor,
  generateSlug,
  InvalidDateError,
  loadConfig,
  logger,
  parseIsoDate,
  renderSite,
  runBuild,
  summarizeReport,
  toPostDate,
  UnknownLayoutError,
  writeSite,
} from "@daybook/core";
import type {
  BuildResult,
  Document,
  LayoutRegistry,
  PostDate,
  SiteConfig,
  SiteConfigInput,
} from "@daybook/core";
import { resolveRoot } from "./lib/env.js";
import { parseConcurrency, parseList } from "./lib/arg.js";
import { writeNewFile } from "./lib/io.js";
import {
  colorize,
  documentLine,
  printJson,
  printLines,
  reportProblems,
  reportToJson,
} from "./lib/render.js";
import { CliError, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { timeCommand } from "./lib/telemetry.js";

export const VERSION = "0.1.0";

interface GlobalOptions {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface BuildFlags {
  dest?: string;
  strict?: boolean;
  concurrency?: number;
  json?: boolean;
}

interface CheckFlags {
  strict?: boolean;
  json?: boolean;
}

interface ListFlags {
  tag?: string;
  json?: boolean;
}

interface NewFlags {
  date?: string;
  layout?: string;
  tags?: string[];
}

interface Site {
  config: SiteConfig;
  layouts: LayoutRegistry;
  result: BuildResult;
}

async function buildSite(globals: GlobalOptions, overrides: Partial<SiteConfigInput> = {}): Promise<Site> {
  const config = await loadConfig(resolveRoot(globals.root), overrides);
  const layouts = await createLayoutRegistry(
    config.layoutsDir !== undefined ? { layoutsDir: config.layoutsDir } : {}
  );
  const result = await runBuild(config, { layouts });
  return { config, layouts, result };
}

function postDate(value: string | undefined): PostDate {
  const now = new Date();
  const date =
    value === undefined
      ? toPostDate(now.getFullYear(), now.getMonth() + 1, now.getDate())
      : parseIsoDate(value.trim());
  if (!date) {
    throw new InvalidDateError(value ?? now.toISOString());
  }
  return date;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function listEntry(document: Document): Record<string, unknown> {
  return {
    id: document.id,
    date: document.date.iso,
    title: document.title,
    permalink: document.permalink,
    tags: document.tags,
  };
}

/**
 * Build the command tree. Errors surface as thrown CommanderError/CliError
 * instead of exiting the process.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("daybook")
    .description("Daybook - build a dated post corpus into a static site")
    .version(VERSION)
    .option("--root <path>", "Site root (default: DAYBOOK_ROOT or current directory)")
    .option("--verbose", "Show build logs and error causes")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program.hook("preAction", () => {
    logger.setEnabled(Boolean(globals().verbose));
  });

  // Build command
  program
    .command("build")
    .description("Build every post and write the site")
    .option("--dest <path>", "Output directory (default: _site under the root)")
    .option("--strict", "Fail on any failure or warning")
    .option("--concurrency <n>", "Documents built in parallel (1-64)", parseConcurrency)
    .option("--json", "Print the build report as JSON")
    .action(async (flags: BuildFlags) => {
      await timeCommand("build", resolveRoot(globals().root), async () => {
        const opts = globals();
        const { config, layouts, result } = await buildSite(opts, {
          destination: flags.dest !== undefined ? path.resolve(flags.dest) : undefined,
          strict: flags.strict,
          concurrency: flags.concurrency,
        });

        const renderer = createRenderer({
          layouts,
          site: { title: config.title, ...(config.url !== undefined ? { url: config.url } : {}) },
        });
        const written = await writeSite(renderSite(result, renderer), config.destination, config.concurrency);

        if (flags.json) {
          printJson({ ...reportToJson(result.report), written: written.length });
        } else {
          reportProblems(result.report).forEach((line) => console.error(line));
          if (!opts.quiet) {
            console.log(
              `${summarizeReport(result.report)}; wrote ${plural(written.length, "page")} to ${config.destination}`
            );
          }
        }

        if (exitCodeFor(result.report, config.strict) !== 0) {
          throw new CliError("Build failed in strict mode");
        }
      });
    });

  // Check command
  program
    .command("check")
    .description("Build every post without writing output")
    .option("--strict", "Fail on any failure or warning")
    .option("--json", "Print the build report as JSON")
    .action(async (flags: CheckFlags) => {
      await timeCommand("check", resolveRoot(globals().root), async () => {
        const opts = globals();
        const { config, result } = await buildSite(opts, { strict: flags.strict });

        if (flags.json) {
          printJson(reportToJson(result.report));
        } else {
          reportProblems(result.report).forEach((line) => console.error(line));
          if (!opts.quiet) {
            console.log(summarizeReport(result.report, "Checked"));
          }
        }

        if (exitCodeFor(result.report, config.strict) !== 0) {
          throw new CliError("Check failed in strict mode");
        }
      });
    });

  // List command
  program
    .command("list")
    .description("List published posts, newest first")
    .option("--tag <tag>", "Only posts with this tag")
    .option("--json", "Output as JSON")
    .action(async (flags: ListFlags) => {
      await timeCommand("list", resolveRoot(globals().root), async () => {
        const { result } = await buildSite(globals());
        const documents =
          flags.tag !== undefined ? (result.index.tags.get(flags.tag) ?? []) : result.index.chronological;

        if (flags.json) {
          printJson(documents.map(listEntry));
        } else {
          printLines(documents.map(documentLine));
        }
      });
    });

  // Tags command
  program
    .command("tags")
    .description("Count published posts per tag")
    .option("--json", "Output as JSON")
    .action(async (flags: { json?: boolean }) => {
      await timeCommand("tags", resolveRoot(globals().root), async () => {
        const { result } = await buildSite(globals());
        const counts = [...result.index.tags].map(([tag, documents]) => [tag, documents.length] as const);

        if (flags.json) {
          printJson(Object.fromEntries(counts));
        } else {
          printLines(counts.map(([tag, count]) => `${tag} (${count})`));
        }
      });
    });

  // Show command
  program
    .command("show <id>")
    .description("Print a document record as JSON")
    .action(async (id: string) => {
      await timeCommand("show", resolveRoot(globals().root), async () => {
        const { result } = await buildSite(globals());
        const document = result.documents.find((doc) => doc.id === id);
        if (!document) {
          throw new CliError(`Document not found: ${id}`, { exitCode: 2 });
        }
        printJson(document);
      });
    });

  // New command
  program
    .command("new <title>")
    .description("Create a post file with front matter")
    .option("--date <YYYY-MM-DD>", "Post date (default: today)")
    .option("--layout <name>", "Layout for the post")
    .option("--tags <list>", "Comma-separated tags", parseList)
    .action(async (title: string, flags: NewFlags) => {
      await timeCommand("new", resolveRoot(globals().root), async () => {
        const opts = globals();
        const config = await loadConfig(resolveRoot(opts.root));
        const date = postDate(flags.date);
        const slug = generateSlug(title);

        const lines = ["---"];
        if (flags.layout !== undefined) {
          const layouts = await createLayoutRegistry(
            config.layoutsDir !== undefined ? { layoutsDir: config.layoutsDir } : {}
          );
          if (!layouts.has(flags.layout)) {
            throw new UnknownLayoutError(flags.layout, layouts.names());
          }
          lines.push(`layout: ${flags.layout}`);
        }
        lines.push(`title: ${JSON.stringify(title)}`);
        if (flags.tags !== undefined && flags.tags.length > 0) {
          lines.push(`tags: ${JSON.stringify(flags.tags)}`);
        }
        lines.push("---", "", "");

        const filePath = path.join(config.source, `${date.iso}-${slug}.md`);
        await writeNewFile(filePath, lines.join("\n"));

        if (!opts.quiet) {
          console.log(`Created ${filePath}`);
        }
      });
    });

  return program;
}

/**
 * Parse argv and run one command; resolves to the process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    // Commander has already printed its own message (or help/version)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = Boolean(program.opts<GlobalOptions>().verbose);
    console.error(`Error: ${formatCliError(err, verbose)}`);
    return mapErrorToExitCode(err);
  }
}
