/**
 * Command timing, reported through the build logger
 */

import { DaybookError, logger } from "@daybook/core";

/**
 * Run one command; logs `command.end` with its duration, or `command.failed`
 * with the error (and its code for build errors) before rethrowing
 */
export async function timeCommand<T>(command: string, root: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  logger.debug("command.start", { message: root, details: { command } });

  try {
    const result = await fn();
    logger.info("command.end", { message: root, details: { command, durationMs: Date.now() - start } });
    return result;
  } catch (err) {
    logger.error("command.failed", {
      message: err instanceof Error ? err.message : String(err),
      details: {
        command,
        durationMs: Date.now() - start,
        ...(err instanceof DaybookError ? { code: err.code } : {}),
      },
    });
    throw err;
  }
}
