/**
 * Unit tests for command timing
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigError, logger, type LogEntry } from "@daybook/core";
import { timeCommand } from "../src/lib/telemetry.js";

describe("timeCommand", () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    logger.setEnabled(true);
    logger.setSink((_line, entry) => {
      entries.push(entry);
    });
  });

  afterEach(() => {
    logger.setSink();
  });

  it("should return the result and log the command end", async () => {
    expect(await timeCommand("list", "/site", async () => 42)).toBe(42);

    const end = entries.find((e) => e.event === "command.end");
    expect(end?.message).toBe("/site");
    expect(end?.details?.command).toBe("list");
    expect(typeof end?.details?.durationMs).toBe("number");
  });

  it("should log the error code and rethrow", async () => {
    const error = new ConfigError("daybook.config.json", "expected a JSON object");

    await expect(
      timeCommand("build", "/site", async () => {
        throw error;
      })
    ).rejects.toBe(error);

    const failed = entries.filter((e) => e.event === "command.failed");
    expect(failed).toHaveLength(1);
    expect(failed[0].level).toBe("error");
    expect(failed[0].message).toBe("Invalid configuration in daybook.config.json: expected a JSON object");
    expect(failed[0].details).toMatchObject({ command: "build", code: "E_CONFIG" });
  });
});
