import { describe, it, expect } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { withTempDir } from "@daybook/testkit";
import { loadConfig, resolveConfig, CONFIG_FILE } from "./config.js";
import { ConfigError } from "./errors.js";

describe("resolveConfig", () => {
  it("should apply defaults and resolve paths against the root", () => {
    expect(resolveConfig("/site")).toEqual({
      root: "/site",
      title: "Daybook",
      source: "/site/_posts",
      destination: "/site/_site",
      permalink: "/:year/:month/:day/:slug/",
      excerptSeparator: "\n\n",
      defaultLayout: "post",
      strict: false,
      concurrency: 16,
    });
  });

  it("should drop the default layout when set to null", () => {
    expect(resolveConfig("/site", { defaultLayout: null }).defaultLayout).toBeUndefined();
  });

  it("should clamp concurrency to 1-64", () => {
    expect(resolveConfig("/site", { concurrency: 0 }).concurrency).toBe(1);
    expect(resolveConfig("/site", { concurrency: 500 }).concurrency).toBe(64);
  });

  it("should resolve the layouts directory", () => {
    expect(resolveConfig("/site", { layoutsDir: "_layouts" }).layoutsDir).toBe("/site/_layouts");
  });

  it("should reject unknown keys and wrong types", () => {
    expect(() => resolveConfig("/site", { strict: "yes" })).toThrow(ConfigError);
    expect(() => resolveConfig("/site", { colour: "red" })).toThrow(ConfigError);
  });

  it("should name the field in the message", () => {
    expect(() => resolveConfig("/site", { concurrency: 1.5 }, "flags")).toThrow(
      /^Invalid configuration in flags: concurrency: /
    );
  });
});

describe("loadConfig", () => {
  it("should use defaults when the file is missing", async () => {
    await withTempDir(async (root) => {
      const config = await loadConfig(root);
      expect(config.source).toBe(join(root, "_posts"));
      expect(config.title).toBe("Daybook");
    });
  });

  it("should read the file and let overrides win", async () => {
    await withTempDir(async (root) => {
      await writeFile(
        join(root, CONFIG_FILE),
        JSON.stringify({ title: "Notes", destination: "public", strict: true })
      );

      const config = await loadConfig(root, { strict: false, concurrency: undefined });

      expect(config.title).toBe("Notes");
      expect(config.destination).toBe(join(root, "public"));
      expect(config.strict).toBe(false);
      expect(config.concurrency).toBe(16);
    });
  });

  it("should reject invalid JSON", async () => {
    await withTempDir(async (root) => {
      await writeFile(join(root, CONFIG_FILE), "{ nope");
      await expect(loadConfig(root)).rejects.toThrow(ConfigError);
    });
  });

  it("should reject a file that is not an object", async () => {
    await withTempDir(async (root) => {
      await writeFile(join(root, CONFIG_FILE), "[1, 2]");
      await expect(loadConfig(root)).rejects.toThrow(
        `Invalid configuration in ${join(root, CONFIG_FILE)}: expected a JSON object`
      );
    });
  });
});
