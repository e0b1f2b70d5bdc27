/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseConcurrency, parseList } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseConcurrency", () => {
    it("should parse values in range", () => {
      expect(parseConcurrency("1")).toBe(1);
      expect(parseConcurrency(" 16 ")).toBe(16);
      expect(parseConcurrency("64")).toBe(64);
    });

    it("should reject non-integers", () => {
      expect(() => parseConcurrency("abc")).toThrow(InvalidArgumentError);
      expect(() => parseConcurrency("-1")).toThrow("concurrency must be a positive integer");
      expect(() => parseConcurrency("2.5")).toThrow("concurrency must be a positive integer");
    });

    it("should reject values out of range", () => {
      expect(() => parseConcurrency("0")).toThrow("concurrency must be between 1 and 64");
      expect(() => parseConcurrency("65")).toThrow("concurrency must be between 1 and 64");
    });
  });

  describe("parseList", () => {
    it("should split on commas and trim", () => {
      expect(parseList("a, b ,c")).toEqual(["a", "b", "c"]);
    });

    it("should drop blanks and duplicates", () => {
      expect(parseList("a,,b,a, ")).toEqual(["a", "b"]);
    });
  });
});
