/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseIndexName, parseIndexPattern, parseJson } from "../src/lib/arg.js";
import { CliError } from "../src/lib/errors.js";

describe("arg parsing", () => {
  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJson("[1,2,3]", "test")).toEqual([1, 2, 3]);
      expect(parseJson("null", "test")).toBe(null);
    });

    it("should handle BOM", () => {
      expect(parseJson("\uFEFF" + '{"a":1}', "test")).toEqual({ a: 1 });
    });

    it("should reject invalid JSON with descriptive error", () => {
      expect(() => parseJson("{invalid}", "test")).toThrow(CliError);
      expect(() => parseJson("{invalid}", "test")).toThrow("Invalid JSON in test");
    });

    it("should include source in error message", () => {
      expect(() => parseJson("{", "stdin")).toThrow("Invalid JSON in stdin");
      expect(() => parseJson("{", "--data")).toThrow("Invalid JSON in --data");
    });
  });

  describe("parseIndexName", () => {
    it("should accept and trim concrete index names", () => {
      expect(parseIndexName(".model-configs-000002")).toBe(".model-configs-000002");
      expect(parseIndexName("  idx-1 ")).toBe("idx-1");
    });

    it("should reject wildcards, lists and path segments", () => {
      for (const value of ["", "idx-*", "a,b", "a/b", "a\\b", ".", "..", "a b"]) {
        expect(() => parseIndexName(value)).toThrow(InvalidArgumentError);
      }
    });
  });

  describe("parseIndexPattern", () => {
    it("should accept wildcards and alternatives", () => {
      expect(parseIndexPattern(".model-configs-*")).toBe(".model-configs-*");
      expect(parseIndexPattern("a-*,b")).toBe("a-*,b");
    });

    it("should reject empty patterns and path separators", () => {
      expect(() => parseIndexPattern("  ")).toThrow(InvalidArgumentError);
      expect(() => parseIndexPattern("../*")).toThrow(
        "index pattern must not be empty or contain path separators"
      );
    });
  });
});
