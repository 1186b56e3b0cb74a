/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { parseNonNegativeInt, parseNamespaceList, parseJson } from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt("1", "test")).toBe(1);
      expect(parseNonNegativeInt(" 32 ", "test")).toBe(32);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-1", "test")).toThrow("test must be a non-negative integer");
    });

    it("should reject non-numeric and fractional input", () => {
      expect(() => parseNonNegativeInt("abc", "test")).toThrow("must be a non-negative integer");
      expect(() => parseNonNegativeInt("1.5", "test")).toThrow("must be a non-negative integer");
      expect(() => parseNonNegativeInt("", "test")).toThrow("must be a non-negative integer");
    });

    it("should reject values > 1000", () => {
      expect(() => parseNonNegativeInt("1001", "--max-depth")).toThrow("--max-depth must be <= 1000");
    });

    it("should allow exactly 1000", () => {
      expect(parseNonNegativeInt("1000", "test")).toBe(1000);
    });
  });

  describe("parseNamespaceList", () => {
    it("should split and trim entries", () => {
      expect(parseNamespaceList("$users, $files", "test")).toEqual(["$users", "$files"]);
    });

    it("should drop empty entries", () => {
      expect(parseNamespaceList("", "test")).toEqual([]);
      expect(parseNamespaceList("$users,,", "test")).toEqual(["$users"]);
    });

    it("should reject entries without a $ prefix", () => {
      expect(() => parseNamespaceList("users", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNamespaceList("$users,files", "test")).toThrow('"files"');
    });

    it("should reject a bare $", () => {
      expect(() => parseNamespaceList("$", "test")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJson("[1,2,3]", "test")).toEqual([1, 2, 3]);
      expect(parseJson("null", "test")).toBe(null);
    });

    it("should handle BOM", () => {
      const withBOM = "﻿" + '{"a":1}';
      expect(parseJson(withBOM, "test")).toEqual({ a: 1 });
    });

    it("should reject invalid JSON with descriptive error", () => {
      expect(() => parseJson("{invalid}", "test")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{invalid}", "test")).toThrow("Invalid JSON in test");
    });

    it("should include source in error message", () => {
      expect(() => parseJson("{", "stdin")).toThrow("stdin");
      expect(() => parseJson("{", "--data")).toThrow("--data");
    });
  });
});
