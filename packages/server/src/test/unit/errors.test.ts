/**
 * Unit tests for error classification
 */

import { describe, it, expect } from "vitest";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { QueryValidationError } from "@qshape/sdk";
import { errorCodeOf, mapErrorToMcp } from "../../errors.js";
import { QueryToolInputSchema } from "../../schemas.js";

function zodErrorFor(args: unknown): unknown {
  const result = QueryToolInputSchema.safeParse(args);
  return result.success ? undefined : result.error;
}

describe("mapErrorToMcp", () => {
  it("should map zod failures to InvalidParams with issue paths", () => {
    const mapped = mapErrorToMcp(zodErrorFor({ query: {}, maxDepth: "3" }));
    expect(mapped.code).toBe(ErrorCode.InvalidParams);
    expect(mapped.message).toBe("Validation error: maxDepth: Expected number, received string");
  });

  it("should map range errors to InvalidParams", () => {
    expect(mapErrorToMcp(new RangeError("maxDepth must be a non-negative integer, got -1"))).toEqual({
      code: ErrorCode.InvalidParams,
      message: "maxDepth must be a non-negative integer, got -1",
    });
  });

  it("should map other errors to InternalError", () => {
    expect(mapErrorToMcp(new Error("boom"))).toEqual({ code: ErrorCode.InternalError, message: "boom" });
    expect(mapErrorToMcp("boom")).toEqual({ code: ErrorCode.InternalError, message: "boom" });
  });
});

describe("errorCodeOf", () => {
  it("should use the SDK error code", () => {
    expect(errorCodeOf(new QueryValidationError("UnknownOption", "goals.$.sort", "unknown"))).toBe("E_QUERY_SHAPE");
  });

  it("should label zod failures", () => {
    expect(errorCodeOf(zodErrorFor({ query: {}, systemNamespaces: 1 }))).toBe("E_INVALID_PARAMS");
  });

  it("should read string codes from system errors", () => {
    expect(errorCodeOf(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe("EACCES");
  });

  it("should fall back to UNKNOWN", () => {
    expect(errorCodeOf(new Error("plain"))).toBe("UNKNOWN");
    expect(errorCodeOf(Object.assign(new Error("numeric"), { code: 7 }))).toBe("UNKNOWN");
    expect(errorCodeOf(null)).toBe("UNKNOWN");
  });
});
