/**
 * Error classification for MCP responses and logs
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { QShapeError } from "@qshape/sdk";

/**
 * Stable code for logs and metrics
 */
export function errorCodeOf(error: unknown): string {
  if (error instanceof QShapeError) {
    return error.code;
  }
  if (error instanceof z.ZodError) {
    return "E_INVALID_PARAMS";
  }
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "UNKNOWN";
}

/**
 * Map tool failures to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ")}`,
    };
  }

  if (error instanceof RangeError) {
    return {
      code: ErrorCode.InvalidParams,
      message: error.message,
    };
  }

  if (error instanceof Error) {
    return {
      code: ErrorCode.InternalError,
      message: error.message,
    };
  }

  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}
