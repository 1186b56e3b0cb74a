/**
 * CLI error handling and exit code mapping
 */

import { InvalidArgumentError } from "commander";
import { EXIT_CODE, QueryValidationError } from "@qshape/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.INTERNAL_ERROR;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: unknown/internal error
 * - 2: query rejected by the validator
 * - 3: invalid arguments or unreadable input
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof QueryValidationError) {
    return EXIT_CODE.INVALID_QUERY;
  }

  if (error instanceof InvalidArgumentError) {
    return EXIT_CODE.INVALID_ARGS;
  }

  if (error instanceof Error) {
    const name = error.name || error.constructor.name;
    if (name === "QueryValidationError") {
      return EXIT_CODE.INVALID_QUERY;
    }
    if (name === "InvalidArgumentError") {
      return EXIT_CODE.INVALID_ARGS;
    }
  }

  return EXIT_CODE.INTERNAL_ERROR;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
