/**
 * Environment and configuration resolution
 */

import type { ValidatorOptions } from "@qshape/sdk";
import { parseNamespaceList, parseNonNegativeInt } from "./arg.js";

/**
 * Validator settings as they arrive from flags (already parsed by commander)
 */
export interface ValidatorFlags {
  maxDepth?: number;
  systemNamespaces?: string[];
}

/**
 * Resolve validator options
 * Priority: CLI flag > QSHAPE_* env var > SDK default
 */
export function resolveValidatorOptions(
  flags: ValidatorFlags = {},
  env: NodeJS.ProcessEnv = process.env
): ValidatorOptions {
  const options: ValidatorOptions = {};

  const maxDepth =
    flags.maxDepth ??
    (env.QSHAPE_MAX_DEPTH !== undefined
      ? parseNonNegativeInt(env.QSHAPE_MAX_DEPTH, "QSHAPE_MAX_DEPTH")
      : undefined);
  if (maxDepth !== undefined) {
    options.maxDepth = maxDepth;
  }

  const systemNamespaces =
    flags.systemNamespaces ??
    (env.QSHAPE_SYSTEM_NAMESPACES !== undefined
      ? parseNamespaceList(env.QSHAPE_SYSTEM_NAMESPACES, "QSHAPE_SYSTEM_NAMESPACES")
      : undefined);
  if (systemNamespaces !== undefined) {
    options.systemNamespaces = systemNamespaces;
  }

  return options;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.QSHAPE_CLI_DEBUG === "1";
}
