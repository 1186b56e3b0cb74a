/**
 * Server configuration from the environment
 */

import type { ValidatorOptions } from "@qshape/sdk";
import { ServerConfigSchema } from "./schemas.js";

/**
 * Whether the server should start (MCP_QSHAPE_ENABLED, default enabled)
 */
export function isServerEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.MCP_QSHAPE_ENABLED !== "false";
}

/**
 * Default validator options from QSHAPE_MAX_DEPTH and QSHAPE_SYSTEM_NAMESPACES
 * @throws ZodError when a variable is malformed
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ValidatorOptions {
  const parsed = ServerConfigSchema.parse(env);
  return {
    maxDepth: parsed.QSHAPE_MAX_DEPTH,
    systemNamespaces: parsed.QSHAPE_SYSTEM_NAMESPACES,
  };
}
