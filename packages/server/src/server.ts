#!/usr/bin/env node

/**
 * MCP server for qshape
 * Exposes query validation, formatting and explanation via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { isServerEnabled, loadServerConfig } from "./config.js";
import { errorCodeOf, mapErrorToMcp } from "./errors.js";
import { createToolHandlers, isToolName, toolDefinitions } from "./tools.js";
import { logger } from "./observability/logger.js";

/**
 * Create and configure the MCP server
 */
async function main(): Promise<void> {
  // Override console methods to prevent accidental stdout pollution
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  if (!isServerEnabled()) {
    console.error("MCP qshape server is disabled (MCP_QSHAPE_ENABLED=false)");
    return;
  }

  const defaults = loadServerConfig();
  const toolHandlers = createToolHandlers(defaults);

  const server = new Server(
    {
      name: "qshape-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolDefinitions };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return await toolHandlers[name](args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCodeOf(error),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    max_depth: defaults.maxDepth ?? "default",
    system_namespaces: defaults.systemNamespaces ?? "default",
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    await transport.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
