/**
 * MCP tool implementations for qshape
 * Every tool returns a text item for people and structuredContent for programs.
 * A rejected query is a normal result, not a failed call.
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import {
  describeQuery,
  formatQuery,
  formatQueryError,
  toInstaQL,
  validate,
} from "@qshape/sdk";
import type { QueryError, ValidationOutcome, ValidatorOptions } from "@qshape/sdk";
import {
  QueryToolInputSchema,
  MAX_DEPTH_LIMIT,
  type ExplainQueryOutput,
  type FormatQueryOutput,
  type QueryToolInput,
  type ValidateQueryOutput,
} from "./schemas.js";
import { errorCodeOf } from "./errors.js";
import { logger } from "./observability/logger.js";
import { recordQueryOutcome, recordToolExecution } from "./observability/metrics.js";

export const TOOL_NAMES = ["validate_query", "format_query", "explain_query"] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((candidate) => candidate === name);
}

// Helper to wrap tool execution with logging and metrics
async function executeTool<T>(toolName: ToolName, handler: () => T | Promise<T>): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let errCode: string | undefined;

  try {
    const result = await handler();
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    errCode = errorCodeOf(err);
    throw error;
  } finally {
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, errCode, error);
    recordToolExecution(toolName, duration, success, errCode);
  }
}

// Per-call options win over the server's configured defaults
function resolveOptions(input: QueryToolInput, defaults: ValidatorOptions): ValidatorOptions {
  return {
    maxDepth: input.maxDepth ?? defaults.maxDepth,
    systemNamespaces: input.systemNamespaces ?? defaults.systemNamespaces,
  };
}

function evaluate(toolName: ToolName, input: QueryToolInput, defaults: ValidatorOptions): ValidationOutcome {
  const outcome = validate(input.query, resolveOptions(input, defaults));
  recordQueryOutcome(toolName, outcome.status, outcome.status === "error" ? outcome.error.kind : undefined);
  return outcome;
}

function toolResult(text: string, json: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text }],
    structuredContent: json,
  };
}

function rejected(error: QueryError): CallToolResult {
  return toolResult(`Invalid query: ${formatQueryError(error)}`, { status: "error", error });
}

const DEFERRED_TEXT = "Query deferred: a null query is not sent";

/**
 * validate_query: Validate a query and return its normalized form
 */
export async function validateQuery(args: unknown, defaults: ValidatorOptions = {}): Promise<CallToolResult> {
  const input = QueryToolInputSchema.parse(args);

  return executeTool("validate_query", () => {
    const outcome = evaluate("validate_query", input, defaults);
    switch (outcome.status) {
      case "ok": {
        const count = outcome.query.namespaces.length;
        const json: ValidateQueryOutput = { status: "ok", query: outcome.query };
        return toolResult(`Valid query with ${count} top-level namespace${count === 1 ? "" : "s"}`, json);
      }
      case "deferred": {
        const json: ValidateQueryOutput = { status: "deferred" };
        return toolResult(DEFERRED_TEXT, json);
      }
      case "error":
        return rejected(outcome.error);
    }
  });
}

/**
 * format_query: Return the canonical InstaQL form of a valid query
 */
export async function formatQueryTool(args: unknown, defaults: ValidatorOptions = {}): Promise<CallToolResult> {
  const input = QueryToolInputSchema.parse(args);

  return executeTool("format_query", () => {
    const outcome = evaluate("format_query", input, defaults);
    switch (outcome.status) {
      case "ok": {
        const json: FormatQueryOutput = { status: "ok", instaql: toInstaQL(outcome.query) };
        return toolResult(formatQuery(outcome.query), json);
      }
      case "deferred": {
        const json: FormatQueryOutput = { status: "deferred" };
        return toolResult(DEFERRED_TEXT, json);
      }
      case "error":
        return rejected(outcome.error);
    }
  });
}

/**
 * explain_query: Describe a valid query, one line per namespace and option
 */
export async function explainQuery(args: unknown, defaults: ValidatorOptions = {}): Promise<CallToolResult> {
  const input = QueryToolInputSchema.parse(args);

  return executeTool("explain_query", () => {
    const outcome = evaluate("explain_query", input, defaults);
    switch (outcome.status) {
      case "ok": {
        const lines = describeQuery(outcome.query);
        const json: ExplainQueryOutput = { status: "ok", lines };
        return toolResult(lines.length > 0 ? lines.join("\n") : "Empty query", json);
      }
      case "deferred": {
        const json: ExplainQueryOutput = { status: "deferred" };
        return toolResult(DEFERRED_TEXT, json);
      }
      case "error":
        return rejected(outcome.error);
    }
  });
}

const queryInputSchema: Tool["inputSchema"] = {
  type: "object",
  properties: {
    query: {
      description:
        "InstaQL query: an object keyed by namespace, with options under \"$\" (where, order, fields, limit/offset, first/after, last/before). null defers the query.",
    },
    maxDepth: {
      type: "integer",
      minimum: 0,
      maximum: MAX_DEPTH_LIMIT,
      description: "Maximum namespace or logical nesting depth (default 32)",
    },
    systemNamespaces: {
      type: "array",
      items: { type: "string" },
      description: "$-prefixed namespaces allowed at the root (default [\"$users\", \"$files\"])",
    },
  },
  required: ["query"],
};

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "validate_query",
    description: "Validate an InstaQL query and return its normalized form, or the first violation",
    inputSchema: queryInputSchema,
  },
  {
    name: "format_query",
    description: "Return the canonical InstaQL form of a valid query",
    inputSchema: queryInputSchema,
  },
  {
    name: "explain_query",
    description: "Describe a valid query in plain text, one line per namespace and option",
    inputSchema: queryInputSchema,
  },
];

/**
 * Tool handlers bound to the server's default validator options
 */
export function createToolHandlers(defaults: ValidatorOptions = {}): Record<ToolName, ToolHandler> {
  return {
    validate_query: (args) => validateQuery(args, defaults),
    format_query: (args) => formatQueryTool(args, defaults),
    explain_query: (args) => explainQuery(args, defaults),
  };
}
