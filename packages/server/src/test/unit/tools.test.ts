/**
 * Unit tests for MCP tools
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { z } from "zod";
import {
  createToolHandlers,
  explainQuery,
  formatQueryTool,
  isToolName,
  toolDefinitions,
  validateQuery,
  TOOL_NAMES,
} from "../../tools.js";
import {
  ExplainQueryOutputSchema,
  FormatQueryOutputSchema,
  ValidateQueryOutputSchema,
} from "../../schemas.js";
import { metrics } from "../../observability/metrics.js";

beforeEach(() => {
  metrics.reset();
  // Tool calls log to stderr
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

function textOf(result: { content: Array<{ type: string }> }): string {
  const item = result.content[0];
  return item !== undefined && "text" in item && typeof item.text === "string" ? item.text : "";
}

describe("validate_query", () => {
  it("should return the normalized query", async () => {
    const result = await validateQuery({ query: { goals: { $: { where: { id: "goal-1" } } } } });

    expect(textOf(result)).toBe("Valid query with 1 top-level namespace");
    expect(result.isError).toBeUndefined();

    const output = ValidateQueryOutputSchema.parse(result.structuredContent);
    expect(output.status).toBe("ok");
    expect(result.structuredContent).toEqual({
      status: "ok",
      query: {
        namespaces: [
          {
            name: "goals",
            depth: 0,
            options: {
              where: {
                conditions: [
                  {
                    kind: "literal",
                    field: { key: "id", associations: [], attribute: "id" },
                    value: "goal-1",
                  },
                ],
              },
              pagination: { style: "none" },
              order: null,
              fields: null,
            },
            children: [],
          },
        ],
      },
    });
  });

  it("should count top-level namespaces", async () => {
    const result = await validateQuery({ query: { goals: {}, todos: {} } });
    expect(textOf(result)).toBe("Valid query with 2 top-level namespaces");
  });

  it("should return violations as results", async () => {
    const result = await validateQuery({ query: { goals: [] } });

    expect(textOf(result)).toBe(
      'Invalid query: ArrayWhereObjectExpected at goals: "goals" must be an object, got an array'
    );
    expect(result.structuredContent).toEqual({
      status: "error",
      error: {
        kind: "ArrayWhereObjectExpected",
        path: "goals",
        message: '"goals" must be an object, got an array',
      },
    });
  });

  it("should defer null queries", async () => {
    const result = await validateQuery({ query: null });

    expect(textOf(result)).toBe("Query deferred: a null query is not sent");
    expect(result.structuredContent).toEqual({ status: "deferred" });
  });

  it("should reject malformed arguments", async () => {
    await expect(validateQuery({ query: {}, maxDepth: -1 })).rejects.toBeInstanceOf(z.ZodError);
  });

  it("should record call and outcome metrics", async () => {
    await validateQuery({ query: { goals: {} } });
    await validateQuery({ query: { goals: [] } });

    expect(metrics.getCounter("qshape.tool.calls_total", { tool: "validate_query" })).toBe(2);
    expect(metrics.getCounter("qshape.tool.outcomes_total", { tool: "validate_query", status: "ok" })).toBe(1);
    expect(
      metrics.getCounter("qshape.tool.outcomes_total", {
        tool: "validate_query",
        status: "error",
        kind: "ArrayWhereObjectExpected",
      })
    ).toBe(1);
    expect(metrics.getCounter("qshape.tool.errors_total", { tool: "validate_query", err_code: "UNKNOWN" })).toBe(0);
    expect(metrics.getHistogram("qshape.tool.latency_ms", { tool: "validate_query" })?.count).toBe(2);
  });

  it("should log each successful call", async () => {
    await validateQuery({ query: { goals: {} } });

    const lines = vi
      .mocked(console.error)
      .mock.calls.map((call) => String(call[0]))
      .filter((line) => line.includes('"tool.success"'));
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: "info",
      event: "tool.success",
      tool: "validate_query",
    });
  });
});

describe("format_query", () => {
  it("should return canonical InstaQL", async () => {
    const result = await formatQueryTool({ query: { goals: { $: { limit: 5 } } } });

    expect(textOf(result)).toBe('{\n  "goals": {\n    "$": {\n      "limit": 5\n    }\n  }\n}\n');
    expect(FormatQueryOutputSchema.parse(result.structuredContent)).toEqual({
      status: "ok",
      instaql: { goals: { $: { limit: 5 } } },
    });
  });

  it("should drop empty option blocks", async () => {
    const result = await formatQueryTool({ query: { goals: { $: {}, todos: { $: { where: {} } } } } });

    expect(result.structuredContent).toEqual({
      status: "ok",
      instaql: { goals: { todos: { $: { where: {} } } } },
    });
  });

  it("should return violations as results", async () => {
    const result = await formatQueryTool({ query: { goals: { $: { order: { title: "up" } } } } });

    expect(result.structuredContent).toEqual({
      status: "error",
      error: {
        kind: "InvalidOrderDirection",
        path: "goals.$.order.title",
        message: 'order direction must be "asc" or "desc", got "up"',
      },
    });
  });
});

describe("explain_query", () => {
  it("should describe the query line by line", async () => {
    const result = await explainQuery({ query: { goals: { $: { where: { done: false } }, todos: {} } } });

    expect(textOf(result)).toBe("goals\n  where done = false\n  todos");
    expect(ExplainQueryOutputSchema.parse(result.structuredContent)).toEqual({
      status: "ok",
      lines: ["goals", "  where done = false", "  todos"],
    });
  });

  it("should report an empty query", async () => {
    const result = await explainQuery({ query: {} });

    expect(textOf(result)).toBe("Empty query");
    expect(result.structuredContent).toEqual({ status: "ok", lines: [] });
  });
});

describe("createToolHandlers", () => {
  it("should apply server defaults", async () => {
    const handlers = createToolHandlers({ maxDepth: 0 });
    const result = await handlers.validate_query({ query: { goals: { todos: {} } } });

    expect(result.structuredContent).toEqual({
      status: "error",
      error: {
        kind: "QueryTooDeep",
        path: "goals.todos",
        message: "namespace nesting exceeds maximum depth 0",
      },
    });
  });

  it("should let call options override defaults", async () => {
    const handlers = createToolHandlers({ maxDepth: 0 });
    const result = await handlers.validate_query({ query: { goals: { todos: {} } }, maxDepth: 1 });

    expect(result.structuredContent).toMatchObject({ status: "ok" });
  });

  it("should apply configured system namespaces", async () => {
    const handlers = createToolHandlers({ systemNamespaces: [] });
    const result = await handlers.explain_query({ query: { $users: {} } });

    expect(result.structuredContent).toEqual({
      status: "error",
      error: {
        kind: "InvalidNamespaceName",
        path: "$users",
        message: 'namespace "$users" is reserved; system namespaces allowed here: none',
      },
    });
  });

  it("should expose a handler per tool definition", () => {
    const handlers = createToolHandlers();
    expect(Object.keys(handlers).sort()).toEqual([...TOOL_NAMES].sort());
    expect(toolDefinitions.map((tool) => tool.name)).toEqual([...TOOL_NAMES]);
  });
});

describe("isToolName", () => {
  it("should recognise only known tools", () => {
    expect(isToolName("validate_query")).toBe(true);
    expect(isToolName("get_doc")).toBe(false);
    expect(isToolName("toString")).toBe(false);
  });
});
