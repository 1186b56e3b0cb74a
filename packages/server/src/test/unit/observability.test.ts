/**
 * Unit tests for server logging and metrics
 */

import { describe, it, expect } from "vitest";
import { Logger, parseLogLevel } from "../../observability/logger.js";
import { MetricsRegistry } from "../../observability/metrics.js";

describe("Logger", () => {
  function capture(level: Parameters<typeof parseLogLevel>[0]): { logger: Logger; lines: string[] } {
    const lines: string[] = [];
    return { logger: new Logger(parseLogLevel(level), (line) => lines.push(line)), lines };
  }

  it("should write JSON lines with timestamp, level and event", () => {
    const { logger, lines } = capture("info");
    logger.info("server.start", { max_depth: 4 });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({ level: "info", event: "server.start", max_depth: 4 });
    expect(entry).toHaveProperty("ts");
  });

  it("should drop events below the minimum level", () => {
    const { logger, lines } = capture("warn");
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map((line) => String(JSON.parse(line).event))).toEqual(["c", "d"]);
  });

  it("should log tool failures with code and message", () => {
    const { logger, lines } = capture("info");
    logger.toolCall("format_query", 3, false, "E_INVALID_PARAMS", new Error("bad args"));

    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: "error",
      event: "tool.error",
      tool: "format_query",
      duration_ms: 3,
      err_code: "E_INVALID_PARAMS",
      err_message: "bad args",
    });
  });

  it("should default unknown LOG_LEVEL values to info", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("error")).toBe("error");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});

describe("MetricsRegistry", () => {
  it("should count per label set", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls", { tool: "a" });
    registry.inc("calls", { tool: "a" });
    registry.inc("calls", { tool: "b" });

    expect(registry.getCounter("calls", { tool: "a" })).toBe(2);
    expect(registry.getCounter("calls", { tool: "b" })).toBe(1);
    expect(registry.getCounter("calls")).toBe(0);
  });

  it("should treat label order as irrelevant", () => {
    const registry = new MetricsRegistry();
    registry.inc("outcomes", { tool: "a", status: "ok" });

    expect(registry.getCounter("outcomes", { status: "ok", tool: "a" })).toBe(1);
  });

  it("should compute percentiles", () => {
    const registry = new MetricsRegistry();
    for (let i = 1; i <= 100; i++) {
      registry.observe("latency", i);
    }

    expect(registry.getHistogram("latency")).toEqual({ count: 100, sum: 5050, p50: 50, p95: 95, p99: 99 });
  });

  it("should keep a bounded window of samples", () => {
    const registry = new MetricsRegistry();
    for (let i = 1; i <= 1001; i++) {
      registry.observe("latency", i);
    }

    const stats = registry.getHistogram("latency");
    expect(stats?.count).toBe(1000);
    expect(stats?.sum).toBe(501500);
  });

  it("should return null for unknown histograms", () => {
    expect(new MetricsRegistry().getHistogram("missing")).toBeNull();
  });

  it("should list all metrics by key", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls", { tool: "a" });
    registry.observe("latency", 4, { tool: "a" });

    const all = registry.getAllMetrics();
    expect(all.counters).toEqual({ 'calls{tool="a"}': 1 });
    expect(all.histograms['latency{tool="a"}']).toEqual({ count: 1, sum: 4, p50: 4, p95: 4, p99: 4 });
  });

  it("should reset", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls");
    registry.reset();
    expect(registry.getAllMetrics()).toEqual({ counters: {}, histograms: {} });
  });
});
