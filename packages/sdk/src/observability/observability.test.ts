import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { metrics } from "./metrics.js";
import { formatLogEntry, logger } from "./logs.js";
import { validate } from "../validation.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should count outcomes and rejection kinds", () => {
    validate(null);
    validate({ goals: {} });
    validate({ goals: [] });
    validate({ goals: [] });

    const snapshot = metrics.getMetrics();
    expect(snapshot.ok).toBe(1);
    expect(snapshot.deferred).toBe(1);
    expect(snapshot.error).toBe(2);
    expect(snapshot.errorsByKind).toEqual({ ArrayWhereObjectExpected: 2 });
    expect(snapshot.durationMs).toHaveLength(3);
    expect(metrics.getRejectionRate()).toBeCloseTo(2 / 3);
  });

  it("should keep a bounded sample buffer", () => {
    for (let i = 0; i < 150; i++) {
      metrics.recordOutcome("ok", i);
    }
    const samples = metrics.getMetrics().durationMs;
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(50);
  });

  it("should compute p95", () => {
    const values = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(metrics.getP95(values)).toBe(19);
    expect(metrics.getP95([])).toBe(0);
  });

  it("should return snapshots that do not alias internal state", () => {
    const snapshot = metrics.getMetrics();
    snapshot.durationMs.push(1);
    expect(metrics.getMetrics().durationMs).toHaveLength(0);
  });
});

describe("logger", () => {
  beforeEach(() => {
    process.env.QSHAPE_DEBUG = "1";
  });

  afterEach(() => {
    delete process.env.QSHAPE_DEBUG;
    vi.restoreAllMocks();
  });

  it("should log rejections at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    validate({ goals: [] });
    expect(debug).toHaveBeenCalledTimes(1);
    const line = String(debug.mock.calls[0]?.[0]);
    expect(line).toMatch(
      /^\[[^\]]+\] \[DEBUG\] \[query\.rejected\] ArrayWhereObjectExpected at goals "goals" must be an object, got an array$/
    );
  });

  it("should not log deferred or valid queries", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    validate(null);
    validate({ goals: {} });
    expect(debug).not.toHaveBeenCalled();
  });

  it("should suppress debug output without QSHAPE_DEBUG", () => {
    delete process.env.QSHAPE_DEBUG;
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    validate({ goals: [] });
    expect(debug).not.toHaveBeenCalled();
  });

  it("should route non-debug levels regardless of QSHAPE_DEBUG", () => {
    delete process.env.QSHAPE_DEBUG;
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.log("warn", "query.slow", { message: "took 12ms" });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/\[WARN\] \[query\.slow\] took 12ms$/);
  });
});

describe("formatLogEntry", () => {
  const base = { timestamp: "2024-01-01T00:00:00.000Z", level: "debug" as const, event: "query.rejected" };

  it("should render kind and path before the message", () => {
    expect(
      formatLogEntry({ ...base, kind: "UnknownOption", path: "goals.$.sort", message: 'unknown option "sort"' })
    ).toBe('[2024-01-01T00:00:00.000Z] [DEBUG] [query.rejected] UnknownOption at goals.$.sort unknown option "sort"');
  });

  it("should label the root path", () => {
    expect(formatLogEntry({ ...base, kind: "QueryMustBeObject", path: "" })).toBe(
      "[2024-01-01T00:00:00.000Z] [DEBUG] [query.rejected] QueryMustBeObject at <root>"
    );
  });

  it("should append details as JSON", () => {
    expect(formatLogEntry({ ...base, level: "error", message: "boom", details: { n: 1 } })).toBe(
      '[2024-01-01T00:00:00.000Z] [ERROR] [query.rejected] boom {"n":1}'
    );
  });
});
