/**
 * Performance benchmarks for query validation
 * Run with: npm run bench
 */

import { describe, it, expect } from "vitest";
import { validate } from "../src/validation.js";
import { toInstaQL } from "../src/serialize.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

function buildQuery(i: number): unknown {
  return {
    goals: {
      $: {
        where: {
          or: [{ status: "open" }, { priority: { $gte: i % 10 } }],
          "owner.handle": { $ilike: `%user-${i}%` },
          id: { $in: [`goal-${i}`, `goal-${i + 1}`, `goal-${i + 2}`] },
        },
        order: { createdAt: "desc" },
        first: 20,
        after: `cursor-${i}`,
      },
      todos: {
        $: { where: { done: false }, fields: ["title", "done"] },
        tags: {},
      },
    },
  };
}

describeIf("Validation Performance Benchmarks", () => {
  it("10000 nested queries < 1000ms", { timeout: 30000 }, () => {
    const queries = Array.from({ length: 10000 }, (_, i) => buildQuery(i));

    const start = Date.now();
    let ok = 0;
    for (const query of queries) {
      if (validate(query).status === "ok") ok++;
    }
    const duration = Date.now() - start;

    console.log(`Validated ${queries.length} queries in ${duration}ms`);
    expect(ok).toBe(queries.length);
    expect(duration).toBeLessThan(1000);
  });

  it("validate -> toInstaQL -> validate round trip for 10000 queries < 2000ms", { timeout: 30000 }, () => {
    const start = Date.now();
    for (let i = 0; i < 10000; i++) {
      const first = validate(buildQuery(i));
      if (first.status !== "ok") throw new Error(`query ${i} rejected`);
      const second = validate(toInstaQL(first.query));
      expect(second.status).toBe("ok");
    }
    const duration = Date.now() - start;

    console.log(`Round-tripped 10000 queries in ${duration}ms`);
    expect(duration).toBeLessThan(2000);
  });

  it("rejects deep nesting quickly", () => {
    let query: Record<string, unknown> = {};
    for (let i = 0; i < 500; i++) {
      query = { [`level${i}`]: query };
    }

    const start = Date.now();
    const outcome = validate(query);
    const duration = Date.now() - start;

    console.log(`Rejected 500-level query in ${duration}ms`);
    expect(outcome.status).toBe("error");
    expect(duration).toBeLessThan(50);
  });
});
