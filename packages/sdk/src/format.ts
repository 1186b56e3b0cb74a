/**
 * Deterministic JSON formatting utilities
 */

import type { Query } from "./types.js";
import { toInstaQL } from "./serialize.js";

/**
 * Key ordering: "alpha", "insertion" (as constructed), or an explicit list
 * whose keys come first, the rest alphabetically
 */
export type KeyOrder = "alpha" | "insertion" | string[];

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha" || order === "insertion") {
      return a < b ? -1 : a > b ? 1 : 0;
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const normalize = (current: unknown): unknown => {
    if (current === null || typeof current !== "object") {
      return current;
    }

    if (seen.has(current)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(current);

    try {
      if (Array.isArray(current)) {
        return current.map(normalize);
      }

      const entries = Object.entries(current);
      if (order !== "insertion") {
        entries.sort(([a], [b]) => sorter(a, b));
      }
      const out: Record<string, unknown> = {};
      for (const [k, v] of entries) {
        // defineProperty keeps a "__proto__" key as data
        Object.defineProperty(out, k, {
          value: normalize(v),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    } finally {
      seen.delete(current);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Render a normalized query as canonical raw InstaQL.
 * Namespace and condition order is kept; options use their canonical order.
 */
export function formatQuery(query: Query, indent = 2): string {
  return stableStringify(toInstaQL(query), indent, "insertion");
}
