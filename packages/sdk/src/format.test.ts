import { describe, it, expect } from "vitest";
import { stableStringify, formatQuery } from "./format.js";
import { parseQuery } from "./validation.js";
import type { Query } from "./types.js";

function mustParse(raw: unknown): Query {
  const query = parseQuery(raw);
  if (query === null) throw new Error("unexpected deferred query");
  return query;
}

describe("stableStringify", () => {
  it("should stringify with stable alphabetical key order", () => {
    const obj = { z: 1, a: 2, m: 3 };
    const result = stableStringify(obj);
    expect(result).toBe('{\n  "a": 2,\n  "m": 3,\n  "z": 1\n}\n');
  });

  it("should preserve array order", () => {
    const obj = { items: [3, 1, 2] };
    expect(stableStringify(obj, 0)).toBe('{"items":[3,1,2]}\n');
  });

  it("should keep insertion order when asked", () => {
    const obj = { todos: 1, goals: 2 };
    expect(stableStringify(obj, 0, "insertion")).toBe('{"todos":1,"goals":2}\n');
  });

  it("should put listed keys first for an explicit order", () => {
    const obj = { title: "t", kind: "k", id: "1" };
    expect(stableStringify(obj, 0, ["kind", "id"])).toBe('{"kind":"k","id":"1","title":"t"}\n');
  });

  it("should keep a __proto__ key as data", () => {
    const obj: unknown = JSON.parse('{"__proto__":{"a":1},"b":2}');
    expect(stableStringify(obj, 0)).toBe('{"__proto__":{"a":1},"b":2}\n');
  });

  it("should detect circular references", () => {
    const obj: Record<string, unknown> = { a: 1 };
    obj.self = obj;
    expect(() => stableStringify(obj)).toThrow("Circular reference");
  });

  it("should produce the same output regardless of construction order", () => {
    const a = mustParse({ todos: { $: { order: { title: "asc" } } } });
    const b = mustParse({ todos: { $: { order: { title: "asc" } } } });
    expect(stableStringify(a)).toBe(stableStringify(b));
  });
});

describe("formatQuery", () => {
  it("should render canonical InstaQL in input order", () => {
    const query = mustParse({
      goals: { todos: {}, $: { limit: 2, where: { id: "goal-1" } } },
    });
    expect(formatQuery(query, 0)).toBe(
      '{"goals":{"$":{"where":{"id":"goal-1"},"limit":2},"todos":{}}}\n'
    );
  });

  it("should indent by two spaces by default", () => {
    const query = mustParse({ goals: {} });
    expect(formatQuery(query)).toBe('{\n  "goals": {}\n}\n');
  });
});
