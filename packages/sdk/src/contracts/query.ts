/**
 * Query DSL contracts and invariants
 * This module defines the canonical query grammar accepted by the validator
 */

import type { ComparisonOperator, LogicalOperator, PatternOperator, WhereOperator } from "../types.js";

/**
 * Operator keys accepted inside an operator object
 * All operators are prefixed with $; a field condition never uses $ otherwise
 */
export const WHERE_OPERATORS: readonly WhereOperator[] = [
  "$gt", // Greater than
  "$gte", // Greater than or equal
  "$lt", // Less than
  "$lte", // Less than or equal
  "$in", // Value in list
  "$not", // Not equal (backend also matches null/missing)
  "$isNull", // Attribute is (or is not) null
  "$like", // Case-sensitive pattern
  "$ilike", // Case-insensitive pattern
];

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ["$gt", "$gte", "$lt", "$lte"];

export const PATTERN_OPERATORS: readonly PatternOperator[] = ["$like", "$ilike"];

/**
 * Logical keys; unlike operators they are not $-prefixed
 */
export const LOGICAL_OPERATORS: readonly LogicalOperator[] = ["and", "or"];

/**
 * Keys accepted in a `$` options block, in canonical output order
 */
export const OPTION_KEYS = [
  "where",
  "order",
  "fields",
  "limit",
  "offset",
  "first",
  "after",
  "last",
  "before",
] as const;

export type OptionKey = (typeof OPTION_KEYS)[number];

/**
 * Pagination keys grouped by family
 * Keys of two different families cannot appear in the same block
 */
export const PAGINATION_FAMILIES = {
  offset: ["limit", "offset"],
  forward: ["first", "after"],
  backward: ["last", "before"],
} as const;

export type PaginationFamily = keyof typeof PAGINATION_FAMILIES;

/**
 * Key that holds options inside a namespace clause
 */
export const OPTIONS_KEY = "$";

/**
 * Attribute always returned for every row
 */
export const ID_FIELD = "id";

export const DEFAULT_SYSTEM_NAMESPACES: readonly string[] = ["$users", "$files"];

export const DEFAULT_MAX_DEPTH = 32;

/**
 * Query semantics and invariants:
 *
 * 1. Tree shape:
 *    - The root maps namespace names to namespace clauses
 *    - A namespace clause is an object, never an array
 *    - Inside a clause, `$` holds options; every other key is an association
 *    - null/undefined at the root defers the query (not an error)
 *
 * 2. Filter semantics:
 *    - All conditions in one where object are implicitly AND-ed
 *    - `and`/`or` take an array of where objects
 *    - A condition value is a scalar (equality) or an object with exactly one operator
 *    - Dotted keys walk associations; the last segment is the attribute
 *
 * 3. Pagination semantics:
 *    - Only top-level namespaces paginate
 *    - limit/offset, first/after and last/before are separate families
 *
 * 4. Ordering and selection:
 *    - `order` keys are direct attributes, values "asc" or "desc"
 *    - `fields` lists unique attributes; `id` is always returned
 *
 * 5. Validation:
 *    - Fail fast on the first violation, depth-first, in key order
 *    - Input is never mutated
 */
