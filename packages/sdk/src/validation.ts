/**
 * Query shape validation and normalization
 *
 * A single recursive descent over three node kinds (namespace clause,
 * options block, where clause). The first violation aborts the walk.
 */

import { performance } from "node:perf_hooks";
import {
  COMPARISON_OPERATORS,
  DEFAULT_MAX_DEPTH,
  DEFAULT_SYSTEM_NAMESPACES,
  ID_FIELD,
  LOGICAL_OPERATORS,
  OPTIONS_KEY,
  OPTION_KEYS,
  PAGINATION_FAMILIES,
  PATTERN_OPERATORS,
  WHERE_OPERATORS,
  type PaginationFamily,
} from "./contracts/query.js";
import { QueryValidationError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type {
  ComparisonOperator,
  FieldRef,
  LogicalOperator,
  NamespaceClause,
  OperatorPredicate,
  OptionsBlock,
  OrderDirection,
  OrderTerm,
  Pagination,
  PatternOperator,
  Query,
  QueryErrorKind,
  Scalar,
  ValidationOutcome,
  ValidatorOptions,
  WhereClause,
  WhereCondition,
} from "./types.js";

interface Context {
  systemNamespaces: ReadonlySet<string>;
  maxDepth: number;
}

function resolveContext(options: ValidatorOptions): Context {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  return {
    systemNamespaces: new Set(options.systemNamespaces ?? DEFAULT_SYSTEM_NAMESPACES),
    maxDepth,
  };
}

function violation(kind: QueryErrorKind, path: string, message: string): QueryValidationError {
  return new QueryValidationError(kind, path, message);
}

/**
 * Append a segment to a dot-joined path
 */
export function joinPath(parent: string, segment: string): string {
  return parent === "" ? segment : `${parent}.${segment}`;
}

/**
 * True for plain objects (`{}` literals and null-prototype objects)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function isOrderDirection(value: unknown): value is OrderDirection {
  return value === "asc" || value === "desc";
}

function isLogicalOperator(key: string): key is LogicalOperator {
  return LOGICAL_OPERATORS.some((candidate) => candidate === key);
}

function isComparisonOperator(op: string): op is ComparisonOperator {
  return COMPARISON_OPERATORS.some((candidate) => candidate === op);
}

function isPatternOperator(op: string): op is PatternOperator {
  return PATTERN_OPERATORS.some((candidate) => candidate === op);
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  if (typeof value === "object") return "an object";
  return typeof value;
}

// ---------------------------------------------------------------------------
// Root and namespace clauses
// ---------------------------------------------------------------------------

function parseRoot(raw: unknown, ctx: Context): Query {
  if (Array.isArray(raw)) {
    throw violation(
      "ArrayWhereObjectExpected",
      "",
      "query must be an object keyed by namespace, got an array"
    );
  }
  if (!isPlainObject(raw)) {
    throw violation(
      "QueryMustBeObject",
      "",
      `query must be an object keyed by namespace, got ${describeValue(raw)}`
    );
  }

  const namespaces: NamespaceClause[] = [];
  for (const [name, value] of Object.entries(raw)) {
    checkNamespaceName(name, ctx);
    namespaces.push(parseNamespace(name, value, 0, name, ctx));
  }
  return { namespaces };
}

function checkNamespaceName(name: string, ctx: Context): void {
  if (name === "") {
    throw violation("InvalidNamespaceName", name, "namespace name must be non-empty");
  }
  if (name.includes(".")) {
    throw violation("InvalidNamespaceName", name, `namespace "${name}" cannot contain "."`);
  }
  if (name.startsWith("$") && !ctx.systemNamespaces.has(name)) {
    const allowed = [...ctx.systemNamespaces].join(", ") || "none";
    throw violation(
      "InvalidNamespaceName",
      name,
      `namespace "${name}" is reserved; system namespaces allowed here: ${allowed}`
    );
  }
}

function checkAssociationName(name: string, path: string): void {
  if (name === "") {
    throw violation("InvalidNamespaceName", path, "association name must be non-empty");
  }
  if (name.includes(".")) {
    throw violation("InvalidNamespaceName", path, `association "${name}" cannot contain "."`);
  }
}

function parseNamespace(
  name: string,
  value: unknown,
  depth: number,
  path: string,
  ctx: Context
): NamespaceClause {
  if (depth > ctx.maxDepth) {
    throw violation("QueryTooDeep", path, `namespace nesting exceeds maximum depth ${ctx.maxDepth}`);
  }
  if (Array.isArray(value)) {
    throw violation(
      "ArrayWhereObjectExpected",
      path,
      `"${name}" must be an object, got an array`
    );
  }
  if (!isPlainObject(value)) {
    throw violation(
      "NamespaceClauseMustBeObject",
      path,
      `"${name}" must be an object, got ${describeValue(value)}`
    );
  }

  let options = emptyOptions();
  const children: NamespaceClause[] = [];

  for (const [key, child] of Object.entries(value)) {
    const childPath = joinPath(path, key);
    if (key === OPTIONS_KEY) {
      if (child !== undefined) {
        options = parseOptions(child, depth, childPath, ctx);
      }
      continue;
    }
    checkAssociationName(key, childPath);
    children.push(parseNamespace(key, child, depth + 1, childPath, ctx));
  }

  return { name, depth, options, children };
}

// ---------------------------------------------------------------------------
// Options block
// ---------------------------------------------------------------------------

function emptyOptions(): OptionsBlock {
  return { where: null, pagination: { style: "none" }, order: null, fields: null };
}

function paginationFamilyOf(key: string): PaginationFamily | null {
  switch (key) {
    case "limit":
    case "offset":
      return "offset";
    case "first":
    case "after":
      return "forward";
    case "last":
    case "before":
      return "backward";
    default:
      return null;
  }
}

function readCount(value: unknown, key: string, path: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw violation(
      "InvalidPaginationValue",
      path,
      `${key} must be a non-negative integer, got ${describeValue(value)}`
    );
  }
  return value;
}

function readCursor(value: unknown, key: string, path: string): string {
  if (typeof value !== "string") {
    throw violation(
      "InvalidPaginationValue",
      path,
      `${key} must be a cursor string, got ${describeValue(value)}`
    );
  }
  return value;
}

function parseOptions(raw: unknown, depth: number, path: string, ctx: Context): OptionsBlock {
  if (!isPlainObject(raw)) {
    throw violation("OptionsMustBeObject", path, `options must be an object, got ${describeValue(raw)}`);
  }

  const options = emptyOptions();
  let family: PaginationFamily | null = null;
  let limit: number | null = null;
  let offset: number | null = null;
  let first: number | null = null;
  let after: string | null = null;
  let last: number | null = null;
  let before: string | null = null;

  for (const [key, value] of Object.entries(raw)) {
    // Spread-friendly: `{ limit: undefined }` means no limit
    if (value === undefined) continue;

    const keyPath = joinPath(path, key);

    if (key === "where") {
      options.where = parseWhere(value, keyPath, 0, ctx);
      continue;
    }
    if (key === "order") {
      options.order = parseOrder(value, keyPath);
      continue;
    }
    if (key === "fields") {
      options.fields = parseFields(value, keyPath);
      continue;
    }

    const keyFamily = paginationFamilyOf(key);
    if (keyFamily === null) {
      throw violation(
        "UnknownOption",
        keyPath,
        `unknown option "${key}"; expected one of ${OPTION_KEYS.join(", ")}`
      );
    }
    if (depth !== 0) {
      throw violation(
        "PaginationOnNestedNamespace",
        keyPath,
        `${key} is only allowed on top-level namespaces`
      );
    }
    if (family !== null && family !== keyFamily) {
      throw violation(
        "ConflictingPaginationStyle",
        keyPath,
        `cannot combine ${PAGINATION_FAMILIES[family].join("/")} with ${key}`
      );
    }
    family = keyFamily;

    switch (key) {
      case "limit":
        limit = readCount(value, key, keyPath);
        break;
      case "offset":
        offset = readCount(value, key, keyPath);
        break;
      case "first":
        first = readCount(value, key, keyPath);
        break;
      case "last":
        last = readCount(value, key, keyPath);
        break;
      case "after":
        after = readCursor(value, key, keyPath);
        break;
      case "before":
        before = readCursor(value, key, keyPath);
        break;
    }
  }

  options.pagination = buildPagination(family, { limit, offset, first, after, last, before });
  return options;
}

function buildPagination(
  family: PaginationFamily | null,
  v: {
    limit: number | null;
    offset: number | null;
    first: number | null;
    after: string | null;
    last: number | null;
    before: string | null;
  }
): Pagination {
  switch (family) {
    case null:
      return { style: "none" };
    case "offset":
      return { style: "offset", limit: v.limit, offset: v.offset };
    case "forward":
      return { style: "forward", first: v.first, after: v.after };
    case "backward":
      return { style: "backward", last: v.last, before: v.before };
  }
}

function parseOrder(raw: unknown, path: string): OrderTerm[] {
  if (!isPlainObject(raw)) {
    throw violation(
      "InvalidOrderDirection",
      path,
      `order must be an object mapping fields to "asc" or "desc", got ${describeValue(raw)}`
    );
  }

  const terms: OrderTerm[] = [];
  for (const [field, direction] of Object.entries(raw)) {
    const fieldPath = joinPath(path, field);
    if (field === "") {
      throw violation("InvalidFieldPath", fieldPath, "order field must be non-empty");
    }
    if (field.includes(".")) {
      throw violation(
        "OrderFieldMustBeDirect",
        fieldPath,
        `order field "${field}" must be an attribute of this namespace, not an association path`
      );
    }
    if (!isOrderDirection(direction)) {
      throw violation(
        "InvalidOrderDirection",
        fieldPath,
        `order direction must be "asc" or "desc", got ${typeof direction === "string" ? `"${direction}"` : describeValue(direction)}`
      );
    }
    terms.push({ field, direction });
  }
  return terms;
}

function parseFields(raw: unknown, path: string): string[] {
  if (!Array.isArray(raw)) {
    throw violation(
      "InvalidFieldSelection",
      path,
      `fields must be an array of field names, got ${describeValue(raw)}`
    );
  }

  const seen = new Set<string>();
  for (let i = 0; i < raw.length; i++) {
    const field: unknown = raw[i];
    const fieldPath = joinPath(path, String(i));
    if (typeof field !== "string" || field === "" || field.includes(".")) {
      throw violation(
        "InvalidFieldSelection",
        fieldPath,
        `fields entries must be attribute names, got ${typeof field === "string" ? `"${field}"` : describeValue(field)}`
      );
    }
    if (seen.has(field)) {
      throw violation("DuplicateFieldSelection", fieldPath, `field "${field}" is selected more than once`);
    }
    seen.add(field);
  }

  const selected = [...seen];
  return seen.has(ID_FIELD) ? [ID_FIELD, ...selected.filter((f) => f !== ID_FIELD)] : [ID_FIELD, ...selected];
}

// ---------------------------------------------------------------------------
// Where clauses
// ---------------------------------------------------------------------------

function parseWhere(raw: unknown, path: string, level: number, ctx: Context): WhereClause {
  if (level > ctx.maxDepth) {
    throw violation("QueryTooDeep", path, `where nesting exceeds maximum depth ${ctx.maxDepth}`);
  }
  if (!isPlainObject(raw)) {
    throw violation("WhereMustBeObject", path, `where must be an object, got ${describeValue(raw)}`);
  }

  const conditions: WhereCondition[] = [];
  for (const [key, value] of Object.entries(raw)) {
    const keyPath = joinPath(path, key);

    if (isLogicalOperator(key)) {
      if (!Array.isArray(value)) {
        throw violation(
          "LogicalOperatorExpectsArray",
          keyPath,
          `${key} expects an array of where clauses, got ${describeValue(value)}`
        );
      }
      const clauses: WhereClause[] = [];
      // Indexed loop so holes in sparse arrays are reported, not skipped
      for (let i = 0; i < value.length; i++) {
        const fragment: unknown = value[i];
        clauses.push(parseWhere(fragment, joinPath(keyPath, String(i)), level + 1, ctx));
      }
      conditions.push({ kind: "logical", op: key, clauses });
      continue;
    }

    const field = parseFieldRef(key, keyPath);

    if (isPlainObject(value)) {
      conditions.push({ kind: "operator", field, predicate: parseOperator(value, keyPath) });
      continue;
    }
    if (!isScalar(value)) {
      throw violation(
        "UnsupportedLiteralValue",
        keyPath,
        `condition on "${key}" must be a string, number, boolean, null or operator object, got ${describeValue(value)}`
      );
    }
    conditions.push({ kind: "literal", field, value });
  }

  return { conditions };
}

function parseFieldRef(key: string, path: string): FieldRef {
  const associations = key.split(".");
  const attribute = associations.pop();
  if (attribute === undefined || attribute === "" || associations.some((segment) => segment === "")) {
    throw violation(
      "InvalidFieldPath",
      path,
      key === "" ? "condition key must be non-empty" : `"${key}" has an empty path segment`
    );
  }
  return { key, associations, attribute };
}

function parseOperator(raw: Record<string, unknown>, path: string): OperatorPredicate {
  const entries = Object.entries(raw);
  const entry = entries[0];
  if (entries.length !== 1 || entry === undefined) {
    const found = entries.length === 0 ? "none" : entries.map(([op]) => op).join(", ");
    throw violation(
      "InvalidOperatorObject",
      path,
      `operator object must contain exactly one operator, got ${found}`
    );
  }

  const [op, operand] = entry;
  const opPath = joinPath(path, op);

  if (isComparisonOperator(op)) {
    if (
      typeof operand !== "string" &&
      typeof operand !== "boolean" &&
      !(typeof operand === "number" && Number.isFinite(operand))
    ) {
      throw violation(
        "InvalidOperatorValue",
        opPath,
        `${op} expects a string, number or boolean, got ${describeValue(operand)}`
      );
    }
    return { op, value: operand };
  }

  if (isPatternOperator(op)) {
    if (typeof operand !== "string") {
      throw violation("InvalidOperatorValue", opPath, `${op} expects a pattern string, got ${describeValue(operand)}`);
    }
    return { op, pattern: operand };
  }

  switch (op) {
    case "$in": {
      if (!Array.isArray(operand)) {
        throw violation("InvalidOperatorValue", opPath, `$in expects an array, got ${describeValue(operand)}`);
      }
      const values: Scalar[] = [];
      for (let i = 0; i < operand.length; i++) {
        const item: unknown = operand[i];
        if (!isScalar(item)) {
          throw violation(
            "InvalidOperatorValue",
            joinPath(opPath, String(i)),
            `$in entries must be scalars, got ${describeValue(item)}`
          );
        }
        values.push(item);
      }
      return { op: "$in", values };
    }
    case "$not":
      if (!isScalar(operand)) {
        throw violation("InvalidOperatorValue", opPath, `$not expects a scalar, got ${describeValue(operand)}`);
      }
      return { op: "$not", value: operand };
    case "$isNull":
      if (typeof operand !== "boolean") {
        throw violation("InvalidOperatorValue", opPath, `$isNull expects a boolean, got ${describeValue(operand)}`);
      }
      return { op: "$isNull", value: operand };
    default:
      throw violation(
        "InvalidOperatorObject",
        path,
        `unknown operator "${op}"; expected one of ${WHERE_OPERATORS.join(", ")}`
      );
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate and normalize a raw query.
 *
 * `null` and `undefined` defer the query. Violations are returned, not
 * thrown; the input is never mutated.
 */
export function validate(raw: unknown, options: ValidatorOptions = {}): ValidationOutcome {
  const ctx = resolveContext(options);

  if (raw === null || raw === undefined) {
    metrics.recordOutcome("deferred");
    return { status: "deferred" };
  }

  const start = performance.now();
  try {
    const query = parseRoot(raw, ctx);
    metrics.recordOutcome("ok", performance.now() - start);
    return { status: "ok", query };
  } catch (err) {
    if (err instanceof QueryValidationError) {
      metrics.recordOutcome("error", performance.now() - start, err.kind);
      logger.debug("query.rejected", { kind: err.kind, path: err.path, message: err.detail });
      return { status: "error", error: err.toQueryError() };
    }
    throw err;
  }
}

/**
 * Throwing form of validate()
 * @returns The normalized query, or null when the query is deferred
 * @throws QueryValidationError on the first violation
 */
export function parseQuery(raw: unknown, options: ValidatorOptions = {}): Query | null {
  const outcome = validate(raw, options);
  switch (outcome.status) {
    case "ok":
      return outcome.query;
    case "deferred":
      return null;
    case "error":
      throw new QueryValidationError(outcome.error.kind, outcome.error.path, outcome.error.message);
  }
}
