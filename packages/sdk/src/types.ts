/**
 * Core types for qshape
 */

// ---------------------------------------------------------------------------
// Raw (caller-facing) query shapes
// ---------------------------------------------------------------------------

/**
 * Scalar values allowed as literal equality conditions
 */
export type Scalar = string | number | boolean | null;

/**
 * Sort direction for `order`
 */
export type OrderDirection = "asc" | "desc";

/**
 * Comparison operators taking a single ordered operand
 */
export type ComparisonOperator = "$gt" | "$gte" | "$lt" | "$lte";

/**
 * Pattern operators; `$like` is case-sensitive, `$ilike` is not
 */
export type PatternOperator = "$like" | "$ilike";

/**
 * Every operator key recognized inside an operator object
 */
export type WhereOperator = ComparisonOperator | PatternOperator | "$in" | "$not" | "$isNull";

/**
 * Logical keys combining where fragments
 */
export type LogicalOperator = "and" | "or";

/**
 * Raw operator object: exactly one operator key per object
 */
export type RawOperatorObject =
  | { $gt: string | number | boolean }
  | { $gte: string | number | boolean }
  | { $lt: string | number | boolean }
  | { $lte: string | number | boolean }
  | { $in: Scalar[] }
  | { $not: Scalar }
  | { $isNull: boolean }
  | { $like: string }
  | { $ilike: string };

/**
 * Raw where clause as written by callers
 * @example { "owner.email": "a@b.c", or: [{ priority: "high" }, { done: false }] }
 */
export interface RawWhere {
  and?: RawWhere[];
  or?: RawWhere[];
  [field: string]: Scalar | RawOperatorObject | RawWhere[] | undefined;
}

/**
 * Raw `$` options block
 */
export interface RawOptions {
  where?: RawWhere;
  limit?: number;
  offset?: number;
  first?: number;
  after?: string;
  last?: number;
  before?: string;
  order?: Record<string, OrderDirection>;
  fields?: string[];
}

/**
 * Raw namespace clause: `$` options plus nested associations
 */
export interface RawNamespaceClause {
  $?: RawOptions;
  [association: string]: RawNamespaceClause | RawOptions | undefined;
}

/**
 * Raw query keyed by namespace name
 * @example { goals: { $: { where: { id: "goal-1" } }, todos: {} } }
 */
export type RawQuery = Record<string, RawNamespaceClause>;

// ---------------------------------------------------------------------------
// Normalized query model
// ---------------------------------------------------------------------------

/**
 * Condition key split into association hops and the final attribute.
 * `owner.team.name` has associations ["owner", "team"] and attribute "name".
 */
export interface FieldRef {
  /** Key exactly as written */
  key: string;
  associations: string[];
  attribute: string;
}

/**
 * Operator predicate, tagged by operator name
 */
export type OperatorPredicate =
  | { op: ComparisonOperator; value: string | number | boolean }
  | { op: "$in"; values: Scalar[] }
  /**
   * Not-equal. The backend also matches rows where the attribute is null or
   * missing; that is service behavior and is not checked here.
   */
  | { op: "$not"; value: Scalar }
  | { op: "$isNull"; value: boolean }
  | { op: PatternOperator; pattern: string };

/**
 * One entry of a where clause
 */
export type WhereCondition =
  | { kind: "literal"; field: FieldRef; value: Scalar }
  | { kind: "operator"; field: FieldRef; predicate: OperatorPredicate }
  | { kind: "logical"; op: LogicalOperator; clauses: WhereClause[] };

/**
 * Where clause; conditions are implicitly AND-ed, in input order
 */
export interface WhereClause {
  conditions: WhereCondition[];
}

/**
 * Pagination for a top-level namespace. Members of the chosen family that
 * were not supplied are null.
 */
export type Pagination =
  | { style: "none" }
  | { style: "offset"; limit: number | null; offset: number | null }
  | { style: "forward"; first: number | null; after: string | null }
  | { style: "backward"; last: number | null; before: string | null };

export interface OrderTerm {
  field: string;
  direction: OrderDirection;
}

/**
 * Materialized `$` block; absent parts are null
 */
export interface OptionsBlock {
  where: WhereClause | null;
  pagination: Pagination;
  order: OrderTerm[] | null;
  /** Selected fields, always starting with "id" */
  fields: string[] | null;
}

export interface NamespaceClause {
  name: string;
  /** 0 for top-level namespaces */
  depth: number;
  options: OptionsBlock;
  children: NamespaceClause[];
}

/**
 * Normalized query; namespaces keep input order
 */
export interface Query {
  namespaces: NamespaceClause[];
}

// ---------------------------------------------------------------------------
// Validation outcome
// ---------------------------------------------------------------------------

/**
 * Every way a raw query can be rejected
 */
export type QueryErrorKind =
  | "QueryMustBeObject"
  | "ArrayWhereObjectExpected"
  | "NamespaceClauseMustBeObject"
  | "InvalidNamespaceName"
  | "OptionsMustBeObject"
  | "UnknownOption"
  | "WhereMustBeObject"
  | "PaginationOnNestedNamespace"
  | "ConflictingPaginationStyle"
  | "InvalidPaginationValue"
  | "OrderFieldMustBeDirect"
  | "InvalidOrderDirection"
  | "InvalidFieldSelection"
  | "DuplicateFieldSelection"
  | "InvalidFieldPath"
  | "LogicalOperatorExpectsArray"
  | "InvalidOperatorObject"
  | "InvalidOperatorValue"
  | "UnsupportedLiteralValue"
  | "QueryTooDeep";

/**
 * First violation found in a raw query
 */
export interface QueryError {
  kind: QueryErrorKind;
  /** Dot-joined location of the offending node, e.g. "goals.$.where.todos" ("" for the root) */
  path: string;
  message: string;
}

export type ValidationOutcome =
  | { status: "ok"; query: Query }
  | { status: "deferred" }
  | { status: "error"; error: QueryError };

/**
 * Validator configuration
 */
export interface ValidatorOptions {
  /** `$`-prefixed namespaces accepted at the root (default: ["$users", "$files"]) */
  systemNamespaces?: readonly string[];
  /** Maximum namespace or logical nesting (default: 32) */
  maxDepth?: number;
}
