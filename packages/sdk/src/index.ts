/**
 * qshape SDK
 *
 * Client-side shape validation and normalization for InstaQL queries
 */

// Re-export types
export type {
  Scalar,
  OrderDirection,
  ComparisonOperator,
  PatternOperator,
  WhereOperator,
  LogicalOperator,
  RawOperatorObject,
  RawWhere,
  RawOptions,
  RawNamespaceClause,
  RawQuery,
  FieldRef,
  OperatorPredicate,
  WhereCondition,
  WhereClause,
  Pagination,
  OrderTerm,
  OptionsBlock,
  NamespaceClause,
  Query,
  QueryErrorKind,
  QueryError,
  ValidationOutcome,
  ValidatorOptions,
} from "./types.js";

// Validation
export { validate, parseQuery, isPlainObject, isScalar, joinPath } from "./validation.js";

// Serialization and rendering
export { toInstaQL, serializeWhere } from "./serialize.js";
export { stableStringify, formatQuery } from "./format.js";
export type { KeyOrder } from "./format.js";
export { describeQuery, describeWhere } from "./describe.js";

// Contracts
export {
  WHERE_OPERATORS,
  LOGICAL_OPERATORS,
  OPTION_KEYS,
  PAGINATION_FAMILIES,
  DEFAULT_SYSTEM_NAMESPACES,
  DEFAULT_MAX_DEPTH,
} from "./contracts/query.js";
export type { OptionKey, PaginationFamily } from "./contracts/query.js";
export { EXIT_CODE } from "./contracts/cli.js";
export type { ExitCode } from "./contracts/cli.js";

// Observability
export { logger, formatLogEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { OutcomeStatus, ValidationMetrics } from "./observability/metrics.js";

// Errors
export { QShapeError, QueryValidationError, formatQueryError } from "./errors.js";
