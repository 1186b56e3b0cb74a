/**
 * Normalized query -> raw InstaQL
 *
 * Invariant: validate(toInstaQL(q)) yields a query deep-equal to q.
 */

import { OPTIONS_KEY } from "./contracts/query.js";
import type {
  NamespaceClause,
  OperatorPredicate,
  OptionsBlock,
  Query,
  RawNamespaceClause,
  RawOperatorObject,
  RawOptions,
  RawQuery,
  RawWhere,
  WhereClause,
} from "./types.js";

/**
 * Assign an own enumerable property; plain assignment would treat
 * "__proto__" as the prototype setter
 */
function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function serializePredicate(predicate: OperatorPredicate): RawOperatorObject {
  switch (predicate.op) {
    case "$gt":
      return { $gt: predicate.value };
    case "$gte":
      return { $gte: predicate.value };
    case "$lt":
      return { $lt: predicate.value };
    case "$lte":
      return { $lte: predicate.value };
    case "$in":
      return { $in: [...predicate.values] };
    case "$not":
      return { $not: predicate.value };
    case "$isNull":
      return { $isNull: predicate.value };
    case "$like":
      return { $like: predicate.pattern };
    case "$ilike":
      return { $ilike: predicate.pattern };
  }
}

export function serializeWhere(clause: WhereClause): RawWhere {
  const where: RawWhere = {};
  for (const condition of clause.conditions) {
    switch (condition.kind) {
      case "literal":
        setEntry(where, condition.field.key, condition.value);
        break;
      case "operator":
        setEntry(where, condition.field.key, serializePredicate(condition.predicate));
        break;
      case "logical":
        setEntry(where, condition.op, condition.clauses.map(serializeWhere));
        break;
    }
  }
  return where;
}

function serializeOptions(options: OptionsBlock): RawOptions | null {
  const out: RawOptions = {};

  if (options.where !== null) {
    out.where = serializeWhere(options.where);
  }
  if (options.order !== null) {
    const order: Record<string, "asc" | "desc"> = {};
    for (const term of options.order) {
      setEntry(order, term.field, term.direction);
    }
    out.order = order;
  }
  if (options.fields !== null) {
    out.fields = [...options.fields];
  }

  const page = options.pagination;
  switch (page.style) {
    case "none":
      break;
    case "offset":
      if (page.limit !== null) out.limit = page.limit;
      if (page.offset !== null) out.offset = page.offset;
      break;
    case "forward":
      if (page.first !== null) out.first = page.first;
      if (page.after !== null) out.after = page.after;
      break;
    case "backward":
      if (page.last !== null) out.last = page.last;
      if (page.before !== null) out.before = page.before;
      break;
  }

  return Object.keys(out).length > 0 ? out : null;
}

function serializeNamespace(clause: NamespaceClause): RawNamespaceClause {
  const out: RawNamespaceClause = {};
  const options = serializeOptions(clause.options);
  if (options !== null) {
    out[OPTIONS_KEY] = options;
  }
  for (const child of clause.children) {
    setEntry(out, child.name, serializeNamespace(child));
  }
  return out;
}

/**
 * Convert a normalized query back to the raw form accepted by validate()
 */
export function toInstaQL(query: Query): RawQuery {
  const out: RawQuery = {};
  for (const namespace of query.namespaces) {
    setEntry(out, namespace.name, serializeNamespace(namespace));
  }
  return out;
}
