/**
 * Human-readable outline of a normalized query
 */

import type { NamespaceClause, OperatorPredicate, Pagination, Query, Scalar, WhereClause, WhereCondition } from "./types.js";

const INDENT = "  ";

function literal(value: Scalar): string {
  return JSON.stringify(value);
}

function describePredicate(key: string, predicate: OperatorPredicate): string {
  switch (predicate.op) {
    case "$gt":
      return `${key} > ${literal(predicate.value)}`;
    case "$gte":
      return `${key} >= ${literal(predicate.value)}`;
    case "$lt":
      return `${key} < ${literal(predicate.value)}`;
    case "$lte":
      return `${key} <= ${literal(predicate.value)}`;
    case "$in":
      return `${key} in [${predicate.values.map(literal).join(", ")}]`;
    case "$not":
      return `${key} != ${literal(predicate.value)}`;
    case "$isNull":
      return predicate.value ? `${key} is null` : `${key} is not null`;
    case "$like":
      return `${key} like ${literal(predicate.pattern)}`;
    case "$ilike":
      return `${key} ilike ${literal(predicate.pattern)}`;
  }
}

function describeCondition(condition: WhereCondition): string {
  switch (condition.kind) {
    case "literal":
      return `${condition.field.key} = ${literal(condition.value)}`;
    case "operator":
      return describePredicate(condition.field.key, condition.predicate);
    case "logical":
      return `(${condition.clauses.map(describeWhere).join(` ${condition.op} `)})`;
  }
}

/**
 * Render a where clause as a single expression, e.g.
 * `done = false and (priority = "high" or priority = "critical")`
 */
export function describeWhere(clause: WhereClause): string {
  if (clause.conditions.length === 0) return "true";
  return clause.conditions.map(describeCondition).join(" and ");
}

function describePagination(page: Pagination): string | null {
  const parts: string[] = [];
  switch (page.style) {
    case "none":
      return null;
    case "offset":
      if (page.limit !== null) parts.push(`limit ${page.limit}`);
      if (page.offset !== null) parts.push(`offset ${page.offset}`);
      break;
    case "forward":
      if (page.first !== null) parts.push(`first ${page.first}`);
      if (page.after !== null) parts.push(`after ${literal(page.after)}`);
      break;
    case "backward":
      if (page.last !== null) parts.push(`last ${page.last}`);
      if (page.before !== null) parts.push(`before ${literal(page.before)}`);
      break;
  }
  return parts.join(" ");
}

function describeNamespace(clause: NamespaceClause, lines: string[]): void {
  const pad = INDENT.repeat(clause.depth);
  const inner = pad + INDENT;
  const { where, order, fields, pagination } = clause.options;

  lines.push(`${pad}${clause.name}`);
  if (where !== null) lines.push(`${inner}where ${describeWhere(where)}`);
  if (order !== null && order.length > 0) {
    lines.push(`${inner}order ${order.map((t) => `${t.field} ${t.direction}`).join(", ")}`);
  }
  if (fields !== null) lines.push(`${inner}fields ${fields.join(", ")}`);

  const page = describePagination(pagination);
  if (page !== null) lines.push(`${inner}${page}`);

  for (const child of clause.children) {
    describeNamespace(child, lines);
  }
}

/**
 * One line per namespace and per option, indented by nesting depth
 */
export function describeQuery(query: Query): string[] {
  const lines: string[] = [];
  for (const namespace of query.namespaces) {
    describeNamespace(namespace, lines);
  }
  return lines;
}
