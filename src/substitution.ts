// substitution.ts
// Turns model expressions, request literals and filter trees into SQL text.
//
// Key ideas:
//
// - Filters are a small AST (f.eq, f.between, f.and, ...). When bindings are
//   supplied, ":name" values are resolved before anything is rendered;
//   without them every value is a literal.
// - Literals are rendered in one place: dates as 'YYYY-MM-DD', strings with
//   '' escaping, numbers verbatim, booleans TRUE/FALSE.
// - Column expressions are qualified with the owning table's alias token by
//   token, so literals, quoted names and casts pass through untouched.

import {
  AmbiguousAggregationError,
  InvalidRequestError,
  SubstitutionError,
  UnknownEntityError,
} from "./errors";
import { emitIdentifier, normalize } from "./identifiers";
import {
  type AggregationOperator,
  type SemanticField,
  type SemanticModel,
  findTable,
  getTable,
  isAggregationCompatible,
  physicalTableName,
  tableAlias,
} from "./semanticModel";
import { type SqlToken, nextSignificant, previousSignificant, tokenizeSql } from "./sqlText";
import { SQL_KEYWORDS } from "./wordLists";

/* --------------------------------------------------------------------------
 * FILTER TYPES + HELPERS
 * -------------------------------------------------------------------------- */

export type FilterPrimitive = string | number | boolean | Date;

export type FilterOperator = "eq" | "ne" | "lt" | "lte" | "gt" | "gte" | "between";

export interface FilterExpression {
  kind: "expression";
  /** SQL expression the predicate applies to. */
  field: string;
  op: FilterOperator;
  value: FilterPrimitive;
  value2?: FilterPrimitive;
}

export interface FilterConjunction {
  kind: "and";
  filters: FilterNode[];
}

/** Predicate that is already SQL, e.g. a named model filter. */
export interface RawPredicate {
  kind: "raw";
  sql: string;
}

export type FilterNode = FilterExpression | FilterConjunction | RawPredicate;

export const f = {
  eq(field: string, value: FilterPrimitive): FilterExpression {
    return { kind: "expression", field, op: "eq", value };
  },
  ne(field: string, value: FilterPrimitive): FilterExpression {
    return { kind: "expression", field, op: "ne", value };
  },
  lt(field: string, value: FilterPrimitive): FilterExpression {
    return { kind: "expression", field, op: "lt", value };
  },
  lte(field: string, value: FilterPrimitive): FilterExpression {
    return { kind: "expression", field, op: "lte", value };
  },
  gt(field: string, value: FilterPrimitive): FilterExpression {
    return { kind: "expression", field, op: "gt", value };
  },
  gte(field: string, value: FilterPrimitive): FilterExpression {
    return { kind: "expression", field, op: "gte", value };
  },
  between(field: string, from: FilterPrimitive, to: FilterPrimitive): FilterExpression {
    return { kind: "expression", field, op: "between", value: from, value2: to };
  },
  and(...filters: FilterNode[]): FilterConjunction {
    return { kind: "and", filters };
  },
  raw(sql: string): RawPredicate {
    return { kind: "raw", sql };
  },
};

export type Bindings = Readonly<Record<string, FilterPrimitive | undefined>>;

function lookupBinding(bindings: Bindings, name: string): FilterPrimitive {
  const value = Object.hasOwn(bindings, name) ? bindings[name] : undefined;
  if (value === undefined) throw new SubstitutionError(name);
  return value;
}

function resolveValue(value: FilterPrimitive, bindings: Bindings): FilterPrimitive {
  if (typeof value === "string" && value.startsWith(":")) {
    return lookupBinding(bindings, value.slice(1));
  }
  return value;
}

export function resolveBindingsInFilter(filterNode: FilterNode | null, bindings: Bindings): FilterNode | null {
  if (!filterNode) return null;

  switch (filterNode.kind) {
    case "raw":
      return filterNode;
    case "and":
      return {
        kind: "and",
        filters: filterNode.filters.map((child) => resolveNode(child, bindings)),
      };
    case "expression":
      return {
        ...filterNode,
        value: resolveValue(filterNode.value, bindings),
        ...(filterNode.value2 !== undefined && { value2: resolveValue(filterNode.value2, bindings) }),
      };
  }
}

function resolveNode(node: FilterNode, bindings: Bindings): FilterNode {
  return resolveBindingsInFilter(node, bindings) ?? node;
}

/* --------------------------------------------------------------------------
 * LITERALS
 * -------------------------------------------------------------------------- */

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function renderLiteral(value: FilterPrimitive): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidRequestError("Cannot render an invalid date");
    }
    return `'${isoDate(value)}'`;
  }
  if (typeof value === "string") return `'${value.replace(/'/g, "''")}'`;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new InvalidRequestError(`Cannot render non-finite number ${value}`);
    }
    return String(value);
  }
  return value ? "TRUE" : "FALSE";
}

/* --------------------------------------------------------------------------
 * FILTER COMPILATION
 * -------------------------------------------------------------------------- */

const COMPARISON_SQL: Record<Exclude<FilterOperator, "between">, string> = {
  eq: "=",
  ne: "<>",
  lt: "<",
  lte: "<=",
  gt: ">",
  gte: ">=",
};

export interface CompileFilterOptions {
  /** Values of ":name" bindings. Without it, ":name" strings are literals. */
  bindings?: Bindings;
}

function compileExpression(expr: FilterExpression): string {
  const { field, value } = expr;
  if (expr.op === "between") {
    if (expr.value2 === undefined) {
      throw new InvalidRequestError(`BETWEEN on ${field} needs an upper bound`);
    }
    return `${field} BETWEEN ${renderLiteral(value)} AND ${renderLiteral(expr.value2)}`;
  }
  return `${field} ${COMPARISON_SQL[expr.op]} ${renderLiteral(value)}`;
}

function compileNode(node: FilterNode, nested: boolean): string {
  switch (node.kind) {
    case "expression":
      return compileExpression(node);
    case "raw":
      return nested ? `(${node.sql})` : node.sql;
    case "and": {
      if (node.filters.length === 0) return "TRUE";
      if (node.filters.length === 1) return compileNode(node.filters[0], nested);
      const sql = node.filters.map((child) => compileNode(child, true)).join(" AND ");
      return nested ? `(${sql})` : sql;
    }
  }
}

/**
 * Compile a filter tree to a SQL predicate, resolving :name bindings first
 * when bindings are given.
 */
export function compileFilter(node: FilterNode, options: CompileFilterOptions = {}): string {
  const resolved = options.bindings ? resolveNode(node, options.bindings) : node;
  return compileNode(resolved, false);
}

/* --------------------------------------------------------------------------
 * TEMPLATES
 * -------------------------------------------------------------------------- */

/**
 * Fill a verified query template: {{table}} placeholders become physical
 * table names, :name bindings become literals. Everything else, including
 * string literals, quoted names and :: casts, is copied verbatim.
 */
export function substitute(template: string, bindings: Bindings, model: SemanticModel): string {
  return tokenizeSql(template)
    .map((token) => {
      if (token.kind === "placeholder") {
        const name = token.name ?? "";
        const table = findTable(model, name);
        if (!table) throw new UnknownEntityError("table", name);
        return physicalTableName(table);
      }
      if (token.kind === "binding" && token.name) {
        return renderLiteral(lookupBinding(bindings, token.name));
      }
      return token.text;
    })
    .join("");
}

/* --------------------------------------------------------------------------
 * EXPRESSIONS
 * -------------------------------------------------------------------------- */

/** Words that start a typed literal, e.g. DATE '2024-01-01'. */
const TYPED_LITERAL_WORDS = new Set(["DATE", "TIME", "TIMESTAMP"]);

/** Window frame words; column names anywhere else. */
const FRAME_WORDS = new Set(["RANGE", "ROW", "UNBOUNDED", "PRECEDING", "FOLLOWING", "CURRENT", "NULLS", "FIRST", "LAST"]);

/** Indexes of tokens inside OVER (...). */
function windowClauseTokens(tokens: SqlToken[]): Set<number> {
  const inside = new Set<number>();
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== "word" || token.text.toUpperCase() !== "OVER") continue;
    if (nextSignificant(tokens, i)?.text !== "(") continue;

    let depth = 0;
    let j = i + 1;
    for (; j < tokens.length; j++) {
      const text = tokens[j].text;
      if (text === "(") depth++;
      else if (text === ")" && --depth === 0) break;
      else if (depth > 0) inside.add(j);
    }
    i = j;
  }
  return inside;
}

function isColumnReference(tokens: SqlToken[], index: number, inWindow: boolean): boolean {
  const token = tokens[index];
  const next = nextSignificant(tokens, index);
  const prev = previousSignificant(tokens, index);

  if (token.kind === "word") {
    const upper = token.text.toUpperCase();
    if (SQL_KEYWORDS.has(upper)) return false;
    if (TYPED_LITERAL_WORDS.has(upper) && next?.kind === "string") return false;
    if (inWindow && FRAME_WORDS.has(upper)) return false;
  }

  if (next?.text === "(" || next?.text === ".") return false;
  if (prev?.text === "." || prev?.text === "::") return false;
  // CAST(x AS type)
  if (prev?.kind === "word" && prev.text.toUpperCase() === "AS") return false;
  return true;
}

/**
 * Qualify bare column references in a model expression with `alias` and
 * fold identifiers to their canonical form.
 *
 *   renderExpression("sum(amount * (1 - discount))", "ORDERS")
 *   // SUM(ORDERS.AMOUNT * (1 - ORDERS.DISCOUNT))
 */
export function renderExpression(expr: string, alias: string): string {
  const tokens = tokenizeSql(expr);
  const windowed = windowClauseTokens(tokens);
  return tokens
    .map((token, index) => {
      if (token.kind !== "word" && token.kind !== "quoted") return token.text;
      const column = isColumnReference(tokens, index, windowed.has(index));
      if (token.kind === "word" && !column) return token.text.toUpperCase();
      const name = emitIdentifier(normalize(token.text));
      return column ? `${alias}.${name}` : name;
    })
    .join("");
}

/* --------------------------------------------------------------------------
 * PROJECTIONS
 * -------------------------------------------------------------------------- */

export interface FieldRef {
  field: SemanticField;
  /** Explicit aggregation requested by the caller. */
  aggregation?: AggregationOperator;
  /** Prepended to the output name, e.g. to tell apart same-named fields. */
  aliasPrefix?: string;
}

export interface Projection {
  expr: string;
  alias: string;
  aggregate: boolean;
  /** Table key the projection reads from. */
  table: string;
}

function aggregate(op: AggregationOperator, expr: string): string {
  return `${op.toUpperCase()}(${expr})`;
}

function checkCompatible(op: AggregationOperator, field: SemanticField): void {
  if (!isAggregationCompatible(op, field.dataType)) {
    throw new InvalidRequestError(
      `Cannot apply ${op} to ${field.dataType} field "${field.table}.${field.name.key}"`,
      { details: { table: field.table, field: field.name.key, aggregation: op } }
    );
  }
}

/**
 * SELECT-list entry for a field reference. Dimensions project as-is, facts
 * need an explicit or default aggregation, metrics are already aggregates.
 */
export function projectField(model: SemanticModel, ref: FieldRef): Projection {
  const { field, aggregation } = ref;
  const alias = tableAlias(getTable(model, field.table));
  const expr = renderExpression(field.expr, alias);
  const outputName = (key: string) => {
    const prefixed = ref.aliasPrefix ? `${ref.aliasPrefix}_${key}` : key;
    return emitIdentifier({ kind: field.name.kind, raw: field.name.raw, key: prefixed });
  };
  const named = outputName(field.name.key);
  const aggregatedName = (op: AggregationOperator) => outputName(`${op.toUpperCase()}_${field.name.key}`);

  switch (field.kind) {
    case "metric":
      if (aggregation) {
        throw new InvalidRequestError(
          `Metric "${field.table}.${field.name.key}" is already aggregated; drop ${aggregation}()`,
          { details: { table: field.table, metric: field.name.key } }
        );
      }
      return { expr, alias: named, aggregate: true, table: field.table };

    case "fact": {
      if (aggregation) {
        checkCompatible(aggregation, field);
        return { expr: aggregate(aggregation, expr), alias: aggregatedName(aggregation), aggregate: true, table: field.table };
      }
      if (!field.defaultAggregation) {
        throw new AmbiguousAggregationError(field.table, field.name.key);
      }
      return { expr: aggregate(field.defaultAggregation, expr), alias: named, aggregate: true, table: field.table };
    }

    case "dimension":
    case "time_dimension":
      if (aggregation) {
        checkCompatible(aggregation, field);
        return { expr: aggregate(aggregation, expr), alias: aggregatedName(aggregation), aggregate: true, table: field.table };
      }
      return { expr, alias: named, aggregate: false, table: field.table };
  }
}

/* --------------------------------------------------------------------------
 * TIME WINDOW
 * -------------------------------------------------------------------------- */

export interface TimeRange {
  start: string;
  end: string;
}

export interface TimeWindow extends TimeRange {
  source: "request" | "default";
}

export interface TimeWindowOptions {
  lookbackDays: number;
  today: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** The calendar day after a YYYY-MM-DD date. */
export function nextDay(date: string): string {
  return isoDate(new Date(new Date(`${date}T00:00:00Z`).getTime() + DAY_MS));
}

/**
 * The request's range when it gives one; otherwise the default lookback
 * window ending today (UTC). Null when the lookback is disabled.
 */
export function resolveTimeWindow(timeRange: TimeRange | undefined, options: TimeWindowOptions): TimeWindow | null {
  if (timeRange) return { ...timeRange, source: "request" };
  if (options.lookbackDays <= 0) return null;
  const end = isoDate(options.today);
  const start = isoDate(new Date(options.today.getTime() - options.lookbackDays * DAY_MS));
  return { start, end, source: "default" };
}
