// dsl.ts
// Parser for the entity references carried by a resolution request.
//
//   orders                     table
//   order_total                field (any table)
//   orders.order_total         field on a table
//   sum(orders.order_total)    explicit aggregation
//   region = 'EMEA'            predicate on a field
//   count(order_id) > 10       predicate on an aggregate
//   "Mixed Case".col           quoted identifiers keep their case

import { InvalidRequestError } from "./errors";
import type { AggregationOperator } from "./semanticModel";

export type ParseResult<T> = { value: T; nextPos: number };
export type Parser<T> = (input: string, pos: number) => ParseResult<T> | null;

function skipWs(input: string, pos: number): number {
  const match = /^\s*/.exec(input.slice(pos));
  return pos + (match ? match[0].length : 0);
}

function map<A, B>(parser: Parser<A>, fn: (value: A) => B): Parser<B> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return null;
    return { value: fn(result.value), nextPos: result.nextPos };
  };
}

function seq<T extends unknown[]>(...parsers: { [K in keyof T]: Parser<T[K]> }): Parser<T> {
  return (input, pos) => {
    const values: unknown[] = [];
    let nextPos = pos;
    for (const p of parsers) {
      const result = p(input, nextPos);
      if (!result) return null;
      values.push(result.value);
      nextPos = result.nextPos;
    }
    return { value: values as T, nextPos };
  };
}

function choice<T>(...parsers: Parser<T>[]): Parser<T> {
  return (input, pos) => {
    for (const p of parsers) {
      const result = p(input, pos);
      if (result) return result;
    }
    return null;
  };
}

function opt<T>(parser: Parser<T>): Parser<T | null> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return { value: null, nextPos: pos };
    return result;
  };
}

function regex(re: RegExp): Parser<string> {
  const anchored = new RegExp("^(?:" + re.source + ")", re.flags);
  return (input, pos) => {
    const start = skipWs(input, pos);
    const match = anchored.exec(input.slice(start));
    if (!match) return null;
    const nextPos = skipWs(input, start + match[0].length);
    return { value: match[0], nextPos };
  };
}

function symbol(text: string): Parser<string> {
  return (input, pos) => {
    const start = skipWs(input, pos);
    if (input.slice(start).startsWith(text)) {
      const nextPos = skipWs(input, start + text.length);
      return { value: text, nextPos };
    }
    return null;
  };
}

function keyword(word: string): Parser<string> {
  return map(regex(new RegExp(word + "(?![A-Za-z0-9_$])", "i")), (v) => v.toLowerCase());
}

/* --------------------------------------------------------------------------
 * AST TYPES
 * -------------------------------------------------------------------------- */

export type LiteralValue = string | number | boolean;

export type ComparisonOperator = "=" | "!=" | "<" | "<=" | ">" | ">=";

export interface ComparisonAst {
  op: ComparisonOperator;
  value: LiteralValue;
}

/** One or two raw identifier parts; quoted parts keep their quotes. */
export type NamePath = [string] | [string, string];

export type EntityRefAst =
  | { kind: "name"; name: NamePath; comparison: ComparisonAst | null }
  | { kind: "aggregate"; fn: AggregationOperator; name: NamePath; comparison: ComparisonAst | null };

/* --------------------------------------------------------------------------
 * GRAMMAR
 * -------------------------------------------------------------------------- */

const bareIdentifier = regex(/[A-Za-z_][A-Za-z0-9_$]*/);
const quotedIdentifier = regex(/"(?:[^"]|"")+"/);
const identifier = choice(quotedIdentifier, bareIdentifier);

const namePath: Parser<NamePath> = map(
  seq(identifier, opt(seq(symbol("."), identifier))),
  ([first, rest]): NamePath => (rest ? [first, rest[1]] : [first])
);

const aggregationFn: Parser<AggregationOperator> = choice(
  map(keyword("sum"), () => "sum" as const),
  map(keyword("avg"), () => "avg" as const),
  map(keyword("min"), () => "min" as const),
  map(keyword("max"), () => "max" as const),
  map(keyword("count"), () => "count" as const)
);

const aggregateCall = map(
  seq(aggregationFn, symbol("("), namePath, symbol(")")),
  ([fn, , name]) => ({ fn, name })
);

function operator(text: string, op: ComparisonOperator): Parser<ComparisonOperator> {
  return map(symbol(text), () => op);
}

// two-character operators first
const comparator = choice(
  operator(">=", ">="),
  operator("<=", "<="),
  operator("<>", "!="),
  operator("!=", "!="),
  operator(">", ">"),
  operator("<", "<"),
  operator("=", "=")
);

const stringLiteral: Parser<LiteralValue> = map(regex(/'(?:[^']|'')*'/), (v) =>
  v.slice(1, -1).replace(/''/g, "'")
);
const numberLiteral: Parser<LiteralValue> = map(regex(/-?\d+(?:\.\d+)?/), (v) => Number(v));
const booleanLiteral: Parser<LiteralValue> = choice(
  map(keyword("true"), () => true),
  map(keyword("false"), () => false)
);
const literal = choice(stringLiteral, numberLiteral, booleanLiteral);

const comparison: Parser<ComparisonAst> = map(seq(comparator, literal), ([op, value]) => ({
  op,
  value,
}));

export const entityRef: Parser<EntityRefAst> = choice(
  map(
    seq(aggregateCall, opt(comparison)),
    ([call, cmp]): EntityRefAst => ({ kind: "aggregate", fn: call.fn, name: call.name, comparison: cmp })
  ),
  map(
    seq(namePath, opt(comparison)),
    ([name, cmp]): EntityRefAst => ({ kind: "name", name, comparison: cmp })
  )
);

/* --------------------------------------------------------------------------
 * ENTRY POINTS
 * -------------------------------------------------------------------------- */

export function parseAll<T>(parser: Parser<T>, input: string): T | null {
  const result = parser(input, 0);
  if (!result) return null;
  if (skipWs(input, result.nextPos) !== input.length) return null;
  return result.value;
}

const PLAIN_PHRASE = /^[\p{L}\p{N}_$ \-]+$/u;

/**
 * Parse one referenced entity. Free-form phrases ("order total") that are
 * not identifiers are kept whole so they can still match a synonym.
 */
export function parseEntityRef(text: string): EntityRefAst {
  const trimmed = text.trim();
  const parsed = trimmed ? parseAll(entityRef, trimmed) : null;
  if (parsed) return parsed;
  if (trimmed && PLAIN_PHRASE.test(trimmed)) {
    return { kind: "name", name: [trimmed], comparison: null };
  }
  throw new InvalidRequestError(`Cannot parse referenced entity "${text}"`, {
    details: { entity: text },
    hint: "Use table, field, table.field, agg(field) or field <op> literal.",
  });
}
