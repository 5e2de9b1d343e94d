// entities.ts
// Binds parsed entity references to the model: tables, fields and named
// filters, looked up by identifier first and synonym second.

import { type ComparisonAst, type EntityRefAst, type NamePath, parseEntityRef } from "./dsl";
import { InvalidRequestError, UnknownEntityError } from "./errors";
import {
  type AggregationOperator,
  type SemanticField,
  type SemanticFilter,
  type SemanticModel,
  type SemanticTable,
  findField,
  findFilter,
  findTable,
} from "./semanticModel";

export type ResolvedEntity =
  | { kind: "table"; text: string; table: SemanticTable }
  | {
      kind: "field";
      text: string;
      field: SemanticField;
      aggregation?: AggregationOperator;
      comparison: ComparisonAst | null;
    }
  | { kind: "filter"; text: string; filter: SemanticFilter };

/** Table key an entity belongs to. */
export function entityTable(entity: ResolvedEntity): string {
  switch (entity.kind) {
    case "table":
      return entity.table.name.key;
    case "field":
      return entity.field.table;
    case "filter":
      return entity.filter.table;
  }
}

function ambiguous(text: string, tables: string[]): InvalidRequestError {
  return new InvalidRequestError(`"${text}" is ambiguous: it exists on tables ${tables.join(", ")}`, {
    details: { entity: text, tables },
    hint: `Qualify it, e.g. ${tables[0]}.${text}.`,
  });
}

function lookupQualified(model: SemanticModel, [tableName, name]: [string, string]): SemanticField | SemanticFilter {
  const table = findTable(model, tableName);
  if (!table) throw new UnknownEntityError("table", tableName);
  const found = findField(table, name) ?? findFilter(table, name);
  if (!found) throw new UnknownEntityError("field", name, table.name.key);
  return found;
}

function lookupUnique<T extends { table: string }>(
  model: SemanticModel,
  name: string,
  find: (table: SemanticTable, raw: string) => T | undefined
): T | undefined {
  const hits = model.tables
    .map((table) => find(table, name))
    .filter((hit): hit is T => hit !== undefined);
  if (hits.length > 1) throw ambiguous(name, hits.map((h) => h.table));
  return hits[0];
}

type Lookup =
  | { kind: "table"; table: SemanticTable }
  | { kind: "field"; field: SemanticField }
  | { kind: "filter"; filter: SemanticFilter };

function isFilter(value: SemanticField | SemanticFilter): value is SemanticFilter {
  return !("kind" in value);
}

function lookup(model: SemanticModel, path: NamePath, allowTable: boolean): Lookup {
  if (path.length === 2) {
    const found = lookupQualified(model, path);
    return isFilter(found) ? { kind: "filter", filter: found } : { kind: "field", field: found };
  }

  const [name] = path;
  if (allowTable) {
    const table = findTable(model, name);
    if (table) return { kind: "table", table };
  }
  const field = lookupUnique(model, name, findField);
  if (field) return { kind: "field", field };
  const filter = lookupUnique(model, name, findFilter);
  if (filter) return { kind: "filter", filter };
  throw new UnknownEntityError(allowTable ? "entity" : "field", name);
}

function bind(model: SemanticModel, text: string, ast: EntityRefAst): ResolvedEntity {
  const found = lookup(model, ast.name, ast.kind === "name");

  if (found.kind === "field") {
    return {
      kind: "field",
      text,
      field: found.field,
      ...(ast.kind === "aggregate" && { aggregation: ast.fn }),
      comparison: ast.comparison,
    };
  }

  if (ast.kind === "aggregate") {
    throw new InvalidRequestError(`Cannot aggregate ${found.kind} "${text}"`, { details: { entity: text } });
  }
  if (ast.comparison) {
    throw new InvalidRequestError(`Cannot compare ${found.kind} "${ast.name.join(".")}" with a value`, {
      details: { entity: text },
    });
  }
  return found.kind === "table"
    ? { kind: "table", text, table: found.table }
    : { kind: "filter", text, filter: found.filter };
}

/**
 * Parse and bind one referenced entity. Throws UnknownEntityError for names
 * the model does not declare and InvalidRequestError for malformed or
 * ambiguous references.
 */
export function resolveEntity(model: SemanticModel, text: string): ResolvedEntity {
  return bind(model, text, parseEntityRef(text));
}

export function resolveEntities(model: SemanticModel, texts: readonly string[]): ResolvedEntity[] {
  return texts.map((text) => resolveEntity(model, text));
}
