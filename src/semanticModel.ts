// semanticModel.ts
// In-memory semantic model: tables, fields, filters, relationships and
// verified queries, plus the lookups every other component goes through.
//
// Key ideas:
//
// - All names are NormalizedIdentifiers; lookups compare keys, never raw text.
// - Fields are a tagged union (dimension / time_dimension / fact / metric).
// - The loader deep-freezes the model, so a snapshot can be shared by any
//   number of concurrent requests.

import { UnknownEntityError } from "./errors";
import {
  type NormalizedIdentifier,
  emitIdentifier,
  emitQualifiedName,
  normalize,
} from "./identifiers";

/* --------------------------------------------------------------------------
 * BASIC TYPES
 * -------------------------------------------------------------------------- */

export type SemanticType = "number" | "text" | "boolean" | "timestamp" | "variant" | "array";

export const SEMANTIC_TYPES: readonly SemanticType[] = [
  "number",
  "text",
  "boolean",
  "timestamp",
  "variant",
  "array",
];

export type AggregationOperator = "sum" | "avg" | "count" | "min" | "max";

export const AGGREGATION_OPERATORS: readonly AggregationOperator[] = [
  "sum",
  "avg",
  "count",
  "min",
  "max",
];

/**
 * Whether an aggregation can be applied to a value of the given type.
 */
export function isAggregationCompatible(op: AggregationOperator, type: SemanticType): boolean {
  switch (op) {
    case "count":
      return true;
    case "sum":
    case "avg":
      return type === "number";
    case "min":
    case "max":
      return type === "number" || type === "text" || type === "timestamp";
  }
}

const WAREHOUSE_TYPE_PATTERNS: Array<[RegExp, SemanticType]> = [
  [/^(number|numeric|decimal|int|integer|bigint|smallint|tinyint|byteint|float\d*|double( precision)?|real)\b/, "number"],
  [/^(varchar|char|character|string|text|nvarchar|nchar|binary|varbinary)\b/, "text"],
  [/^(boolean|bool)\b/, "boolean"],
  [/^(date|datetime|time|timestamp(_ntz|_ltz|_tz)?)\b/, "timestamp"],
  [/^(variant|object|json|geography|geometry)\b/, "variant"],
  [/^array\b/, "array"],
];

/**
 * Map a declared data_type onto a semantic type. Accepts the semantic names
 * themselves and common warehouse type names (NUMBER(38,0), VARCHAR, ...).
 */
export function semanticTypeOf(dataType: string): SemanticType | undefined {
  const lowered = dataType.trim().toLowerCase();
  const direct = SEMANTIC_TYPES.find((t) => t === lowered);
  if (direct) return direct;
  return WAREHOUSE_TYPE_PATTERNS.find(([pattern]) => pattern.test(lowered))?.[1];
}

/* --------------------------------------------------------------------------
 * TABLES + FIELDS
 * -------------------------------------------------------------------------- */

interface FieldBase {
  name: NormalizedIdentifier;
  /** Key of the owning table. */
  table: string;
  /** SQL over the table's physical columns. */
  expr: string;
  dataType: SemanticType;
  /** data_type as declared, e.g. DATE or TIMESTAMP_NTZ. */
  declaredType: string;
  synonyms: readonly string[];
  description?: string;
}

export interface DimensionField extends FieldBase {
  kind: "dimension" | "time_dimension";
}

export interface FactField extends FieldBase {
  kind: "fact";
  defaultAggregation?: AggregationOperator;
}

/** Pre-aggregated expression, e.g. COUNT(DISTINCT o_custkey). */
export interface MetricField extends FieldBase {
  kind: "metric";
}

export type SemanticField = DimensionField | FactField | MetricField;

/** Calendar dates carry no time of day; other timestamp types do. */
export function isDateOnly(field: SemanticField): boolean {
  return /^date$/i.test(field.declaredType.trim());
}

export interface SemanticFilter {
  name: NormalizedIdentifier;
  table: string;
  expr: string;
  synonyms: readonly string[];
  description?: string;
}

export interface SemanticTable {
  name: NormalizedIdentifier;
  /** database.schema.table parts, as declared by base_table. */
  physicalName: readonly NormalizedIdentifier[];
  description?: string;
  synonyms: readonly string[];
  /** Field keys forming the primary key. */
  primaryKey: readonly string[];
  uniqueKeys: readonly (readonly string[])[];
  fields: readonly SemanticField[];
  filters: readonly SemanticFilter[];
}

/* --------------------------------------------------------------------------
 * RELATIONSHIPS
 * -------------------------------------------------------------------------- */

export type JoinType = "inner" | "left_outer";

export type RelationshipType = "many_to_one" | "one_to_one" | "one_to_many";

export interface ColumnPair {
  /** Field key on the left table. */
  left: string;
  /** Field key on the right table. */
  right: string;
}

export interface Relationship {
  name: string;
  leftTable: string;
  rightTable: string;
  columns: readonly ColumnPair[];
  joinType: JoinType;
  relationshipType: RelationshipType;
  /** True when relationship_type was derived from primary/unique keys. */
  inferred: boolean;
}

/* --------------------------------------------------------------------------
 * VERIFIED QUERIES
 * -------------------------------------------------------------------------- */

export interface QueryShape {
  aggregate: boolean;
  grouped: boolean;
  timeScoped: boolean;
  limited: boolean;
}

export interface VerifiedQuery {
  name: string;
  question: string;
  /** Paraphrases validated as asking the same thing. */
  synonyms: readonly string[];
  sql: string;
  /** Keys of tables the template touches (placeholders and named tables). */
  tables: readonly string[];
  /** :name bindings the template needs. */
  bindings: readonly string[];
  shape: QueryShape;
  verifiedAt?: number;
  verifiedBy?: string;
  onboarding: boolean;
}

export interface SemanticModel {
  name: string;
  description?: string;
  tables: readonly SemanticTable[];
  relationships: readonly Relationship[];
  verifiedQueries: readonly VerifiedQuery[];
}

/* --------------------------------------------------------------------------
 * LOOKUPS
 * -------------------------------------------------------------------------- */

function matchesSynonym(synonyms: readonly string[], raw: string): boolean {
  const wanted = raw.trim().toLowerCase();
  return synonyms.some((s) => s.trim().toLowerCase() === wanted);
}

function tryNormalize(raw: string): NormalizedIdentifier | null {
  try {
    return normalize(raw);
  } catch {
    // not an identifier; synonyms may still match
    return null;
  }
}

/**
 * Find a table by identifier, then by synonym.
 */
export function findTable(model: SemanticModel, raw: string): SemanticTable | undefined {
  const id = tryNormalize(raw);
  return (
    (id ? model.tables.find((t) => t.name.key === id.key) : undefined) ??
    model.tables.find((t) => matchesSynonym(t.synonyms, raw))
  );
}

export function getTable(model: SemanticModel, key: string): SemanticTable {
  const table = model.tables.find((t) => t.name.key === key);
  if (!table) throw new UnknownEntityError("table", key);
  return table;
}

export function findField(table: SemanticTable, raw: string): SemanticField | undefined {
  const id = tryNormalize(raw);
  return (
    (id ? table.fields.find((f) => f.name.key === id.key) : undefined) ??
    table.fields.find((f) => matchesSynonym(f.synonyms, raw))
  );
}

export function getField(table: SemanticTable, key: string): SemanticField {
  const field = table.fields.find((f) => f.name.key === key);
  if (!field) throw new UnknownEntityError("field", key, table.name.key);
  return field;
}

export function findFilter(table: SemanticTable, raw: string): SemanticFilter | undefined {
  const id = tryNormalize(raw);
  return (
    (id ? table.filters.find((f) => f.name.key === id.key) : undefined) ??
    table.filters.find((f) => matchesSynonym(f.synonyms, raw))
  );
}

/** Emitted database.schema.table for a semantic table. */
export function physicalTableName(table: SemanticTable): string {
  return emitQualifiedName([...table.physicalName]);
}

/** Alias used for the table inside generated SQL. */
export function tableAlias(table: SemanticTable): string {
  return emitIdentifier(table.name);
}

/**
 * Time dimensions first, then plain timestamp dimensions.
 */
export function timeDimensions(table: SemanticTable): DimensionField[] {
  const dims = table.fields.filter(
    (f): f is DimensionField =>
      (f.kind === "time_dimension" || f.kind === "dimension") && f.dataType === "timestamp"
  );
  return [
    ...dims.filter((d) => d.kind === "time_dimension"),
    ...dims.filter((d) => d.kind === "dimension"),
  ];
}

/** Verified questions flagged for onboarding, in declaration order. */
export function onboardingQuestions(model: SemanticModel): string[] {
  return model.verifiedQueries.filter((q) => q.onboarding).map((q) => q.question);
}
