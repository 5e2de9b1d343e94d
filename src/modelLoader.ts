// modelLoader.ts
// Parse and validate a semantic model document.
//
// Each table, relationship and verified query is shape-checked with zod on
// its own; the semantic checks then run over every entry that parsed and
// keep going after the first problem, so one load reports every issue in the
// definition. A model that loads is deep-frozen.

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ModelError, type ValidationIssue, isEngineError } from "./errors";
import { type NormalizedIdentifier, normalize, parseQualifiedName } from "./identifiers";
import { inferRelationshipType } from "./joinGraph";
import type { Logger } from "./logger";
import {
  AGGREGATION_OPERATORS,
  type AggregationOperator,
  type ColumnPair,
  type QueryShape,
  type Relationship,
  type SemanticField,
  type SemanticFilter,
  type SemanticModel,
  type SemanticTable,
  type SemanticType,
  type VerifiedQuery,
  isAggregationCompatible,
  semanticTypeOf,
} from "./semanticModel";
import { nextSignificant, tokenizeSql } from "./sqlText";

/* --------------------------------------------------------------------------
 * DOCUMENT SCHEMA
 * -------------------------------------------------------------------------- */

const NameSchema = z.string().min(1, "name cannot be empty");
const SynonymsSchema = z.array(z.string().min(1)).default([]);
const DescriptionSchema = z.string().optional();

const DimensionSchema = z.object({
  name: NameSchema,
  expr: z.string().min(1, "expr cannot be empty"),
  data_type: z.string().min(1),
  synonyms: SynonymsSchema,
  description: DescriptionSchema,
});

const FactSchema = DimensionSchema.extend({
  default_aggregation: z.enum(["sum", "avg", "count", "min", "max"]).optional(),
});

const MetricSchema = z.object({
  name: NameSchema,
  expr: z.string().min(1, "expr cannot be empty"),
  data_type: z.string().min(1).optional(),
  synonyms: SynonymsSchema,
  description: DescriptionSchema,
});

const FilterSchema = z.object({
  name: NameSchema,
  expr: z.string().min(1, "expr cannot be empty"),
  synonyms: SynonymsSchema,
  description: DescriptionSchema,
});

const BaseTableSchema = z.union([
  z.string().min(1),
  z.object({
    database: z.string().min(1).optional(),
    schema: z.string().min(1).optional(),
    table: z.string().min(1),
  }),
]);

const KeySchema = z.object({ columns: z.array(z.string().min(1)) });

const TableSchema = z.object({
  name: NameSchema,
  description: DescriptionSchema,
  synonyms: SynonymsSchema,
  base_table: BaseTableSchema.optional(),
  primary_key: KeySchema.optional(),
  unique_keys: z.array(KeySchema).default([]),
  dimensions: z.array(DimensionSchema).default([]),
  time_dimensions: z.array(DimensionSchema).default([]),
  facts: z.array(FactSchema).default([]),
  metrics: z.array(MetricSchema).default([]),
  filters: z.array(FilterSchema).default([]),
});

const RelationshipSchema = z.object({
  name: NameSchema,
  left_table: NameSchema,
  right_table: NameSchema,
  relationship_columns: z.array(
    z.object({ left_column: z.string().min(1), right_column: z.string().min(1) })
  ),
  join_type: z.enum(["inner", "left_outer"]).default("inner"),
  relationship_type: z.enum(["many_to_one", "one_to_one", "one_to_many", "many_to_many"]).optional(),
});

const VerifiedQuerySchema = z.object({
  name: NameSchema,
  question: z.string().min(1, "question cannot be empty"),
  synonyms: SynonymsSchema,
  sql: z.string().min(1, "sql cannot be empty"),
  verified_at: z.number().optional(),
  verified_by: z.string().optional(),
  use_as_onboarding_question: z.boolean().default(false),
});

/**
 * Top level of a document. Entries are validated one by one afterwards so a
 * shape error in one table does not hide problems elsewhere.
 */
const ModelEnvelopeSchema = z.object({
  name: NameSchema,
  description: DescriptionSchema,
  tables: z.array(z.unknown()).min(1, "a model needs at least one table"),
  relationships: z.array(z.unknown()).default([]),
  verified_queries: z.array(z.unknown()).default([]),
});

const NamedEntrySchema = z.object({ name: z.string().min(1) });

type TableDocument = z.infer<typeof TableSchema>;
type RelationshipDocument = z.infer<typeof RelationshipSchema>;
type VerifiedQueryDocument = z.infer<typeof VerifiedQuerySchema>;

interface Entry<T> {
  doc: T;
  index: number;
}

interface ModelEntries {
  name: string;
  description?: string;
  tables: Entry<TableDocument>[];
  relationships: Entry<RelationshipDocument>[];
  verifiedQueries: Entry<VerifiedQueryDocument>[];
  /** Keys of tables whose entry failed shape validation. */
  rejectedTables: Set<string>;
}

/** Bindings a verified query template may use. */
export const KNOWN_BINDINGS = ["start_date", "end_date", "limit"] as const;

/* --------------------------------------------------------------------------
 * LOAD RESULT
 * -------------------------------------------------------------------------- */

export type LoadResult =
  | { ok: true; model: SemanticModel; warnings: ValidationIssue[] }
  | { ok: false; error: ModelError };

export interface LoadOptions {
  logger?: Logger;
}

class IssueCollector {
  readonly errors: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];

  error(path: Array<string | number>, message: string, suggestion?: string): void {
    this.errors.push({ path: path.map(String), message, ...(suggestion && { suggestion }) });
  }

  warn(path: Array<string | number>, message: string): void {
    this.warnings.push({ path: path.map(String), message });
  }

  /** Normalize a name, recording an issue instead of throwing. */
  identifier(path: Array<string | number>, raw: string): NormalizedIdentifier | null {
    try {
      return normalize(raw);
    } catch (err) {
      if (!isEngineError(err)) throw err;
      this.error(path, err.message);
      return null;
    }
  }
}

function parseEntries<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  section: string,
  raw: unknown[],
  issues: IssueCollector,
  onRejected?: (entry: unknown) => void
): Entry<T>[] {
  const entries: Entry<T>[] = [];
  raw.forEach((entry, index) => {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      entries.push({ doc: parsed.data, index });
      return;
    }
    parsed.error.issues.forEach((issue) => issues.error([section, index, ...issue.path], issue.message));
    onRejected?.(entry);
  });
  return entries;
}

function rejectedKey(entry: unknown): string | null {
  const named = NamedEntrySchema.safeParse(entry);
  if (!named.success) return null;
  try {
    return normalize(named.data.name).key;
  } catch (err) {
    if (!isEngineError(err)) throw err;
    return null;
  }
}

/* --------------------------------------------------------------------------
 * TABLES
 * -------------------------------------------------------------------------- */

function physicalNameOf(
  doc: TableDocument,
  name: NormalizedIdentifier,
  path: Array<string | number>,
  issues: IssueCollector
): NormalizedIdentifier[] {
  const base = doc.base_table;
  if (!base) return [name];
  try {
    if (typeof base === "string") return parseQualifiedName(base);
    return [base.database, base.schema, base.table]
      .filter((part): part is string => part !== undefined)
      .map((part) => normalize(part));
  } catch (err) {
    if (!isEngineError(err)) throw err;
    issues.error([...path, "base_table"], err.message);
    return [name];
  }
}

const FIELD_SECTIONS = [
  ["dimensions", "dimension"],
  ["time_dimensions", "time_dimension"],
  ["facts", "fact"],
  ["metrics", "metric"],
] as const;

interface FieldDocument {
  name: string;
  expr: string;
  data_type?: string;
  default_aggregation?: AggregationOperator;
  synonyms: string[];
  description?: string;
}

function buildFields(
  doc: TableDocument,
  tableKey: string,
  path: Array<string | number>,
  issues: IssueCollector
): SemanticField[] {
  const fields: SemanticField[] = [];
  const seen = new Set<string>();

  for (const [section, kind] of FIELD_SECTIONS) {
    const entries: FieldDocument[] = doc[section];
    entries.forEach((fieldDoc, index) => {
      const fieldPath = [...path, section, index];
      const name = issues.identifier([...fieldPath, "name"], fieldDoc.name);
      if (!name) return;
      if (seen.has(name.key)) {
        issues.error(fieldPath, `Duplicate field "${fieldDoc.name}" on table "${tableKey}"`);
        return;
      }
      seen.add(name.key);

      // metrics are numeric unless declared otherwise
      const declaredType = fieldDoc.data_type ?? "number";
      const dataType = semanticTypeOf(declaredType);
      if (!dataType) {
        issues.error(
          [...fieldPath, "data_type"],
          `Unknown data_type "${declaredType}"`,
          "Use number, text, boolean, timestamp, variant, array or a warehouse type name."
        );
        return;
      }

      const base = {
        name,
        table: tableKey,
        expr: fieldDoc.expr,
        dataType,
        declaredType,
        synonyms: fieldDoc.synonyms,
        ...(fieldDoc.description !== undefined && { description: fieldDoc.description }),
      };

      if (kind === "time_dimension" && dataType !== "timestamp") {
        issues.error([...fieldPath, "data_type"], `Time dimension "${fieldDoc.name}" must be a timestamp, got ${dataType}`);
      }

      if (kind === "fact") {
        const aggregation = fieldDoc.default_aggregation;
        if (aggregation && !isAggregationCompatible(aggregation, dataType)) {
          issues.error(
            [...fieldPath, "default_aggregation"],
            `default_aggregation "${aggregation}" is not compatible with ${dataType} fact "${fieldDoc.name}"`,
            `Use one of ${AGGREGATION_OPERATORS.filter((op) => isAggregationCompatible(op, dataType)).join(", ")}.`
          );
        }
        fields.push({ ...base, kind, ...(aggregation && { defaultAggregation: aggregation }) });
      } else {
        fields.push({ ...base, kind });
      }
    });
  }

  return fields;
}

function buildFilters(
  doc: TableDocument,
  tableKey: string,
  fields: SemanticField[],
  path: Array<string | number>,
  issues: IssueCollector
): SemanticFilter[] {
  const filters: SemanticFilter[] = [];
  doc.filters.forEach((filterDoc, index) => {
    const filterPath = [...path, "filters", index];
    const name = issues.identifier([...filterPath, "name"], filterDoc.name);
    if (!name) return;
    if (filters.some((f) => f.name.key === name.key) || fields.some((f) => f.name.key === name.key)) {
      issues.error(filterPath, `Filter "${filterDoc.name}" collides with another name on table "${tableKey}"`);
      return;
    }
    filters.push({
      name,
      table: tableKey,
      expr: filterDoc.expr,
      synonyms: filterDoc.synonyms,
      ...(filterDoc.description !== undefined && { description: filterDoc.description }),
    });
  });
  return filters;
}

function keyColumns(
  columns: string[],
  fields: SemanticField[],
  tableKey: string,
  path: Array<string | number>,
  issues: IssueCollector
): string[] {
  const keys: string[] = [];
  columns.forEach((column, index) => {
    const id = issues.identifier([...path, index], column);
    if (!id) return;
    const field = fields.find((f) => f.name.key === id.key);
    if (!field || (field.kind !== "dimension" && field.kind !== "time_dimension")) {
      issues.error(
        [...path, index],
        `Key column "${column}" is not a declared dimension of table "${tableKey}"`,
        "Declare the column as a dimension of the same table."
      );
      return;
    }
    keys.push(id.key);
  });
  return keys;
}

function buildTable(
  doc: TableDocument,
  index: number,
  seen: Set<string>,
  issues: IssueCollector
): SemanticTable | null {
  const path = ["tables", index];
  const name = issues.identifier([...path, "name"], doc.name);
  if (!name) return null;
  if (seen.has(name.key)) {
    issues.error(path, `Duplicate table "${doc.name}"`);
    return null;
  }
  seen.add(name.key);

  const fields = buildFields(doc, name.key, path, issues);
  const filters = buildFilters(doc, name.key, fields, path, issues);

  const pkColumns = doc.primary_key?.columns ?? [];
  if (pkColumns.length === 0) {
    issues.error([...path, "primary_key"], `Table "${doc.name}" declares no primary key`, "Add primary_key.columns.");
  }
  const primaryKey = keyColumns(pkColumns, fields, name.key, [...path, "primary_key", "columns"], issues);
  const uniqueKeys = doc.unique_keys.map((key, keyIndex) =>
    keyColumns(key.columns, fields, name.key, [...path, "unique_keys", keyIndex, "columns"], issues)
  );

  return {
    name,
    physicalName: physicalNameOf(doc, name, path, issues),
    ...(doc.description !== undefined && { description: doc.description }),
    synonyms: doc.synonyms,
    primaryKey,
    uniqueKeys,
    fields,
    filters,
  };
}

/* --------------------------------------------------------------------------
 * RELATIONSHIPS
 * -------------------------------------------------------------------------- */

function typesCompatible(left: SemanticType, right: SemanticType): boolean {
  return left === right || left === "variant" || right === "variant";
}

function joinColumn(
  table: SemanticTable,
  raw: string,
  path: Array<string | number>,
  issues: IssueCollector
): SemanticField | null {
  const id = issues.identifier(path, raw);
  if (!id) return null;
  const field = table.fields.find((f) => f.name.key === id.key);
  if (!field || field.kind === "metric") {
    issues.error(
      path,
      `Column "${raw}" is not a declared dimension or fact of table "${table.name.key}"`,
      "Relationship columns must reference declared dimensions or facts."
    );
    return null;
  }
  return field;
}

function buildRelationship(
  doc: RelationshipDocument,
  index: number,
  tables: SemanticTable[],
  rejectedTables: Set<string>,
  seen: Set<string>,
  issues: IssueCollector
): Relationship | null {
  const path = ["relationships", index];
  if (seen.has(doc.name.toLowerCase())) {
    issues.error(path, `Duplicate relationship "${doc.name}"`);
    return null;
  }
  seen.add(doc.name.toLowerCase());

  const tableFor = (raw: string, side: "left_table" | "right_table") => {
    const id = issues.identifier([...path, side], raw);
    if (!id) return null;
    const table = tables.find((t) => t.name.key === id.key);
    // a table that failed validation is already reported
    if (!table && !rejectedTables.has(id.key)) {
      issues.error([...path, side], `Relationship "${doc.name}" references unknown table "${raw}"`);
    }
    return table ?? null;
  };
  const left = tableFor(doc.left_table, "left_table");
  const right = tableFor(doc.right_table, "right_table");

  if (doc.relationship_columns.length === 0) {
    issues.error([...path, "relationship_columns"], `Relationship "${doc.name}" declares no columns`);
  }
  if (!left || !right) return null;
  if (left.name.key === right.name.key) {
    issues.error(path, `Relationship "${doc.name}" joins table "${left.name.key}" to itself`);
    return null;
  }

  const columns: ColumnPair[] = [];
  let valid = doc.relationship_columns.length > 0;
  doc.relationship_columns.forEach((pair, pairIndex) => {
    const pairPath = [...path, "relationship_columns", pairIndex];
    const leftField = joinColumn(left, pair.left_column, [...pairPath, "left_column"], issues);
    const rightField = joinColumn(right, pair.right_column, [...pairPath, "right_column"], issues);
    if (!leftField || !rightField) {
      valid = false;
      return;
    }
    if (!typesCompatible(leftField.dataType, rightField.dataType)) {
      issues.error(
        pairPath,
        `Cannot join ${left.name.key}.${leftField.name.key} (${leftField.dataType}) to ${right.name.key}.${rightField.name.key} (${rightField.dataType})`
      );
      valid = false;
      return;
    }
    columns.push({ left: leftField.name.key, right: rightField.name.key });
  });
  if (!valid) return null;

  if (doc.relationship_type === "many_to_many") {
    issues.error([...path, "relationship_type"], `Relationship "${doc.name}" is many_to_many, which cannot be joined safely`);
    return null;
  }
  if (doc.relationship_type) {
    return {
      name: doc.name,
      leftTable: left.name.key,
      rightTable: right.name.key,
      columns,
      joinType: doc.join_type,
      relationshipType: doc.relationship_type,
      inferred: false,
    };
  }

  const inferred = inferRelationshipType(
    left,
    right,
    columns.map((c) => c.left),
    columns.map((c) => c.right)
  );
  if (inferred.type === "many_to_many") {
    issues.error(
      path,
      `Relationship "${doc.name}" has no primary or unique key on either side of its join columns (many_to_many)`,
      "Declare a primary key covering the join columns on one side."
    );
    return null;
  }
  if (inferred.swapped) {
    issues.warn(path, `Relationship "${doc.name}" swapped so that ${right.name.key} is the many side`);
  }
  return {
    name: doc.name,
    leftTable: inferred.swapped ? right.name.key : left.name.key,
    rightTable: inferred.swapped ? left.name.key : right.name.key,
    columns: inferred.swapped ? columns.map((c) => ({ left: c.right, right: c.left })) : columns,
    joinType: doc.join_type,
    relationshipType: inferred.type,
    inferred: true,
  };
}

/* --------------------------------------------------------------------------
 * VERIFIED QUERIES
 * -------------------------------------------------------------------------- */

const AGGREGATE_FUNCTIONS = ["SUM", "COUNT", "AVG", "MIN", "MAX"];

function templateShape(sql: string, bindings: string[]): QueryShape {
  const tokens = tokenizeSql(sql);
  const words = tokens.filter((t) => t.kind === "word").map((t) => t.text.toUpperCase());
  const aggregate = tokens.some(
    (t, i) =>
      t.kind === "word" &&
      AGGREGATE_FUNCTIONS.includes(t.text.toUpperCase()) &&
      nextSignificant(tokens, i)?.text === "("
  );
  return {
    aggregate,
    grouped: words.some((w, i) => w === "GROUP" && words[i + 1] === "BY"),
    timeScoped: bindings.includes("start_date") || bindings.includes("end_date"),
    limited: words.includes("LIMIT"),
  };
}

function buildVerifiedQuery(
  doc: VerifiedQueryDocument,
  index: number,
  tables: SemanticTable[],
  rejectedTables: Set<string>,
  seen: Set<string>,
  issues: IssueCollector
): VerifiedQuery | null {
  const path = ["verified_queries", index];
  if (seen.has(doc.name.toLowerCase())) {
    issues.error(path, `Duplicate verified query "${doc.name}"`);
    return null;
  }
  seen.add(doc.name.toLowerCase());

  const referenced: string[] = [];
  const bindings: string[] = [];
  let valid = true;

  for (const token of tokenizeSql(doc.sql)) {
    if (token.kind === "placeholder") {
      const raw = token.name ?? "";
      const id = issues.identifier([...path, "sql"], raw);
      const table = id ? tables.find((t) => t.name.key === id.key) : undefined;
      if (!table) {
        if (id && !rejectedTables.has(id.key)) {
          issues.error([...path, "sql"], `Verified query "${doc.name}" references unknown table "{{${raw}}}"`);
        }
        valid = false;
        continue;
      }
      if (!referenced.includes(table.name.key)) referenced.push(table.name.key);
    } else if (token.kind === "binding" && token.name) {
      if (!(KNOWN_BINDINGS as readonly string[]).includes(token.name)) {
        issues.error(
          [...path, "sql"],
          `Verified query "${doc.name}" uses unknown binding ":${token.name}"`,
          `Known bindings: ${KNOWN_BINDINGS.map((b) => `:${b}`).join(", ")}.`
        );
        valid = false;
      } else if (!bindings.includes(token.name)) {
        bindings.push(token.name);
      }
    } else if (token.kind === "word" || token.kind === "quoted") {
      // physical or logical table names written out in the template
      const key = token.kind === "word" ? token.text.toUpperCase() : token.text.slice(1, -1).replace(/""/g, '"');
      const table = tables.find(
        (t) => t.name.key === key || t.physicalName[t.physicalName.length - 1]?.key === key
      );
      if (table && !referenced.includes(table.name.key)) referenced.push(table.name.key);
    }
  }
  if (!valid) return null;

  return {
    name: doc.name,
    question: doc.question,
    synonyms: doc.synonyms,
    sql: doc.sql,
    tables: referenced,
    bindings,
    shape: templateShape(doc.sql, bindings),
    ...(doc.verified_at !== undefined && { verifiedAt: doc.verified_at }),
    ...(doc.verified_by !== undefined && { verifiedBy: doc.verified_by }),
    onboarding: doc.use_as_onboarding_question,
  };
}

/* --------------------------------------------------------------------------
 * ENTRY POINTS
 * -------------------------------------------------------------------------- */

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function parseDefinition(definition: unknown, issues: IssueCollector): unknown {
  if (typeof definition !== "string") return definition;
  try {
    return parseYaml(definition);
  } catch (err) {
    issues.error([], `Model definition is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

function parseDocument(raw: unknown, issues: IssueCollector): ModelEntries | null {
  const envelope = ModelEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    envelope.error.issues.forEach((issue) => issues.error(issue.path, issue.message));
    return null;
  }

  const rejectedTables = new Set<string>();
  const tables = parseEntries(TableSchema, "tables", envelope.data.tables, issues, (entry) => {
    const key = rejectedKey(entry);
    if (key) rejectedTables.add(key);
  });
  return {
    name: envelope.data.name,
    ...(envelope.data.description !== undefined && { description: envelope.data.description }),
    tables,
    relationships: parseEntries(RelationshipSchema, "relationships", envelope.data.relationships, issues),
    verifiedQueries: parseEntries(VerifiedQuerySchema, "verified_queries", envelope.data.verified_queries, issues),
    rejectedTables,
  };
}

/**
 * Load a semantic model from YAML text or an already-parsed document.
 */
export function loadModel(definition: unknown, options: LoadOptions = {}): LoadResult {
  const issues = new IssueCollector();
  const raw = parseDefinition(definition, issues);
  const entries = issues.errors.length === 0 ? parseDocument(raw, issues) : null;

  if (entries) {
    const model = buildModel(entries, issues);
    if (issues.errors.length === 0) {
      options.logger?.info(`Loaded semantic model "${model.name}"`, {
        tables: model.tables.length,
        relationships: model.relationships.length,
        verifiedQueries: model.verifiedQueries.length,
        warnings: issues.warnings.length,
      });
      return { ok: true, model: deepFreeze(model), warnings: issues.warnings };
    }
  }

  options.logger?.warn("Semantic model rejected", { issues: issues.errors.length });
  return { ok: false, error: new ModelError(issues.errors) };
}

function buildModel(doc: ModelEntries, issues: IssueCollector): SemanticModel {
  const { rejectedTables } = doc;

  const tableNames = new Set<string>();
  const tables = doc.tables
    .map(({ doc: t, index }) => buildTable(t, index, tableNames, issues))
    .filter((t): t is SemanticTable => t !== null);

  const relationshipNames = new Set<string>();
  const relationships = doc.relationships
    .map(({ doc: r, index }) => buildRelationship(r, index, tables, rejectedTables, relationshipNames, issues))
    .filter((r): r is Relationship => r !== null);

  const queryNames = new Set<string>();
  const verifiedQueries = doc.verifiedQueries
    .map(({ doc: q, index }) => buildVerifiedQuery(q, index, tables, rejectedTables, queryNames, issues))
    .filter((q): q is VerifiedQuery => q !== null);

  return {
    name: doc.name,
    ...(doc.description !== undefined && { description: doc.description }),
    tables,
    relationships,
    verifiedQueries,
  };
}

export async function loadModelFile(path: string, options: LoadOptions = {}): Promise<LoadResult> {
  const text = await readFile(path, "utf8");
  return loadModel(text, options);
}
