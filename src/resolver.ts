// resolver.ts
// Resolution orchestrator: one request in, one SQL text (or one typed error)
// out, with a diagnostic trail either way.
//
// Key ideas:
//
// - A verified query that clears the acceptance threshold always wins; its
//   template is filled with the request's literals and never re-planned.
// - Otherwise the query is generated from declared relationships only, so a
//   generated answer is as trustworthy as the model (confidence 1.0).
// - Every request runs through an explicit state machine; each transition is
//   checked and recorded in the diagnostics.
// - The model snapshot is captured once per request. reload() swaps the
//   reference, so in-flight requests finish on the model they started with.

import { z } from "zod";
import { type ResolverConfig, defaultConfig } from "./config";
import type { ComparisonAst } from "./dsl";
import { type EmitJoin, emit } from "./emitter";
import { type ResolvedEntity, entityTable, resolveEntities } from "./entities";
import {
  AmbiguousAggregationError,
  EngineError,
  InvalidRequestError,
  type ModelError,
  NoMatchAndUnresolvableError,
  type QuerySource,
  UnreachableError,
  type ValidationIssue,
  isEngineError,
} from "./errors";
import { type JoinPlan, resolveJoins } from "./joinGraph";
import { type Logger, createLogger } from "./logger";
import { loadModel } from "./modelLoader";
import {
  type QueryShape,
  type SemanticModel,
  type SemanticField,
  type SemanticTable,
  type VerifiedQuery,
  getField,
  getTable,
  isDateOnly,
  onboardingQuestions,
  physicalTableName,
  tableAlias,
  timeDimensions,
} from "./semanticModel";
import {
  type FieldRef,
  type FilterNode,
  type Projection,
  type TimeWindow,
  compileFilter,
  f,
  projectField,
  renderExpression,
  nextDay,
  resolveTimeWindow,
  substitute,
} from "./substitution";
import { type CandidateScore, type MatchRequest, rankVerifiedQueries, selectMatch, spotTables } from "./verifiedQueries";

/* --------------------------------------------------------------------------
 * REQUEST
 * -------------------------------------------------------------------------- */

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected a YYYY-MM-DD date")
  .refine(isCalendarDate, "not a calendar date");

export const ResolutionRequestSchema = z.object({
  intent_text: z.string(),
  referenced_entities: z.array(z.string()).default([]),
  time_range: z
    .object({ start: IsoDateSchema, end: IsoDateSchema })
    .refine((range) => range.start <= range.end, "time_range.start must not be after time_range.end")
    .optional(),
  limit: z.number().int().positive().optional(),
});

export type ResolutionRequest = z.input<typeof ResolutionRequestSchema>;
type ValidRequest = z.infer<typeof ResolutionRequestSchema>;

/* --------------------------------------------------------------------------
 * STATE MACHINE
 * -------------------------------------------------------------------------- */

export type ResolutionState =
  | "Received"
  | "MatchingVerified"
  | "Matched"
  | "Substituting"
  | "Unmatched"
  | "ResolvingJoins"
  | "Projecting"
  | "Emitting"
  | "Done"
  | "NoMatchAndUnresolvable"
  | "InvalidRequest";

export type FailureState = "NoMatchAndUnresolvable" | "InvalidRequest";

const TRANSITIONS: Record<ResolutionState, readonly ResolutionState[]> = {
  Received: ["MatchingVerified", "InvalidRequest"],
  MatchingVerified: ["Matched", "Unmatched"],
  Matched: ["Substituting"],
  Substituting: ["Done", "InvalidRequest"],
  Unmatched: ["ResolvingJoins", "NoMatchAndUnresolvable"],
  ResolvingJoins: ["Projecting", "NoMatchAndUnresolvable", "InvalidRequest"],
  Projecting: ["Emitting", "NoMatchAndUnresolvable", "InvalidRequest"],
  Emitting: ["Done", "InvalidRequest"],
  Done: [],
  NoMatchAndUnresolvable: [],
  InvalidRequest: [],
};

export function canTransition(from: ResolutionState, to: ResolutionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/* --------------------------------------------------------------------------
 * OUTCOME
 * -------------------------------------------------------------------------- */

export interface JoinDiagnostics {
  root: string;
  path: string[];
  rationale: string[];
}

/** A verified query that matched but could not carry every request constraint. */
export interface RejectedMatch {
  name: string;
  unbound: Array<"time_range" | "limit">;
}

export interface Diagnostics {
  states: ResolutionState[];
  candidates: CandidateScore[];
  rejectedMatch?: RejectedMatch;
  joins?: JoinDiagnostics;
  timeWindow?: TimeWindow;
}

export type ResolutionOutcome =
  | {
      ok: true;
      state: "Done";
      query_text: string;
      source: QuerySource;
      confidence: number;
      /** Name of the verified query that answered the request. */
      verified_query?: string;
      diagnostics: Diagnostics;
    }
  | { ok: false; state: FailureState; error: EngineError; diagnostics: Diagnostics };

export type ReloadResult = { ok: true; warnings: ValidationIssue[] } | { ok: false; error: ModelError };

export interface ResolverOptions {
  config?: ResolverConfig;
  logger?: Logger;
  /** Source of "today" for default lookback windows. */
  clock?: () => Date;
}

class ResolutionRun {
  state: ResolutionState = "Received";
  readonly diagnostics: Diagnostics = { states: ["Received"], candidates: [] };

  constructor(private readonly logger: Logger) {}

  transition(to: ResolutionState): void {
    if (!canTransition(this.state, to)) {
      throw new Error(`Illegal resolution transition ${this.state} -> ${to}`);
    }
    this.logger.debug(`${this.state} -> ${to}`);
    this.state = to;
    this.diagnostics.states.push(to);
  }

  fail(state: FailureState, error: EngineError): ResolutionOutcome {
    this.transition(state);
    this.logger.warn(`Resolution failed: ${error.message}`, { state, code: error.code });
    return { ok: false, state, error, diagnostics: this.diagnostics };
  }

  succeed(queryText: string, source: QuerySource, confidence: number, verifiedQuery?: string): ResolutionOutcome {
    this.transition("Done");
    this.logger.info(`Resolved ${source} query`, { confidence, ...(verifiedQuery && { verifiedQuery }) });
    return {
      ok: true,
      state: "Done",
      query_text: queryText,
      source,
      confidence,
      ...(verifiedQuery && { verified_query: verifiedQuery }),
      diagnostics: this.diagnostics,
    };
  }
}

function asEngineError(err: unknown): EngineError {
  if (isEngineError(err)) return err;
  throw err;
}

function issueText(issues: z.ZodIssue[]): string {
  return issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/* --------------------------------------------------------------------------
 * GENERATION HELPERS
 * -------------------------------------------------------------------------- */

const COMPARISON_FILTERS: Record<ComparisonAst["op"], (field: string, value: ComparisonAst["value"]) => FilterNode> = {
  "=": f.eq,
  "!=": f.ne,
  "<": f.lt,
  "<=": f.lte,
  ">": f.gt,
  ">=": f.gte,
};

function requestShape(entities: ResolvedEntity[], request: ValidRequest): QueryShape {
  const fields = entities.flatMap((e) => (e.kind === "field" ? [e] : []));
  const aggregated = (e: (typeof fields)[number]) =>
    e.aggregation !== undefined || e.field.kind === "fact" || e.field.kind === "metric";
  const aggregate = fields.some(aggregated);
  return {
    aggregate,
    grouped: aggregate && fields.some((e) => !aggregated(e) && e.comparison === null),
    timeScoped: request.time_range !== undefined,
    limited: request.limit !== undefined,
  };
}

/** Request constraints the template has no binding for. */
function unboundConstraints(query: VerifiedQuery, request: ValidRequest): RejectedMatch["unbound"] {
  const unbound: RejectedMatch["unbound"] = [];
  const datesBound = query.bindings.includes("start_date") && query.bindings.includes("end_date");
  if (request.time_range && !datesBound) unbound.push("time_range");
  if (request.limit !== undefined && !query.bindings.includes("limit")) unbound.push("limit");
  return unbound;
}

function uniqueTables(keys: string[]): string[] {
  return keys.filter((key, index) => keys.indexOf(key) === index);
}

/* --------------------------------------------------------------------------
 * RESOLVER
 * -------------------------------------------------------------------------- */

export class SemanticResolver {
  private model: SemanticModel;
  private readonly config: ResolverConfig;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(model: SemanticModel, options: ResolverOptions = {}) {
    this.model = model;
    this.config = options.config ?? defaultConfig;
    this.logger = (options.logger ?? createLogger({ level: this.config.logLevel })).child("resolver");
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Load a model definition (YAML text or parsed document) and wrap it.
   * Throws the ModelError when the definition is invalid.
   */
  static fromDefinition(definition: unknown, options: ResolverOptions = {}): SemanticResolver {
    const result = loadModel(definition, { logger: options.logger });
    if (!result.ok) throw result.error;
    return new SemanticResolver(result.model, options);
  }

  getModel(): SemanticModel {
    return this.model;
  }

  onboardingQuestions(): string[] {
    return onboardingQuestions(this.model);
  }

  /**
   * Replace the model. On failure the current model keeps serving.
   */
  reload(definition: unknown): ReloadResult {
    const result = loadModel(definition, { logger: this.logger });
    if (!result.ok) {
      this.logger.warn("Reload rejected; keeping current model", { issues: result.error.issues.length });
      return { ok: false, error: result.error };
    }
    const previous = this.model.name;
    this.model = result.model;
    this.logger.info(`Swapped semantic model "${previous}" for "${result.model.name}"`);
    return { ok: true, warnings: result.warnings };
  }

  resolve(request: ResolutionRequest): ResolutionOutcome {
    const model = this.model;
    const run = new ResolutionRun(this.logger);

    const parsed = ResolutionRequestSchema.safeParse(request);
    if (!parsed.success) {
      return run.fail(
        "InvalidRequest",
        new InvalidRequestError(`Malformed request: ${issueText(parsed.error.issues)}`, {
          details: { issues: parsed.error.issues.map((i) => ({ path: i.path.map(String), message: i.message })) },
        })
      );
    }
    const valid = parsed.data;

    let entities: ResolvedEntity[];
    try {
      entities = resolveEntities(model, valid.referenced_entities);
    } catch (err) {
      return run.fail("InvalidRequest", asEngineError(err));
    }

    run.transition("MatchingVerified");
    const matchRequest: MatchRequest = {
      intentText: valid.intent_text,
      tables: uniqueTables([...entities.map(entityTable), ...spotTables(model, valid.intent_text)]),
      shape: requestShape(entities, valid),
    };
    const ranked = rankVerifiedQueries(model, matchRequest);
    run.diagnostics.candidates = ranked.slice(0, this.config.maxDiagnosticCandidates);
    let match = selectMatch(model, ranked, { threshold: this.config.acceptanceThreshold });
    if (match) {
      const unbound = unboundConstraints(match.query, valid);
      if (unbound.length > 0) {
        this.logger.info(`Verified query "${match.query.name}" has no binding for ${unbound.join(", ")}; generating`);
        run.diagnostics.rejectedMatch = { name: match.query.name, unbound };
        match = null;
      }
    }

    const window = resolveTimeWindow(valid.time_range, {
      lookbackDays: this.config.defaultLookbackDays,
      today: this.clock(),
    });

    if (match) {
      run.transition("Matched");
      run.transition("Substituting");
      try {
        const bindings = {
          ...(window && { start_date: window.start, end_date: window.end }),
          limit: valid.limit ?? this.config.defaultRowLimit,
        };
        if (window && match.query.bindings.includes("start_date")) run.diagnostics.timeWindow = window;
        const text = substitute(match.query.sql, bindings, model);
        return run.succeed(text, "verified", match.confidence, match.query.name);
      } catch (err) {
        return run.fail("InvalidRequest", asEngineError(err));
      }
    }

    run.transition("Unmatched");
    return this.generate(model, run, entities, valid, window);
  }

  private generate(
    model: SemanticModel,
    run: ResolutionRun,
    entities: ResolvedEntity[],
    request: ValidRequest,
    window: TimeWindow | null
  ): ResolutionOutcome {
    const selects = entities.some((e) => e.kind === "field" && e.comparison === null);
    if (!selects) {
      return run.fail(
        "NoMatchAndUnresolvable",
        new NoMatchAndUnresolvableError(
          "No verified query matched and the request references nothing to select",
          {
            details: { bestCandidate: run.diagnostics.candidates[0] ?? null },
            hint: "Reference at least one dimension, fact or metric, or rephrase to match a verified question.",
          }
        )
      );
    }

    run.transition("ResolvingJoins");
    const required = uniqueTables(entities.map(entityTable));
    let plan: JoinPlan;
    try {
      plan = resolveJoins(model, required);
    } catch (err) {
      if (err instanceof UnreachableError) return run.fail("NoMatchAndUnresolvable", err);
      return run.fail("InvalidRequest", asEngineError(err));
    }
    run.diagnostics.joins = {
      root: plan.root,
      path: [plan.root, ...plan.steps.map((s) => s.table)],
      rationale: plan.rationale,
    };

    run.transition("Projecting");
    let projections: Projection[];
    let filters: string[];
    let having: string[];
    try {
      projections = this.projections(model, entities);
      ({ filters, having } = this.predicates(model, entities, request, window, run, plan));
    } catch (err) {
      if (err instanceof AmbiguousAggregationError) return run.fail("NoMatchAndUnresolvable", err);
      return run.fail("InvalidRequest", asEngineError(err));
    }

    run.transition("Emitting");
    const root = getTable(model, plan.root);
    const joins: EmitJoin[] = plan.steps.map((step) => {
      const fromTable = getTable(model, step.from);
      const toTable = getTable(model, step.table);
      return {
        table: physicalTableName(toTable),
        alias: tableAlias(toTable),
        joinType: step.joinType,
        on: step.columnPairs.map(
          (pair) =>
            `${renderExpression(getField(fromTable, pair.left).expr, tableAlias(fromTable))} = ${renderExpression(
              getField(toTable, pair.right).expr,
              tableAlias(toTable)
            )}`
        ),
      };
    });

    try {
      const text = emit({
        from: { table: physicalTableName(root), alias: tableAlias(root) },
        joins,
        projections,
        filters,
        having,
        ...(request.limit !== undefined && { limit: request.limit }),
      });
      return run.succeed(text, "generated", 1);
    } catch (err) {
      return run.fail("InvalidRequest", asEngineError(err));
    }
  }

  private projections(model: SemanticModel, entities: ResolvedEntity[]): Projection[] {
    const projections: Projection[] = [];
    for (const entity of entities) {
      if (entity.kind !== "field" || entity.comparison !== null) continue;
      const ref: FieldRef = { field: entity.field, ...(entity.aggregation && { aggregation: entity.aggregation }) };
      let projection = projectField(model, ref);
      if (projections.some((p) => p.expr === projection.expr && p.alias === projection.alias)) continue;
      if (projections.some((p) => p.alias === projection.alias)) {
        projection = projectField(model, { ...ref, aliasPrefix: entity.field.table });
      }
      projections.push(projection);
    }
    return projections;
  }

  private predicates(
    model: SemanticModel,
    entities: ResolvedEntity[],
    request: ValidRequest,
    window: TimeWindow | null,
    run: ResolutionRun,
    plan: JoinPlan
  ): { filters: string[]; having: string[] } {
    const filters: string[] = [];
    const having: string[] = [];
    let timeMentioned = false;

    for (const entity of entities) {
      if (entity.kind === "filter") {
        const table = getTable(model, entity.filter.table);
        filters.push(compileFilter(f.raw(renderExpression(entity.filter.expr, tableAlias(table)))));
        continue;
      }
      if (entity.kind !== "field" || entity.comparison === null) continue;

      const { field, aggregation, comparison } = entity;
      const toFilter = COMPARISON_FILTERS[comparison.op];
      const isAggregate = aggregation !== undefined || field.kind === "metric";
      if (isAggregate) {
        const projected = projectField(model, { field, ...(aggregation && { aggregation }) });
        having.push(compileFilter(toFilter(projected.expr, comparison.value)));
      } else {
        const table = getTable(model, field.table);
        filters.push(compileFilter(toFilter(renderExpression(field.expr, tableAlias(table)), comparison.value)));
        if (field.dataType === "timestamp") timeMentioned = true;
      }
    }

    const explicitRange = request.time_range !== undefined;
    if (window && (explicitRange || !timeMentioned)) {
      const timeField = this.timeDimensionFor(model, plan);
      if (timeField) {
        const column = renderExpression(timeField.field.expr, tableAlias(timeField.table));
        // timestamps run to the end of the last day: [start, end + 1 day)
        const range = isDateOnly(timeField.field)
          ? f.between(column, ":start_date", ":end_date")
          : f.and(f.gte(column, ":start_date"), f.lt(column, ":after_end_date"));
        filters.push(
          compileFilter(range, {
            bindings: { start_date: window.start, end_date: window.end, after_end_date: nextDay(window.end) },
          })
        );
        run.diagnostics.timeWindow = window;
      } else if (explicitRange) {
        throw new InvalidRequestError("time_range was given but none of the joined tables has a time dimension", {
          details: { tables: [plan.root, ...plan.steps.map((s) => s.table)] },
        });
      }
    }

    return { filters, having };
  }

  /** First time dimension on the plan's tables, root first. */
  private timeDimensionFor(
    model: SemanticModel,
    plan: JoinPlan
  ): { table: SemanticTable; field: SemanticField } | undefined {
    for (const key of [plan.root, ...plan.steps.map((s) => s.table)]) {
      const table = getTable(model, key);
      const [first] = timeDimensions(table);
      if (first) return { table, field: first };
    }
    return undefined;
  }
}
