// errors.ts
// Typed failures raised while loading a semantic model or resolving a request.
//
// Taxonomy:
// - model definition errors (load time, collected exhaustively)
// - request shape errors (unknown or ambiguous names, malformed requests)
// - resolution errors (unreachable join graph, ambiguous aggregation)
// - downstream execution errors (warehouse collaborator, passed through)

/* --------------------------------------------------------------------------
 * ERROR CODES
 * -------------------------------------------------------------------------- */

export const ErrorCode = {
  MODEL_INVALID: "ModelInvalid",
  CONFIG_INVALID: "ConfigInvalid",
  INVALID_IDENTIFIER: "InvalidIdentifier",
  UNKNOWN_ENTITY: "UnknownEntity",
  INVALID_REQUEST: "InvalidRequest",
  UNREACHABLE: "Unreachable",
  AMBIGUOUS_AGGREGATION: "AmbiguousAggregation",
  MISSING_BINDING: "MissingBinding",
  NO_MATCH_AND_UNRESOLVABLE: "NoMatchAndUnresolvable",
  WAREHOUSE_EXECUTION: "WarehouseExecution",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface StructuredError {
  error: {
    code: ErrorCodeValue;
    message: string;
    details?: Record<string, unknown>;
    hint?: string;
    cause?: string;
  };
}

export interface EngineErrorOptions {
  details?: Record<string, unknown>;
  hint?: string;
  cause?: unknown;
}

/* --------------------------------------------------------------------------
 * BASE ERROR
 * -------------------------------------------------------------------------- */

export class EngineError extends Error {
  readonly code: ErrorCodeValue;
  readonly details?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: ErrorCodeValue, message: string, options: EngineErrorOptions = {}) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.details = options.details;
    this.hint = options.hint;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /**
   * Structured form for machine consumption.
   */
  toJSON(): StructuredError {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
        ...(this.hint && { hint: this.hint }),
        ...(this.cause instanceof Error && { cause: this.cause.message }),
      },
    };
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/* --------------------------------------------------------------------------
 * MODEL + CONFIG
 * -------------------------------------------------------------------------- */

export interface ValidationIssue {
  path: string[];
  message: string;
  suggestion?: string;
}

function formatIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export class ModelError extends EngineError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      ErrorCode.MODEL_INVALID,
      `Semantic model is invalid (${issues.length} issue${issues.length === 1 ? "" : "s"}): ${formatIssues(issues)}`,
      { details: { issues } }
    );
    this.name = "ModelError";
    this.issues = issues;
  }
}

export class ConfigError extends EngineError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(ErrorCode.CONFIG_INVALID, `Invalid resolver configuration: ${formatIssues(issues)}`, {
      details: { issues },
    });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/* --------------------------------------------------------------------------
 * REQUEST SHAPE
 * -------------------------------------------------------------------------- */

export class InvalidIdentifierError extends EngineError {
  constructor(raw: string, reason: string) {
    super(ErrorCode.INVALID_IDENTIFIER, `Invalid identifier ${JSON.stringify(raw)}: ${reason}`, {
      details: { identifier: raw },
    });
    this.name = "InvalidIdentifierError";
  }
}

export type EntityKind = "table" | "field" | "filter" | "relationship" | "entity";

export class UnknownEntityError extends EngineError {
  readonly entity: string;
  readonly kind: EntityKind;

  constructor(kind: EntityKind, entity: string, scope?: string) {
    super(
      ErrorCode.UNKNOWN_ENTITY,
      scope ? `Unknown ${kind} "${entity}" on table "${scope}"` : `Unknown ${kind} "${entity}"`,
      { details: { kind, entity, ...(scope && { table: scope }) } }
    );
    this.name = "UnknownEntityError";
    this.entity = entity;
    this.kind = kind;
  }
}

export class InvalidRequestError extends EngineError {
  constructor(message: string, options: EngineErrorOptions = {}) {
    super(ErrorCode.INVALID_REQUEST, message, options);
    this.name = "InvalidRequestError";
  }
}

/* --------------------------------------------------------------------------
 * RESOLUTION
 * -------------------------------------------------------------------------- */

export class UnreachableError extends EngineError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(
      ErrorCode.UNREACHABLE,
      `No relationship path connects table "${from}" to table "${to}"`,
      {
        details: { from, to },
        hint: "Declare a relationship between the tables or drop one of them from the request.",
      }
    );
    this.name = "UnreachableError";
    this.from = from;
    this.to = to;
  }
}

export class AmbiguousAggregationError extends EngineError {
  readonly fact: string;

  constructor(table: string, fact: string) {
    super(
      ErrorCode.AMBIGUOUS_AGGREGATION,
      `Fact "${table}.${fact}" is used outside an aggregation and declares no default_aggregation`,
      {
        details: { table, fact },
        hint: `Wrap the fact in an aggregation, e.g. sum(${fact}), or declare default_aggregation on it.`,
      }
    );
    this.name = "AmbiguousAggregationError";
    this.fact = fact;
  }
}

export class SubstitutionError extends EngineError {
  readonly binding: string;

  constructor(binding: string, message?: string) {
    super(ErrorCode.MISSING_BINDING, message ?? `Missing binding ':${binding}'`, {
      details: { binding },
    });
    this.name = "SubstitutionError";
    this.binding = binding;
  }
}

export class NoMatchAndUnresolvableError extends EngineError {
  constructor(message: string, options: EngineErrorOptions = {}) {
    super(ErrorCode.NO_MATCH_AND_UNRESOLVABLE, message, options);
    this.name = "NoMatchAndUnresolvableError";
  }
}

/* --------------------------------------------------------------------------
 * DOWNSTREAM
 * -------------------------------------------------------------------------- */

export type QuerySource = "verified" | "generated";

export class WarehouseExecutionError extends EngineError {
  readonly stage: QuerySource;
  readonly queryText: string;

  constructor(stage: QuerySource, queryText: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.WAREHOUSE_EXECUTION, `Warehouse rejected ${stage} query: ${reason}`, {
      details: { stage, queryText },
      cause,
    });
    this.name = "WarehouseExecutionError";
    this.stage = stage;
    this.queryText = queryText;
  }
}
