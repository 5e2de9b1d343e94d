export { loadConfig, defaultConfig, ResolverConfigSchema } from "./config";
export type { ResolverConfig, ResolverConfigInput } from "./config";
export { parseEntityRef } from "./dsl";
export type { EntityRefAst, ComparisonAst, LiteralValue } from "./dsl";
export { emit, needsGrouping } from "./emitter";
export type { EmitPlan, EmitJoin, EmitSource } from "./emitter";
export { resolveEntity, resolveEntities } from "./entities";
export type { ResolvedEntity } from "./entities";
export * from "./errors";
export {
  equalIdentifiers,
  emitIdentifier,
  emitQualifiedName,
  normalize,
  parseQualifiedName,
  quoteIdentifier,
} from "./identifiers";
export type { NormalizedIdentifier } from "./identifiers";
export { inferRelationshipType, planTables, resolveJoins } from "./joinGraph";
export type { InferredRelationship, JoinPlan, JoinStep, PlannedJoinType } from "./joinGraph";
export { Logger, createLogger, silentLogger } from "./logger";
export type { LogLevel, LoggerOptions } from "./logger";
export { KNOWN_BINDINGS, loadModel, loadModelFile } from "./modelLoader";
export type { LoadOptions, LoadResult } from "./modelLoader";
export { ResolutionRequestSchema, SemanticResolver, canTransition } from "./resolver";
export type {
  Diagnostics,
  RejectedMatch,
  ReloadResult,
  ResolutionOutcome,
  ResolutionRequest,
  ResolutionState,
  ResolverOptions,
} from "./resolver";
export * from "./semanticModel";
export {
  compileFilter,
  f,
  nextDay,
  projectField,
  renderExpression,
  renderLiteral,
  resolveBindingsInFilter,
  resolveTimeWindow,
  substitute,
} from "./substitution";
export type { Bindings, FieldRef, FilterNode, Projection, TimeRange, TimeWindow } from "./substitution";
export { matchVerifiedQuery, rankVerifiedQueries, selectMatch } from "./verifiedQueries";
export type { CandidateScore, MatchRequest, VerifiedMatch } from "./verifiedQueries";
export { executeResolution } from "./warehouse";
export type { QueryResult, WarehouseClient } from "./warehouse";
