// emitter.ts
// Assembles the final SQL text from resolved pieces. Grouping is derived,
// never requested: GROUP BY appears when plain projections sit next to an
// aggregate (projected, or in HAVING), and then lists every plain projection.

import Enumerable from "linq";
import { InvalidRequestError } from "./errors";
import type { PlannedJoinType } from "./joinGraph";
import type { Projection } from "./substitution";

export interface EmitSource {
  /** Emitted physical table name. */
  table: string;
  alias: string;
}

export interface EmitJoin extends EmitSource {
  joinType: PlannedJoinType;
  /** Equality predicates, ANDed together. */
  on: string[];
}

export interface EmitPlan {
  from: EmitSource;
  joins: EmitJoin[];
  projections: Projection[];
  filters: string[];
  having: string[];
  limit?: number;
}

const JOIN_KEYWORDS: Record<PlannedJoinType, string> = {
  inner: "INNER JOIN",
  left_outer: "LEFT OUTER JOIN",
  right_outer: "RIGHT OUTER JOIN",
};

function source({ table, alias }: EmitSource): string {
  return table === alias ? table : `${table} AS ${alias}`;
}

function conjunction(predicates: string[]): string {
  const wrap = predicates.length > 1;
  return predicates
    .map((p) => (wrap && /\bOR\b/i.test(p) ? `(${p})` : p))
    .join("\n  AND ");
}

export function needsGrouping(projections: Projection[], having: string[] = []): boolean {
  const aggregated = having.length > 0 || projections.some((p) => p.aggregate);
  return aggregated && projections.some((p) => !p.aggregate);
}

export function emit(plan: EmitPlan): string {
  if (plan.projections.length === 0) {
    throw new InvalidRequestError("Nothing to select: the request resolves to no projections", {
      hint: "Reference at least one dimension, fact or metric.",
    });
  }

  const lines: string[] = [];
  lines.push("SELECT");
  lines.push(plan.projections.map((p) => `  ${p.expr} AS ${p.alias}`).join(",\n"));
  lines.push(`FROM ${source(plan.from)}`);

  for (const join of plan.joins) {
    lines.push(`${JOIN_KEYWORDS[join.joinType]} ${source(join)}`);
    lines.push(`  ON ${join.on.join(" AND ")}`);
  }

  if (plan.filters.length > 0) {
    lines.push(`WHERE ${conjunction(plan.filters)}`);
  }

  if (needsGrouping(plan.projections, plan.having)) {
    const groupBy = Enumerable.from(plan.projections)
      .where((p) => !p.aggregate)
      .select((p) => p.expr)
      .distinct()
      .toArray();
    lines.push(`GROUP BY ${groupBy.join(", ")}`);
  }

  if (plan.having.length > 0) {
    lines.push(`HAVING ${conjunction(plan.having)}`);
  }

  if (plan.limit !== undefined) {
    lines.push(`LIMIT ${plan.limit}`);
  }

  return lines.join("\n");
}
