// joinGraph.ts
// Join planning over declared relationships.
//
// Relationships are edges of an undirected graph; a left/right side only
// decides cardinality and outer-join direction. Planning grows a connecting
// tree from a root table with multi-source breadth-first search, each round
// attaching the nearest still-uncovered required table. Equal-length paths
// prefer many_to_one traversals so the default fan-out stays conservative.
// Disconnected tables are an error; the planner never invents a cross join.

import Enumerable from "linq";
import { UnreachableError } from "./errors";
import type {
  ColumnPair,
  Relationship,
  RelationshipType,
  SemanticModel,
  SemanticTable,
} from "./semanticModel";

/* --------------------------------------------------------------------------
 * PLAN TYPES
 * -------------------------------------------------------------------------- */

export type PlannedJoinType = "inner" | "left_outer" | "right_outer";

/** Cardinality seen when walking from the table already in the plan. */
export type TraversalDirection = "many_to_one" | "one_to_many" | "one_to_one";

export interface JoinStep {
  /** Table added by this step. */
  table: string;
  /** Table already in the plan that the step joins against. */
  from: string;
  joinType: PlannedJoinType;
  relationship: string;
  direction: TraversalDirection;
  /** Oriented as (from-side field, new-side field). */
  columnPairs: ColumnPair[];
}

export interface JoinPlan {
  root: string;
  steps: JoinStep[];
  rationale: string[];
}

export function planTables(plan: JoinPlan): string[] {
  return [plan.root, ...plan.steps.map((s) => s.table)];
}

/* --------------------------------------------------------------------------
 * GRAPH
 * -------------------------------------------------------------------------- */

interface Traversal {
  relationship: Relationship;
  order: number;
  from: string;
  to: string;
  forward: boolean;
}

function traversalDirection(type: RelationshipType, forward: boolean): TraversalDirection {
  if (type === "one_to_one") return "one_to_one";
  if (forward) return type;
  return type === "many_to_one" ? "one_to_many" : "many_to_one";
}

function toStep(t: Traversal): JoinStep {
  const rel = t.relationship;
  const joinType: PlannedJoinType =
    rel.joinType === "left_outer" ? (t.forward ? "left_outer" : "right_outer") : "inner";
  return {
    table: t.to,
    from: t.from,
    joinType,
    relationship: rel.name,
    direction: traversalDirection(rel.relationshipType, t.forward),
    columnPairs: rel.columns.map((pair) =>
      t.forward ? { left: pair.left, right: pair.right } : { left: pair.right, right: pair.left }
    ),
  };
}

function buildAdjacency(model: SemanticModel): Map<string, Traversal[]> {
  const adjacency = new Map<string, Traversal[]>();
  const add = (t: Traversal) => {
    const list = adjacency.get(t.from) ?? [];
    list.push(t);
    adjacency.set(t.from, list);
  };
  model.relationships.forEach((relationship, order) => {
    if (relationship.leftTable === relationship.rightTable) return;
    add({ relationship, order, from: relationship.leftTable, to: relationship.rightTable, forward: true });
    add({ relationship, order, from: relationship.rightTable, to: relationship.leftTable, forward: false });
  });
  adjacency.forEach((list) => list.sort((a, b) => a.order - b.order));
  return adjacency;
}

/* --------------------------------------------------------------------------
 * SEARCH
 * -------------------------------------------------------------------------- */

interface PathState {
  steps: JoinStep[];
  fanOut: number;
}

function fanOutOf(step: JoinStep): number {
  return step.direction === "one_to_many" ? 1 : 0;
}

/**
 * Shortest path from any table in `tree` to the nearest table in `targets`.
 * Returns null when none of the targets is reachable.
 */
function nearestTarget(
  adjacency: Map<string, Traversal[]>,
  tree: Set<string>,
  targets: string[]
): { target: string; path: PathState } | null {
  const visited = new Set(tree);
  let frontier = new Map<string, PathState>();
  tree.forEach((table) => frontier.set(table, { steps: [], fanOut: 0 }));

  while (frontier.size > 0) {
    const next = new Map<string, PathState>();
    frontier.forEach((state, table) => {
      for (const traversal of adjacency.get(table) ?? []) {
        if (visited.has(traversal.to)) continue;
        const step = toStep(traversal);
        const candidate = { steps: [...state.steps, step], fanOut: state.fanOut + fanOutOf(step) };
        const existing = next.get(traversal.to);
        if (!existing || candidate.fanOut < existing.fanOut) {
          next.set(traversal.to, candidate);
        }
      }
    });

    next.forEach((_, table) => visited.add(table));

    const reached = Enumerable.from(targets)
      .select((target, index) => ({ target, index, path: next.get(target) }))
      .where((r) => r.path !== undefined)
      .orderBy((r) => r.path?.fanOut ?? 0)
      .thenBy((r) => r.index)
      .firstOrDefault();

    if (reached?.path) return { target: reached.target, path: reached.path };
    frontier = next;
  }

  return null;
}

interface CandidatePlan {
  plan: JoinPlan;
  fanOut: number;
  rootIndex: number;
}

function planFromRoot(
  adjacency: Map<string, Traversal[]>,
  root: string,
  required: string[]
): CandidatePlan {
  const tree = new Set([root]);
  const steps: JoinStep[] = [];
  const rationale: string[] = [`root ${root}`];
  let fanOut = 0;

  for (;;) {
    const uncovered = required.filter((t) => !tree.has(t));
    if (uncovered.length === 0) break;

    const found = nearestTarget(adjacency, tree, uncovered);
    if (!found) throw new UnreachableError(root, uncovered[0]);

    for (const step of found.path.steps) {
      tree.add(step.table);
      steps.push(step);
    }
    fanOut += found.path.fanOut;
    const via = found.path.steps.map((s) => `${s.relationship} (${s.direction})`).join(" -> ");
    rationale.push(
      found.path.steps.length > 1
        ? `${found.target} reached in ${found.path.steps.length} hops via ${via}`
        : `${found.target} joined via ${via}`
    );
  }

  return { plan: { root, steps, rationale }, fanOut, rootIndex: required.indexOf(root) };
}

/**
 * Plan joins connecting every required table (keys, in request order).
 * Each candidate root is tried; the smallest tree wins, then the one with
 * fewest one_to_many traversals, then the earliest root.
 */
export function resolveJoins(model: SemanticModel, requiredTables: string[]): JoinPlan {
  const required = Enumerable.from(requiredTables).distinct().toArray();
  if (required.length === 0) {
    throw new RangeError("resolveJoins() needs at least one table");
  }

  const adjacency = buildAdjacency(model);
  const candidates = required.map((root) => planFromRoot(adjacency, root, required));

  const best = Enumerable.from(candidates)
    .orderBy((c) => c.plan.steps.length)
    .thenBy((c) => c.fanOut)
    .thenBy((c) => c.rootIndex)
    .first();

  if (candidates.length > 1) {
    best.plan.rationale.push(
      `chose root ${best.plan.root} among ${candidates.length} candidates (${best.plan.steps.length} joins, ${best.fanOut} one_to_many)`
    );
  }
  return best.plan;
}

/* --------------------------------------------------------------------------
 * RELATIONSHIP TYPE INFERENCE
 * -------------------------------------------------------------------------- */

export type InferredRelationship =
  | { type: "one_to_one" | "many_to_one"; swapped: boolean }
  | { type: "many_to_many" };

function keySets(table: SemanticTable): string[][] {
  const sets = table.primaryKey.length ? [[...table.primaryKey]] : [];
  return [...sets, ...table.uniqueKeys.map((k) => [...k])];
}

function coveredByKey(table: SemanticTable, columns: string[]): boolean {
  const joinColumns = new Set(columns);
  return keySets(table).some((set) => set.length > 0 && set.every((c) => joinColumns.has(c)));
}

/**
 * Cardinality from primary/unique keys on the join columns:
 * both sides keyed -> one_to_one, right keyed -> many_to_one,
 * left keyed -> many_to_one with sides swapped, neither -> many_to_many.
 */
export function inferRelationshipType(
  left: SemanticTable,
  right: SemanticTable,
  leftColumns: string[],
  rightColumns: string[]
): InferredRelationship {
  const leftKeyed = coveredByKey(left, leftColumns);
  const rightKeyed = coveredByKey(right, rightColumns);

  if (leftKeyed && rightKeyed) return { type: "one_to_one", swapped: false };
  if (rightKeyed) return { type: "many_to_one", swapped: false };
  if (leftKeyed) return { type: "many_to_one", swapped: true };
  return { type: "many_to_many" };
}
