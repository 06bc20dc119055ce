import type { RelationEdge, RelationGraph, RelationType } from "./model";
import type { Database } from "./database";

/**
 * How the edge being followed was reached:
 * - forward:  `from` holds a foreign key to `to`
 * - backward: `to` holds a foreign key to `from`
 * - many:     reached past an N:M edge; everything further is N:M as well
 */
type TraversalMode = "forward" | "backward" | "many";

interface TraversalContext {
  readonly graph: RelationGraph;
  readonly tables: readonly string[];
  readonly origin: string;
  /** Tables already entered for this origin; never entered twice. */
  readonly route: string[];
  /** Set once the single 1:1 relation back to the origin has been emitted. */
  selfRelationEmitted: boolean;
  readonly edges: RelationEdge[];
}

function references(ctx: TraversalContext, holder: string, target: string): boolean {
  return ctx.graph.get(holder)?.has(target) ?? false;
}

function emit(ctx: TraversalContext, type: RelationType, to: string): void {
  ctx.edges.push({ type, to });
}

/**
 * Emits the 1:1 self-relation when `table` is the origin and it has not been
 * emitted yet. Returns true when it did.
 */
function reachOrigin(ctx: TraversalContext, table: string): boolean {
  if (table !== ctx.origin || ctx.selfRelationEmitted) return false;
  emit(ctx, "1:1", table);
  ctx.route.push(table);
  ctx.selfRelationEmitted = true;
  return true;
}

function follow(ctx: TraversalContext, from: string, to: string, mode: TraversalMode): void {
  if (ctx.route.includes(to)) return;

  switch (mode) {
    case "forward":
      if (!references(ctx, from, to)) return;
      // A pair referencing each other collapses into one N:M edge.
      emit(ctx, references(ctx, to, from) ? "N:M" : "N:1", to);
      break;
    case "backward":
      if (!references(ctx, to, from)) return;
      if (references(ctx, from, to)) {
        // Leaving the origin, the forward pass has already emitted this pair.
        if (from !== ctx.origin) emit(ctx, "N:M", to);
      } else {
        emit(ctx, "1:N", to);
      }
      break;
    case "many":
      if (to === ctx.origin) return;
      emit(ctx, "N:M", to);
      break;
  }
  ctx.route.push(to);

  const outgoing: TraversalMode = mode === "forward" ? "forward" : "many";
  const incoming: TraversalMode = mode === "backward" ? "backward" : "many";

  for (const next of ctx.graph.get(to) ?? []) {
    if (reachOrigin(ctx, next)) continue;
    if (!ctx.route.includes(next)) follow(ctx, to, next, outgoing);
  }

  for (const next of ctx.tables) {
    if (!references(ctx, next, to)) continue;
    reachOrigin(ctx, next);
    if (next !== ctx.origin && !ctx.route.includes(next)) follow(ctx, to, next, incoming);
  }
}

/**
 * Classify every relation visible from `origin` over a finalized relation
 * graph. `tables` fixes the iteration order and must list every table of
 * the graph.
 */
export function classifyRelations(
  graph: RelationGraph,
  tables: readonly string[],
  origin: string,
): RelationEdge[] {
  const ctx: TraversalContext = {
    graph,
    tables,
    origin,
    route: [],
    selfRelationEmitted: false,
    edges: [],
  };

  for (const table of tables) {
    if (table !== origin) follow(ctx, origin, table, "forward");
  }

  for (const table of tables) {
    if (!references(ctx, table, origin)) continue;
    if (!reachOrigin(ctx, table)) follow(ctx, origin, table, "backward");
  }

  return ctx.edges;
}

/** Relations of every table, keyed by table name in discovery order. */
export function classifyAllRelations(db: Database): Map<string, RelationEdge[]> {
  const graph = db.relationGraph();
  const tables = db.tableNames();
  const result = new Map<string, RelationEdge[]>();
  for (const table of tables) {
    result.set(table, classifyRelations(graph, tables, table));
  }
  return result;
}
