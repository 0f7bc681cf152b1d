import { performance } from "node:perf_hooks";

import type { GraphModel } from "../graph/model.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES, PathlabError } from "../types.js";

/** Display names attached to every result record. */
export type AlgorithmName = "Dijkstra" | "Bellman-Ford";

/** Identifiers accepted when selecting an algorithm by name. */
export const ALGORITHM_IDS = ["dijkstra", "bellman-ford"] as const;
export type AlgorithmId = (typeof ALGORITHM_IDS)[number];

interface ResultBase {
  readonly algorithm: AlgorithmName;
  /** Wall-clock duration of the algorithm body, in milliseconds. */
  readonly elapsedMs: number;
}

export interface FoundResult extends ResultBase {
  readonly kind: "found";
  readonly distance: number;
  /** Node ids from start to end, both included. */
  readonly path: readonly string[];
  /** Settled (Dijkstra) or first-improved (Bellman-Ford) nodes, start excluded. */
  readonly visitedOrder: readonly string[];
}

export interface UnreachableResult extends ResultBase {
  readonly kind: "unreachable";
  readonly visitedOrder: readonly string[];
}

export interface NegativeCycleResult extends ResultBase {
  readonly kind: "negative_cycle";
}

export type ShortestPathResult = FoundResult | UnreachableResult | NegativeCycleResult;

export interface ShortestPathOptions {
  /** Millisecond clock used for `elapsedMs`. Defaults to `performance.now`. */
  readonly clock?: () => number;
  /** Receives a `shortest_path_computed` debug entry once the query ends. */
  readonly logger?: StructuredLogger;
}

/** Raised when a query names a start or end node the graph does not contain. */
export class InvalidArgumentError extends PathlabError {
  constructor(
    readonly role: "start" | "end",
    readonly nodeId: string,
  ) {
    super(ERROR_CODES.PATH_INVALID_ARGUMENT, `Unknown ${role} node '${nodeId}'`, { role, node: nodeId });
    this.name = "InvalidArgumentError";
  }
}

export function assertEndpoints(graph: GraphModel, start: string, end: string): void {
  if (!graph.hasNode(start)) {
    throw new InvalidArgumentError("start", start);
  }
  if (!graph.hasNode(end)) {
    throw new InvalidArgumentError("end", end);
  }
}

export function resolveClock(options: ShortestPathOptions): () => number {
  return options.clock ?? (() => performance.now());
}

/**
 * Rebuilds the start..end node sequence from predecessor links. Returns an
 * empty array when the walk does not end on `start`, or when it runs longer
 * than `maxLength` hops (a predecessor loop, only possible with negative
 * weights under Dijkstra).
 */
export function reconstructPath(
  predecessors: ReadonlyMap<string, string>,
  start: string,
  end: string,
  maxLength: number,
): string[] {
  const path: string[] = [end];
  let current = end;
  let previous = predecessors.get(current);
  while (previous !== undefined) {
    if (path.length >= maxLength) {
      return [];
    }
    path.unshift(previous);
    current = previous;
    previous = predecessors.get(current);
  }
  return current === start ? path : [];
}

interface SettledState {
  readonly algorithm: AlgorithmName;
  readonly graph: GraphModel;
  readonly start: string;
  readonly end: string;
  readonly distances: ReadonlyMap<string, number>;
  readonly predecessors: ReadonlyMap<string, string>;
  readonly visitedOrder: readonly string[];
  readonly startedAt: number;
  readonly clock: () => number;
}

/** Packages the working state of a finished query into a frozen result. */
export function buildResult(state: SettledState): FoundResult | UnreachableResult {
  const distance = state.distances.get(state.end) ?? Number.POSITIVE_INFINITY;
  const visitedOrder = Object.freeze([...state.visitedOrder]);
  const path = distance !== Number.POSITIVE_INFINITY
    ? reconstructPath(state.predecessors, state.start, state.end, state.graph.nodeCount)
    : [];
  const elapsedMs = state.clock() - state.startedAt;

  if (path.length === 0) {
    const unreachable: UnreachableResult = { kind: "unreachable", algorithm: state.algorithm, elapsedMs, visitedOrder };
    return Object.freeze(unreachable);
  }
  const found: FoundResult = {
    kind: "found",
    algorithm: state.algorithm,
    elapsedMs,
    distance,
    path: Object.freeze(path),
    visitedOrder,
  };
  return Object.freeze(found);
}

export function negativeCycleResult(algorithm: AlgorithmName, elapsedMs: number): NegativeCycleResult {
  const result: NegativeCycleResult = { kind: "negative_cycle", algorithm, elapsedMs };
  return Object.freeze(result);
}

/** Emits the per-query debug entry when a logger was supplied. */
export function logResult(options: ShortestPathOptions, start: string, end: string, result: ShortestPathResult): void {
  if (!options.logger) {
    return;
  }
  options.logger.debug("shortest_path_computed", {
    algorithm: result.algorithm,
    start,
    end,
    outcome: result.kind,
    distance: result.kind === "found" ? result.distance : null,
    visited: result.kind === "negative_cycle" ? null : result.visitedOrder.length,
    elapsed_ms: result.elapsedMs,
  });
}
