import type { GraphModel } from "../graph/model.js";
import { computeBellmanFord } from "./bellmanFord.js";
import { computeDijkstra } from "./dijkstra.js";
import type { AlgorithmId, ShortestPathOptions, ShortestPathResult } from "./result.js";

/** Directed hop of a reported path. */
export interface PathEdge {
  readonly from: string;
  readonly to: string;
}

/** Runs the algorithm selected by {@link algorithm}. */
export function computeShortestPath(
  graph: GraphModel,
  start: string,
  end: string,
  algorithm: AlgorithmId,
  options: ShortestPathOptions = {},
): ShortestPathResult {
  switch (algorithm) {
    case "dijkstra":
      return computeDijkstra(graph, start, end, options);
    case "bellman-ford":
      return computeBellmanFord(graph, start, end, options);
  }
}

/**
 * True iff `from` is immediately followed by `to` in the path of a found
 * result. Unreachable and negative-cycle results never contain an edge.
 */
export function pathContainsEdge(result: ShortestPathResult, from: string, to: string): boolean {
  if (result.kind !== "found") {
    return false;
  }
  const { path } = result;
  for (let index = 0; index + 1 < path.length; index += 1) {
    if (path[index] === from && path[index + 1] === to) {
      return true;
    }
  }
  return false;
}

/** Consecutive hops of a found path, empty for any other outcome. */
export function pathEdges(result: ShortestPathResult): PathEdge[] {
  if (result.kind !== "found") {
    return [];
  }
  const hops: PathEdge[] = [];
  result.path.forEach((node, index) => {
    const next = result.path[index + 1];
    if (next !== undefined) {
      hops.push({ from: node, to: next });
    }
  });
  return hops;
}

export interface AlgorithmComparison {
  readonly dijkstra: ShortestPathResult;
  readonly bellmanFord: ShortestPathResult;
  /** Both found the same distance and path, or both found no path. */
  readonly agree: boolean;
}

export function compareAlgorithms(
  graph: GraphModel,
  start: string,
  end: string,
  options: ShortestPathOptions = {},
): AlgorithmComparison {
  const dijkstra = computeDijkstra(graph, start, end, options);
  const bellmanFord = computeBellmanFord(graph, start, end, options);
  return { dijkstra, bellmanFord, agree: resultsAgree(dijkstra, bellmanFord) };
}

function resultsAgree(left: ShortestPathResult, right: ShortestPathResult): boolean {
  if (left.kind === "found" && right.kind === "found") {
    return (
      left.distance === right.distance &&
      left.path.length === right.path.length &&
      left.path.every((node, index) => right.path[index] === node)
    );
  }
  return left.kind === "unreachable" && right.kind === "unreachable";
}

export { computeBellmanFord } from "./bellmanFord.js";
export { computeDijkstra, MinHeap } from "./dijkstra.js";
export * from "./result.js";
