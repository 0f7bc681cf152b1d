import type { GraphModel } from "../graph/model.js";
import {
  assertEndpoints,
  buildResult,
  logResult,
  negativeCycleResult,
  resolveClock,
  type ShortestPathOptions,
  type ShortestPathResult,
} from "./result.js";

/**
 * Edge-relaxation shortest path. Runs at most `|nodes| - 1` passes over the
 * edges in stored order and stops early once a pass changes nothing. A final
 * scan reports a negative cycle reachable from `start` instead of a distance.
 *
 * `visitedOrder` lists nodes in order of their first improvement.
 */
export function computeBellmanFord(
  graph: GraphModel,
  start: string,
  end: string,
  options: ShortestPathOptions = {},
): ShortestPathResult {
  assertEndpoints(graph, start, end);
  const clock = resolveClock(options);
  const startedAt = clock();

  const distances = new Map<string, number>();
  const predecessors = new Map<string, string>();
  const improved = new Set<string>();
  const visitedOrder: string[] = [];

  for (const node of graph.listNodes()) {
    distances.set(node, Number.POSITIVE_INFINITY);
  }
  distances.set(start, 0);

  const edges = graph.listEdges();
  const distanceOf = (node: string): number => distances.get(node) ?? Number.POSITIVE_INFINITY;

  for (let pass = 0; pass < graph.nodeCount - 1; pass += 1) {
    let updated = false;
    for (const edge of edges) {
      const base = distanceOf(edge.from);
      if (base === Number.POSITIVE_INFINITY) {
        continue;
      }
      const candidate = base + edge.weight;
      if (candidate < distanceOf(edge.to)) {
        distances.set(edge.to, candidate);
        predecessors.set(edge.to, edge.from);
        updated = true;
        if (edge.to !== start && !improved.has(edge.to)) {
          improved.add(edge.to);
          visitedOrder.push(edge.to);
        }
      }
    }
    if (!updated) {
      break;
    }
  }

  for (const edge of edges) {
    const base = distanceOf(edge.from);
    if (base !== Number.POSITIVE_INFINITY && base + edge.weight < distanceOf(edge.to)) {
      const result = negativeCycleResult("Bellman-Ford", clock() - startedAt);
      logResult(options, start, end, result);
      return result;
    }
  }

  const result = buildResult({
    algorithm: "Bellman-Ford",
    graph,
    start,
    end,
    distances,
    predecessors,
    visitedOrder,
    startedAt,
    clock,
  });
  logResult(options, start, end, result);
  return result;
}
