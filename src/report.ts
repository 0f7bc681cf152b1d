import type { AlgorithmComparison } from "./algorithms/index.js";
import type { ShortestPathResult } from "./algorithms/result.js";

const PATH_SEPARATOR = " → ";

function formatElapsed(elapsedMs: number): string {
  return `Time: ${elapsedMs.toFixed(4)} ms`;
}

/** Lines of the results panel for a single query. */
export function formatResultReport(result: ShortestPathResult): string[] {
  const lines = [`Algorithm: ${result.algorithm}`];
  switch (result.kind) {
    case "negative_cycle":
      lines.push("Negative cycle detected", formatElapsed(result.elapsedMs));
      return lines;
    case "unreachable":
      lines.push("Distance: ∞", "Path: None");
      break;
    case "found":
      lines.push(`Distance: ${result.distance}`, `Path: ${result.path.join(PATH_SEPARATOR)}`);
      break;
  }
  lines.push(formatElapsed(result.elapsedMs), `Visited: ${result.visitedOrder.length} nodes`);
  return lines;
}

export function formatComparisonReport(comparison: AlgorithmComparison): string[] {
  return [
    ...formatResultReport(comparison.dijkstra),
    "",
    ...formatResultReport(comparison.bellmanFord),
    "",
    `Agreement: ${comparison.agree ? "yes" : "no"}`,
  ];
}

/**
 * JSON-safe view of a result. Unreachable results carry `distance: null`
 * rather than `Infinity`, which JSON cannot represent.
 */
export interface JsonReport {
  algorithm: string;
  outcome: ShortestPathResult["kind"];
  distance: number | null;
  path: string[];
  visitedOrder: string[];
  elapsedMs: number;
}

export function toJsonReport(result: ShortestPathResult): JsonReport {
  return {
    algorithm: result.algorithm,
    outcome: result.kind,
    distance: result.kind === "found" ? result.distance : null,
    path: result.kind === "found" ? [...result.path] : [],
    visitedOrder: result.kind === "negative_cycle" ? [] : [...result.visitedOrder],
    elapsedMs: result.elapsedMs,
  };
}
