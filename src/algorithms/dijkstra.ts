import type { GraphModel } from "../graph/model.js";
import {
  assertEndpoints,
  buildResult,
  logResult,
  resolveClock,
  type ShortestPathOptions,
  type ShortestPathResult,
} from "./result.js";

interface QueueEntry {
  node: string;
  priority: number;
}

/** Orders entries by priority, then by node id so ties settle the lowest id first. */
function precedes(left: QueueEntry, right: QueueEntry): boolean {
  if (left.priority !== right.priority) {
    return left.priority < right.priority;
  }
  return left.node < right.node;
}

export class MinHeap {
  private readonly data: QueueEntry[] = [];

  enqueue(entry: QueueEntry): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): QueueEntry | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (min === undefined || last === undefined) {
      return undefined;
    }
    if (this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  get size(): number {
    return this.data.length;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!precedes(this.at(index), this.at(parent))) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && precedes(this.at(left), this.at(smallest))) {
        smallest = left;
      }
      if (right < length && precedes(this.at(right), this.at(smallest))) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private at(index: number): QueueEntry {
    const entry = this.data[index];
    if (entry === undefined) {
      throw new RangeError(`Heap index ${index} out of bounds`);
    }
    return entry;
  }

  private swap(a: number, b: number): void {
    const first = this.at(a);
    this.data[a] = this.at(b);
    this.data[b] = first;
  }
}

/**
 * Priority-selection shortest path. Nodes are settled in order of tentative
 * distance (lowest id first on ties) and the search stops as soon as `end` is
 * settled or no finite distance remains. The heap holds one entry per
 * improvement; entries for settled nodes or outdated distances are skipped.
 *
 * Weights are assumed non-negative. Negative weights are accepted but the
 * outcome is then unspecified.
 */
export function computeDijkstra(
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
  const settled = new Set<string>();
  const visitedOrder: string[] = [];

  for (const node of graph.listNodes()) {
    distances.set(node, Number.POSITIVE_INFINITY);
  }
  distances.set(start, 0);

  const queue = new MinHeap();
  queue.enqueue({ node: start, priority: 0 });

  for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
    const base = distances.get(current.node) ?? Number.POSITIVE_INFINITY;
    if (settled.has(current.node) || current.priority !== base) {
      continue;
    }
    settled.add(current.node);
    if (current.node !== start) {
      visitedOrder.push(current.node);
    }
    if (current.node === end) {
      break;
    }

    for (const edge of graph.getOutgoing(current.node)) {
      const candidate = base + edge.weight;
      if (candidate < (distances.get(edge.to) ?? Number.POSITIVE_INFINITY)) {
        distances.set(edge.to, candidate);
        predecessors.set(edge.to, current.node);
        queue.enqueue({ node: edge.to, priority: candidate });
      }
    }
  }

  const result = buildResult({
    algorithm: "Dijkstra",
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
