import { ERROR_CODES, PathlabError } from "../types.js";

/** Weighted directed edge as supplied by callers. */
export interface GraphEdgeData {
  readonly from: string;
  readonly to: string;
  /** Finite signed weight. Negative values are only meaningful for Bellman-Ford. */
  readonly weight: number;
}

/** Outgoing hop exposed by {@link GraphModel.getOutgoing}. */
export interface OutgoingEdge {
  readonly to: string;
  readonly weight: number;
}

/** Raised when an edge names an unknown node or carries a non-finite weight. */
export class InvalidEdgeError extends PathlabError {
  constructor(
    readonly edge: GraphEdgeData,
    readonly index: number,
    reason: string,
  ) {
    super(ERROR_CODES.GRAPH_INVALID_EDGE, `Edge #${index} ${edge.from} -> ${edge.to}: ${reason}`, {
      index,
      from: edge.from,
      to: edge.to,
    });
    this.name = "InvalidEdgeError";
  }
}

/** Raised when the same node id is declared twice. */
export class DuplicateNodeError extends PathlabError {
  constructor(readonly nodeId: string) {
    super(ERROR_CODES.GRAPH_DUPLICATE_NODE, `Node '${nodeId}' is declared more than once`, { node: nodeId });
    this.name = "DuplicateNodeError";
  }
}

/**
 * Immutable weighted directed graph. Node ids keep their insertion order and
 * edges keep the order they were given in, which is the order Bellman-Ford
 * scans them and the order {@link getOutgoing} reports them.
 */
export class GraphModel {
  readonly name: string;
  private readonly nodeIds: readonly string[];
  private readonly nodeSet: ReadonlySet<string>;
  private readonly edgeList: readonly GraphEdgeData[];
  private readonly adjacency: ReadonlyMap<string, readonly OutgoingEdge[]>;

  constructor(name: string, nodes: Iterable<string>, edges: Iterable<GraphEdgeData>) {
    this.name = name;

    const ids: string[] = [];
    const seen = new Set<string>();
    for (const id of nodes) {
      if (seen.has(id)) {
        throw new DuplicateNodeError(id);
      }
      seen.add(id);
      ids.push(id);
    }

    const adjacency = new Map<string, OutgoingEdge[]>();
    for (const id of ids) {
      adjacency.set(id, []);
    }

    const stored: GraphEdgeData[] = [];
    let index = 0;
    for (const edge of edges) {
      if (!seen.has(edge.from)) {
        throw new InvalidEdgeError(edge, index, `unknown source node '${edge.from}'`);
      }
      if (!seen.has(edge.to)) {
        throw new InvalidEdgeError(edge, index, `unknown target node '${edge.to}'`);
      }
      if (!Number.isFinite(edge.weight)) {
        throw new InvalidEdgeError(edge, index, `weight must be a finite number but received '${String(edge.weight)}'`);
      }
      const copy: GraphEdgeData = Object.freeze({ from: edge.from, to: edge.to, weight: edge.weight });
      stored.push(copy);
      adjacency.get(edge.from)?.push(Object.freeze({ to: edge.to, weight: edge.weight }));
      index += 1;
    }

    this.nodeIds = Object.freeze(ids);
    this.nodeSet = seen;
    this.edgeList = Object.freeze(stored);
    const frozen = new Map<string, readonly OutgoingEdge[]>();
    for (const [id, outgoing] of adjacency) {
      frozen.set(id, Object.freeze(outgoing));
    }
    this.adjacency = frozen;
    Object.freeze(this);
  }

  hasNode(id: string): boolean {
    return this.nodeSet.has(id);
  }

  /** Node ids in insertion order. */
  listNodes(): readonly string[] {
    return this.nodeIds;
  }

  /** Edges in insertion order. */
  listEdges(): readonly GraphEdgeData[] {
    return this.edgeList;
  }

  getOutgoing(id: string): readonly OutgoingEdge[] {
    return this.adjacency.get(id) ?? [];
  }

  get nodeCount(): number {
    return this.nodeIds.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }
}
