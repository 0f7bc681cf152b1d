import { describe, it } from "mocha";
import { expect } from "chai";

import { DuplicateNodeError, GraphModel, InvalidEdgeError } from "../src/graph/model.js";
import { buildDemoGraph } from "../src/graph/demo.js";
import { ERROR_CODES } from "../src/types.js";

describe("graph/model", () => {
  it("keeps node ids and outgoing edges in insertion order", () => {
    const graph = buildDemoGraph();

    expect(graph.listNodes()).to.deep.equal(["A", "B", "C", "D", "E"]);
    expect(graph.getOutgoing("A")).to.deep.equal([
      { to: "B", weight: 4 },
      { to: "E", weight: 2 },
    ]);
    expect(graph.getOutgoing("C")).to.deep.equal([{ to: "D", weight: 2 }]);
    expect(graph.nodeCount).to.equal(5);
    expect(graph.edgeCount).to.equal(7);
  });

  it("keeps parallel edges between the same pair", () => {
    const graph = new GraphModel("parallel", ["A", "B"], [
      { from: "A", to: "B", weight: 5 },
      { from: "A", to: "B", weight: 2 },
    ]);

    expect(graph.getOutgoing("A")).to.deep.equal([
      { to: "B", weight: 5 },
      { to: "B", weight: 2 },
    ]);
  });

  it("returns an empty adjacency list for sinks and unknown ids", () => {
    const graph = new GraphModel("pair", ["X", "Y"], [{ from: "X", to: "Y", weight: 5 }]);

    expect(graph.getOutgoing("Y")).to.deep.equal([]);
    expect(graph.getOutgoing("missing")).to.deep.equal([]);
    expect(graph.hasNode("missing")).to.equal(false);
  });

  it("rejects edges referencing unknown nodes", () => {
    const build = () => new GraphModel("broken", ["A"], [{ from: "A", to: "Z", weight: 1 }]);

    expect(build).to.throw(InvalidEdgeError, "Edge #0 A -> Z: unknown target node 'Z'");
    expect(build).to.throw(InvalidEdgeError).with.property("code", ERROR_CODES.GRAPH_INVALID_EDGE);
    expect(build)
      .to.throw(InvalidEdgeError)
      .with.property("details")
      .that.deep.equals({ index: 0, from: "A", to: "Z" });
  });

  it("rejects unknown sources before checking targets", () => {
    expect(() => new GraphModel("broken", ["A"], [{ from: "Q", to: "A", weight: 1 }])).to.throw(
      InvalidEdgeError,
      "unknown source node 'Q'",
    );
  });

  it("rejects non-finite weights", () => {
    expect(
      () => new GraphModel("nan", ["A", "B"], [{ from: "A", to: "B", weight: Number.NaN }]),
    ).to.throw(InvalidEdgeError, "weight must be a finite number but received 'NaN'");
  });

  it("rejects duplicated node ids", () => {
    expect(() => new GraphModel("dup", ["A", "B", "A"], [])).to.throw(
      DuplicateNodeError,
      "Node 'A' is declared more than once",
    );
  });

  it("does not keep references to the caller's edge objects", () => {
    const edges = [{ from: "A", to: "B", weight: 1 }];
    const graph = new GraphModel("copy", ["A", "B"], edges);
    edges[0] = { from: "B", to: "A", weight: 9 };

    expect(graph.listEdges()).to.deep.equal([{ from: "A", to: "B", weight: 1 }]);
    expect(Object.isFrozen(graph.listEdges())).to.equal(true);
    expect(Object.isFrozen(graph)).to.equal(true);
  });
});
