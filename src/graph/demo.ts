import { GraphModel } from "./model.js";

/** Endpoints selected when the demo graph is first shown. */
export const DEMO_START = "A";
export const DEMO_END = "C";

/** Five-node sample graph used when no document is supplied. */
export function buildDemoGraph(): GraphModel {
  return new GraphModel(
    "demo",
    ["A", "B", "C", "D", "E"],
    [
      { from: "A", to: "B", weight: 4 },
      { from: "A", to: "E", weight: 2 },
      { from: "B", to: "C", weight: 3 },
      { from: "B", to: "D", weight: 1 },
      { from: "C", to: "D", weight: 2 },
      { from: "D", to: "E", weight: 3 },
      { from: "E", to: "B", weight: 7 },
    ],
  );
}
