import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { z } from "zod";

import { ERROR_CODES, PathlabError } from "../types.js";
import { GraphModel } from "./model.js";

const NodeIdSchema = z
  .string()
  .min(1, "node ids must be non-empty strings")
  .refine((id) => id.trim() === id, "node ids must not start or end with whitespace");

/** Schema of a graph document as stored in a `.json` file. */
export const GraphDocumentSchema = z
  .object({
    name: z.string().min(1).optional(),
    nodes: z.array(NodeIdSchema),
    edges: z.array(
      z
        .object({
          from: NodeIdSchema,
          to: NodeIdSchema,
          weight: z.number().finite(),
        })
        .strict(),
    ),
  })
  .strict();

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;

/** Raised when a graph document does not match {@link GraphDocumentSchema}. */
export class GraphDocumentError extends PathlabError {
  constructor(message: string, readonly issues: z.ZodIssue[]) {
    super(ERROR_CODES.GRAPH_INVALID_INPUT, message, { issues });
    this.name = "GraphDocumentError";
  }
}

/**
 * Validates an already parsed JSON value and builds the graph. Schema problems
 * raise {@link GraphDocumentError}; unknown endpoints and duplicated ids raise
 * the model errors.
 */
export function parseGraphDocument(value: unknown, fallbackName = "graph"): GraphModel {
  const parsed = GraphDocumentSchema.safeParse(value);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("; ");
    throw new GraphDocumentError(`Invalid graph document (${summary})`, parsed.error.issues);
  }
  const document = parsed.data;
  return new GraphModel(document.name ?? fallbackName, document.nodes, document.edges);
}

/** Reads and parses a graph document from disk. */
export async function loadGraphDocument(file: string): Promise<GraphModel> {
  const contents = await readFile(file, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GraphDocumentError(`Graph document '${file}' is not valid JSON: ${reason}`, []);
  }
  return parseGraphDocument(raw, basename(file, extname(file)));
}

/** Serialises a graph back to the document shape. */
export function toGraphDocument(graph: GraphModel): GraphDocument {
  return {
    name: graph.name,
    nodes: [...graph.listNodes()],
    edges: graph.listEdges().map((edge) => ({ from: edge.from, to: edge.to, weight: edge.weight })),
  };
}
