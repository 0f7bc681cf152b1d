#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { compareAlgorithms, computeShortestPath } from "./algorithms/index.js";
import {
  ALGORITHM_CHOICES,
  OUTPUT_FORMATS,
  loadRuntimeConfig,
  type AlgorithmChoice,
  type OutputFormat,
} from "./config/runtime.js";
import type { EnvSource } from "./config/env.js";
import { DEMO_END, DEMO_START, buildDemoGraph } from "./graph/demo.js";
import { loadGraphDocument, toGraphDocument } from "./graph/document.js";
import type { GraphModel } from "./graph/model.js";
import { StructuredLogger, type LogSink } from "./logger.js";
import { formatComparisonReport, formatResultReport, toJsonReport } from "./report.js";
import { ERROR_CODES, PathlabError, describeError } from "./types.js";

/** Raised for malformed command lines; the CLI exits with status 2. */
export class CliUsageError extends PathlabError {
  constructor(message: string) {
    super(ERROR_CODES.CLI_USAGE, message);
    this.name = "CliUsageError";
  }
}

interface CliOptions {
  readonly graphFile?: string;
  readonly from?: string;
  readonly to?: string;
  readonly algorithm?: AlgorithmChoice;
  readonly format?: OutputFormat;
  readonly printGraph: boolean;
  readonly help: boolean;
}

export interface CliIo {
  readonly stdout: LogSink;
  readonly stderr: LogSink;
  readonly env: EnvSource;
}

const USAGE = [
  "Usage: pathlab [--graph <file.json>] [--from <id>] [--to <id>]",
  "               [--algorithm dijkstra|bellman-ford|both] [--format text|json] [--print-graph]",
  "",
  "Without --graph the built-in five-node demo graph is used (default query A -> C).",
  "",
  "Examples:",
  "  pathlab",
  "  pathlab --algorithm both",
  "  pathlab --graph network.json --from P --to R --algorithm bellman-ford --format json",
];

function takeValue(rest: readonly string[], index: number, flag: string): string {
  const value = rest[index];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return value;
}

function pickChoice<T extends string>(value: string, allowed: readonly T[], flag: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new CliUsageError(`${flag} must be one of ${allowed.join(", ")}`);
  }
  return match;
}

function parseArgs(argv: readonly string[]): CliOptions {
  let graphFile: string | undefined;
  let from: string | undefined;
  let to: string | undefined;
  let algorithm: AlgorithmChoice | undefined;
  let format: OutputFormat | undefined;
  let printGraph = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "--graph":
        graphFile = takeValue(argv, ++i, token);
        break;
      case "--from":
        from = takeValue(argv, ++i, token);
        break;
      case "--to":
        to = takeValue(argv, ++i, token);
        break;
      case "--algorithm":
        algorithm = pickChoice(takeValue(argv, ++i, token), ALGORITHM_CHOICES, token);
        break;
      case "--format":
        format = pickChoice(takeValue(argv, ++i, token), OUTPUT_FORMATS, token);
        break;
      case "--print-graph":
        printGraph = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument '${String(token)}'`);
    }
  }

  return {
    printGraph,
    help,
    ...(graphFile === undefined ? {} : { graphFile }),
    ...(from === undefined ? {} : { from }),
    ...(to === undefined ? {} : { to }),
    ...(algorithm === undefined ? {} : { algorithm }),
    ...(format === undefined ? {} : { format }),
  };
}

function writeLines(sink: LogSink, lines: readonly string[]): void {
  sink.write(`${lines.join("\n")}\n`);
}

interface QueryPlan {
  readonly graph: GraphModel;
  readonly start: string;
  readonly end: string;
  readonly algorithm: AlgorithmChoice;
  readonly format: OutputFormat;
}

function renderQuery(plan: QueryPlan, logger: StructuredLogger): string[] {
  const { graph, start, end } = plan;
  if (plan.algorithm === "both") {
    const comparison = compareAlgorithms(graph, start, end, { logger });
    if (plan.format === "json") {
      return [
        JSON.stringify(
          {
            graph: graph.name,
            start,
            end,
            agree: comparison.agree,
            results: [toJsonReport(comparison.dijkstra), toJsonReport(comparison.bellmanFord)],
          },
          null,
          2,
        ),
      ];
    }
    return formatComparisonReport(comparison);
  }

  const result = computeShortestPath(graph, start, end, plan.algorithm, { logger });
  if (plan.format === "json") {
    return [JSON.stringify({ graph: graph.name, start, end, result: toJsonReport(result) }, null, 2)];
  }
  return formatResultReport(result);
}

/**
 * Runs the command line and resolves with the exit status. Output goes through
 * {@link CliIo} so tests can capture it without touching the process streams.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const config = loadRuntimeConfig(io.env);
  const logger = new StructuredLogger({ level: config.logLevel, sink: io.stderr, logFile: config.logFile });

  try {
    const options = parseArgs(argv);
    if (options.help) {
      writeLines(io.stdout, USAGE);
      return 0;
    }

    const graph = options.graphFile === undefined ? buildDemoGraph() : await loadGraphDocument(options.graphFile);
    logger.info("graph_loaded", {
      graph: graph.name,
      source: options.graphFile ?? "demo",
      nodes: graph.nodeCount,
      edges: graph.edgeCount,
    });

    if (options.printGraph) {
      writeLines(io.stdout, [JSON.stringify(toGraphDocument(graph), null, 2)]);
      return 0;
    }

    const start = options.from ?? (options.graphFile === undefined ? DEMO_START : undefined);
    const end = options.to ?? (options.graphFile === undefined ? DEMO_END : undefined);
    if (start === undefined || end === undefined) {
      throw new CliUsageError("--from and --to are required when --graph is given");
    }

    const lines = renderQuery(
      {
        graph,
        start,
        end,
        algorithm: options.algorithm ?? config.algorithm,
        format: options.format ?? config.format,
      },
      logger,
    );
    writeLines(io.stdout, lines);
    return 0;
  } catch (error) {
    const described = describeError(error);
    logger.error("cli_failed", described);
    writeLines(io.stderr, [`error: ${described.message}`]);
    if (error instanceof CliUsageError) {
      writeLines(io.stderr, ["", ...USAGE]);
      return 2;
    }
    return 1;
  } finally {
    await logger.flush();
  }
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  try {
    return fileURLToPath(import.meta.url) === realpathSync(executedFromCli);
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr, env: process.env })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}

/** Exposes the argument parser to the test suite without widening the public API. */
export const __testing = {
  parseArgs,
};
