import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon, { type SinonSpy } from "sinon";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { CliUsageError, __testing, runCli, type CliIo } from "../src/cli.js";
import type { EnvSource } from "../src/config/env.js";

const { parseArgs } = __testing;

interface CapturedIo extends CliIo {
  readonly stdout: { write: SinonSpy };
  readonly stderr: { write: SinonSpy };
}

function captureIo(env: EnvSource = {}): CapturedIo {
  return { stdout: { write: sinon.spy() }, stderr: { write: sinon.spy() }, env };
}

function writtenLines(spy: SinonSpy): string[] {
  return spy
    .getCalls()
    .map((call) => String(call.args[0]))
    .join("")
    .split("\n");
}

describe("cli", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "pathlab-cli-"));
  });

  afterEach(async () => {
    sinon.restore();
    await rm(directory, { recursive: true, force: true });
  });

  it("runs Dijkstra on the demo graph by default", async () => {
    const io = captureIo();

    const code = await runCli([], io);

    expect(code).to.equal(0);
    const lines = writtenLines(io.stdout.write);
    expect(lines.slice(0, 3)).to.deep.equal(["Algorithm: Dijkstra", "Distance: 7", "Path: A → B → C"]);
    expect(lines[3]).to.match(/^Time: \d+\.\d{4} ms$/);
    expect(lines.slice(4)).to.deep.equal(["Visited: 4 nodes", ""]);
    expect(io.stderr.write.callCount).to.equal(0);
  });

  it("compares both algorithms as JSON", async () => {
    const io = captureIo();

    const code = await runCli(["--algorithm", "both", "--format", "json", "--to", "D"], io);

    expect(code).to.equal(0);
    const report = JSON.parse(writtenLines(io.stdout.write).join("\n")) as {
      graph: string;
      start: string;
      end: string;
      agree: boolean;
      results: Array<{ algorithm: string; distance: number | null; path: string[] }>;
    };
    expect(report.graph).to.equal("demo");
    expect(report.start).to.equal("A");
    expect(report.end).to.equal("D");
    expect(report.agree).to.equal(true);
    expect(report.results.map((entry) => [entry.algorithm, entry.distance, entry.path])).to.deep.equal([
      ["Dijkstra", 5, ["A", "B", "D"]],
      ["Bellman-Ford", 5, ["A", "B", "D"]],
    ]);
  });

  it("takes the algorithm and format from the environment when no flag is given", async () => {
    const io = captureIo({ PATHLAB_ALGORITHM: "bellman-ford", PATHLAB_FORMAT: "json" });

    await runCli([], io);

    const report = JSON.parse(writtenLines(io.stdout.write).join("\n")) as { result: { algorithm: string } };
    expect(report.result.algorithm).to.equal("Bellman-Ford");
  });

  it("reports a negative cycle from a graph document", async () => {
    const file = path.join(directory, "cycle.json");
    await writeFile(
      file,
      JSON.stringify({
        nodes: ["P", "Q", "R"],
        edges: [
          { from: "P", to: "Q", weight: 1 },
          { from: "Q", to: "R", weight: -3 },
          { from: "R", to: "Q", weight: 1 },
        ],
      }),
    );
    const io = captureIo();

    const code = await runCli(["--graph", file, "--from", "P", "--to", "R", "--algorithm", "bellman-ford"], io);

    expect(code).to.equal(0);
    const lines = writtenLines(io.stdout.write);
    expect(lines.slice(0, 2)).to.deep.equal(["Algorithm: Bellman-Ford", "Negative cycle detected"]);
  });

  it("prints the graph document", async () => {
    const io = captureIo();

    const code = await runCli(["--print-graph"], io);

    expect(code).to.equal(0);
    const document = JSON.parse(writtenLines(io.stdout.write).join("\n")) as { name: string; nodes: string[] };
    expect(document.name).to.equal("demo");
    expect(document.nodes).to.deep.equal(["A", "B", "C", "D", "E"]);
  });

  it("requires endpoints when a graph file is given", async () => {
    const file = path.join(directory, "pair.json");
    await writeFile(file, JSON.stringify({ nodes: ["X", "Y"], edges: [{ from: "X", to: "Y", weight: 5 }] }));
    const io = captureIo();

    const code = await runCli(["--graph", file], io);

    expect(code).to.equal(2);
    expect(writtenLines(io.stderr.write)).to.include("error: --from and --to are required when --graph is given");
    expect(io.stdout.write.callCount).to.equal(0);
  });

  it("fails with status 1 and a structured log entry for unknown nodes", async () => {
    const io = captureIo();

    const code = await runCli(["--to", "Z"], io);

    expect(code).to.equal(1);
    const lines = writtenLines(io.stderr.write);
    expect(lines).to.include("error: Unknown end node 'Z'");
    const logged = JSON.parse(lines[0] ?? "") as { level: string; message: string; payload: { code: string } };
    expect(logged.level).to.equal("error");
    expect(logged.message).to.equal("cli_failed");
    expect(logged.payload.code).to.equal("E-PATH-INVALID-ARGUMENT");
  });

  it("logs unexpected failures such as a missing graph file under the fallback code", async () => {
    const io = captureIo();

    const code = await runCli(["--graph", path.join(directory, "missing.json"), "--from", "A", "--to", "B"], io);

    expect(code).to.equal(1);
    const lines = writtenLines(io.stderr.write);
    const logged = JSON.parse(lines[0] ?? "") as { level: string; message: string; payload: { code: string } };
    expect(logged.level).to.equal("error");
    expect(logged.message).to.equal("cli_failed");
    expect(logged.payload.code).to.equal("E-CLI-UNEXPECTED");
    expect(lines[1]).to.match(/^error: ENOENT/);
    expect(io.stdout.write.callCount).to.equal(0);
  });

  it("prints the usage on --help", async () => {
    const io = captureIo();

    expect(await runCli(["--help"], io)).to.equal(0);
    expect(writtenLines(io.stdout.write)[0]).to.equal(
      "Usage: pathlab [--graph <file.json>] [--from <id>] [--to <id>]",
    );
  });

  describe("parseArgs", () => {
    it("omits optional fields that were not supplied", () => {
      const options = parseArgs(["--from", "A"]);

      expect(options).to.deep.equal({ printGraph: false, help: false, from: "A" });
      expect(Object.hasOwn(options, "graphFile")).to.equal(false);
    });

    it("rejects unknown choices and missing values", () => {
      expect(() => parseArgs(["--format", "xml"])).to.throw(CliUsageError, "--format must be one of text, json");
      expect(() => parseArgs(["--algorithm", "a-star"])).to.throw(
        CliUsageError,
        "--algorithm must be one of dijkstra, bellman-ford, both",
      );
      expect(() => parseArgs(["--graph"])).to.throw(CliUsageError, "--graph expects a value");
      expect(() => parseArgs(["--graph", "--from"])).to.throw(CliUsageError, "--graph expects a value");
      expect(() => parseArgs(["extra"])).to.throw(CliUsageError, "Unknown argument 'extra'");
    });
  });
});
