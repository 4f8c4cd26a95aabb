/**
 * Traffic analysis command: load graph -> analyze -> report.
 *
 * Exit codes: 0 on success, 2 on usage errors, 1 on any other failure.
 * Results go to stdout; progress lines go to stderr so `--json` output can
 * be piped straight into a JSON consumer.
 */

import { writeFile } from "node:fs/promises";

import { UsageError } from "../domain/errors.js";
import { loadGraphFromFile } from "../ingestion/index.js";
import { analyzeTraffic } from "../analysis/analyze-traffic.js";
import { loadSolverConfig } from "../assignment/solver-config.js";
import { analysisToDot } from "../export/flow-dot.js";
import { analysisToJson } from "../export/analysis-json.js";
import { formatAnalysisReport, formatEdgeFlowChart } from "../export/report.js";
import { parseTrafficArgs, USAGE } from "./args.js";

/** Output sinks, replaceable in tests */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export async function runAnalyzeTraffic(argv: string[], io: CliIo = processIo): Promise<number> {
  try {
    const config = parseTrafficArgs(argv);

    const { graph, stats } = await loadGraphFromFile(config.graphPath);
    console.error(
      `[graph] ${config.graphPath}: ${stats.nodesCount} nodes, ${stats.edgesCount} edges ` +
        `(${stats.congestibleEdges} congestible)`,
    );

    const solver = loadSolverConfig(config.profile);
    const analysis = analyzeTraffic(
      graph,
      { start: config.start, end: config.end, vehicles: config.vehicles },
      { solver, requireRoute: config.requireRoute },
    );

    if (config.json) {
      io.stdout(JSON.stringify(analysisToJson(analysis), null, 2) + "\n");
    } else {
      io.stdout(formatAnalysisReport(analysis));
      if (config.plot) {
        io.stdout("\n" + formatEdgeFlowChart(analysis));
      }
    }

    if (config.dotPath !== undefined) {
      await writeFile(config.dotPath, analysisToDot(graph, analysis), "utf-8");
      console.error(`[export] Written to: ${config.dotPath}`);
    }

    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`${err.message}\n${USAGE}\n`);
      return 2;
    }
    const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    io.stderr(`Error: ${message}\n`);
    return 1;
  }
}
