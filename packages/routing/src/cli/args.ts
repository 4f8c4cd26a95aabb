/**
 * Command-line arguments for the traffic analysis script.
 *
 * Usage: analyze-traffic <graph.gml> <vehicles> <start> <end> [options]
 *
 * Options:
 *   --plot            Print an edge-flow bar chart
 *   --dot <file>      Write a Graphviz comparison to <file>
 *   --profile <name>  Solver profile from configs/solver/profiles
 *   --json            Print the analysis as JSON instead of text
 *   --require-route   Fail when start and end are disconnected
 */

import { UsageError } from "../domain/errors.js";

export const USAGE =
  "Usage: analyze-traffic <graph.gml> <vehicles> <start> <end> " +
  "[--plot] [--dot <file>] [--profile <name>] [--json] [--require-route]";

/** Everything one run needs, threaded explicitly through the pipeline */
export interface TrafficConfig {
  graphPath: string;
  vehicles: number;
  start: string;
  end: string;
  plot: boolean;
  dotPath?: string;
  profile?: string;
  json: boolean;
  requireRoute: boolean;
}

const VALUE_FLAGS = new Set(["--dot", "--profile"]);
const BOOLEAN_FLAGS = new Set(["--plot", "--json", "--require-route"]);

/** Parse argv (without the node/script entries) into a TrafficConfig */
export function parseTrafficArgs(argv: string[]): TrafficConfig {
  const positional: string[] = [];
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[++i];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`${arg} needs a value`);
      }
      values.set(arg, value);
    } else if (BOOLEAN_FLAGS.has(arg)) {
      flags.add(arg);
    } else if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [graphPath, vehiclesArg, start, end, ...extra] = positional;
  if (graphPath === undefined || vehiclesArg === undefined || start === undefined || end === undefined) {
    throw new UsageError("Expected <graph.gml> <vehicles> <start> <end>");
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument ${extra.join(" ")}`);
  }
  if (!/^-?\d+$/.test(vehiclesArg)) {
    throw new UsageError(`Vehicle count must be an integer (got "${vehiclesArg}")`);
  }

  const config: TrafficConfig = {
    graphPath,
    vehicles: parseInt(vehiclesArg, 10),
    start,
    end,
    plot: flags.has("--plot"),
    json: flags.has("--json"),
    requireRoute: flags.has("--require-route"),
  };
  const dotPath = values.get("--dot");
  if (dotPath !== undefined) config.dotPath = dotPath;
  const profile = values.get("--profile");
  if (profile !== undefined) config.profile = profile;
  return config;
}
