import * as dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { STRATEGY_NAMES, parseStrategyName, type StrategyName } from "@roadsearch/config";
import { search, type Logger, type SearchOptions } from "@roadsearch/pathfinding";
import { getConfig, type Config } from "./config.js";
import { UsageError } from "./errors.js";
import { formatResult, formatRoute } from "./format.js";
import { createLogger } from "./logger.js";
import { runRoutePipeline } from "./pipeline.js";
import { loadProblemFile, problemToGraph } from "./problem-file.js";

const __filename = fileURLToPath(import.meta.url);

export const USAGE = `Usage:
  roadsearch search <problem-file> <method>
  roadsearch route --origin <id> --dest <id>[;<id>...] [--method AS] [--edges <csv>] [--coords <csv>] [--volumes <csv>]

Methods: ${STRATEGY_NAMES.join(", ")}`;

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`)
};

export type ParsedArgs = {
  positional: string[];
  flags: Map<string, string>;
};

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    if (eq !== -1) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`Flag ${arg} needs a value`);
    }
    flags.set(arg.slice(2), value);
    i++;
  }

  return { positional, flags };
}

function resolveMethod(raw: string | undefined): StrategyName {
  const method = raw === undefined ? null : parseStrategyName(raw);
  if (!method) {
    throw new UsageError(`Method '${raw ?? ""}' not recognized. Choose from: ${STRATEGY_NAMES.join(", ")}`);
  }
  return method;
}

function searchOptionsFrom(config: Config): SearchOptions {
  return { maxCreated: config.SEARCH_MAX_CREATED, heuristicWeight: config.SEARCH_CUS2_WEIGHT };
}

async function runSearchCommand(args: ParsedArgs, config: Config, logger: Logger, io: CliIO): Promise<number> {
  const [file, rawMethod, ...extra] = args.positional;
  if (!file || extra.length > 0) {
    throw new UsageError("search takes exactly <problem-file> <method>");
  }
  const method = resolveMethod(rawMethod);

  const problem = await loadProblemFile(file, logger);
  const graph = problemToGraph(problem, logger);
  const result = search(graph, method, searchOptionsFrom(config), logger);

  io.stdout(formatResult(file, method, result));
  return 0;
}

async function runRouteCommand(args: ParsedArgs, config: Config, logger: Logger, io: CliIO): Promise<number> {
  const origin = args.flags.get("origin");
  const dest = args.flags.get("dest");
  if (!origin || !dest) {
    throw new UsageError("route needs --origin and --dest");
  }

  const outcome = await runRoutePipeline({
    edgesPath: args.flags.get("edges") ?? config.GRAPH_EDGES_PATH,
    coordsPath: args.flags.get("coords") ?? config.GRAPH_COORDS_PATH,
    volumePath: args.flags.get("volumes") ?? config.VOLUME_PATH,
    origin,
    destinations: dest.split(";").filter((part) => part.trim() !== ""),
    strategy: resolveMethod(args.flags.get("method") ?? "AS"),
    window: config.REWEIGHT_LOOKBACK,
    searchOptions: searchOptionsFrom(config),
    logger
  });

  if (!outcome) {
    io.stderr("origin and destination must be nodes of the road network");
    return 1;
  }

  io.stdout(formatRoute(outcome));
  return 0;
}

export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let logger: Logger | null = null;

  try {
    const config = getConfig();
    logger = createLogger(config.LOG_LEVEL);
    const [command, ...rest] = argv;
    const args = parseArgs(rest);

    switch (command) {
      case "search":
        return await runSearchCommand(args, config, logger, io);
      case "route":
        return await runRouteCommand(args, config, logger, io);
      default:
        throw new UsageError(command ? `Unknown command '${command}'` : "Missing command");
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    logger?.error({ err }, "command failed");
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  dotenv.config();
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
