import { LOOKBACK_WINDOW } from "@roadsearch/config";
import { defaultLogger, reweightEdges, search } from "@roadsearch/pathfinding";
import type {
  Logger,
  Predictor,
  ReweightSummary,
  SearchOptions,
  SearchResult,
  StrategyName
} from "@roadsearch/pathfinding";
import { loadVolumeHistory } from "./csv.js";
import { loadGraphFromCsv } from "./graph-loader.js";
import { createFlowPredictor } from "./travel-time.js";

export type RouteRequest = {
  edgesPath: string;
  coordsPath?: string;
  /** Volume observations; when absent, edges keep their static costs */
  volumePath?: string;
  origin: string;
  destinations: string[];
  strategy: StrategyName;
  predictor?: Predictor;
  window?: number;
  searchOptions?: SearchOptions;
  logger?: Logger;
};

export type RouteOutcome = {
  result: SearchResult;
  /** Total edge cost of the returned path, null when no path was found */
  cost: number | null;
  reweight: ReweightSummary | null;
};

/**
 * Load the network, apply predicted travel times, then search.
 * Returns null when the origin or every destination is missing from the network.
 */
export async function runRoutePipeline(request: RouteRequest): Promise<RouteOutcome | null> {
  const logger = request.logger ?? defaultLogger;
  const { graph, staticEdges } = await loadGraphFromCsv({
    edgesPath: request.edgesPath,
    coordsPath: request.coordsPath,
    origin: request.origin,
    destinations: request.destinations,
    logger
  });

  if (graph.origin === null) {
    logger.error({ origin: request.origin }, "start node not found in graph");
    return null;
  }
  if (graph.destinations.size === 0) {
    logger.error({ destinations: request.destinations }, "end node not found in graph");
    return null;
  }

  let reweight: ReweightSummary | null = null;
  if (request.volumePath) {
    const history = await loadVolumeHistory(request.volumePath);
    reweight = reweightEdges(graph, staticEdges, history, request.predictor ?? createFlowPredictor(), {
      window: request.window ?? LOOKBACK_WINDOW,
      logger
    });
  }

  const startedAt = Date.now();
  const result = search(graph, request.strategy, request.searchOptions, logger);
  const cost = result.goal === null ? null : graph.pathCost(result.path);

  logger.info(
    {
      strategy: request.strategy,
      goal: result.goal,
      created: result.created,
      hops: Math.max(0, result.path.length - 1),
      cost,
      durationMs: Date.now() - startedAt
    },
    "route search complete"
  );

  return { result, cost, reweight };
}
