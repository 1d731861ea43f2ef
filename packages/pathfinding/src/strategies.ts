import { CUS2_HEURISTIC_WEIGHT, STRATEGIES } from "@roadsearch/config";
import type { Graph } from "./graph.js";
import { defaultLogger, type Logger } from "./logger.js";
import { runSearch, type Strategy } from "./search.js";
import type { FrontierEntry, SearchOptions, SearchResult, StrategyName } from "./types.js";

const greedy = (entry: FrontierEntry, graph: Graph) => graph.heuristic(entry.node);

const aStar = (entry: FrontierEntry, graph: Graph) => entry.cost + graph.heuristic(entry.node);

const uniformCost = (entry: FrontierEntry) => entry.cost;

const weightedAStar = (entry: FrontierEntry, graph: Graph, options: SearchOptions) =>
  entry.cost + (options.heuristicWeight ?? CUS2_HEURISTIC_WEIGHT) * graph.heuristic(entry.node);

export const STRATEGY_TABLE: Record<StrategyName, Strategy> = {
  DFS: { name: "DFS", discipline: "stack", informed: STRATEGIES.DFS.informed, insertion: "descending" },
  BFS: { name: "BFS", discipline: "queue", informed: STRATEGIES.BFS.informed, insertion: "ascending" },
  GBFS: {
    name: "GBFS",
    discipline: "priority",
    informed: STRATEGIES.GBFS.informed,
    priority: greedy,
    insertion: "ascending"
  },
  AS: {
    name: "AS",
    discipline: "priority",
    informed: STRATEGIES.AS.informed,
    priority: aStar,
    insertion: "ascending"
  },
  CUS1: {
    name: "CUS1",
    discipline: "priority",
    informed: STRATEGIES.CUS1.informed,
    priority: uniformCost,
    insertion: "ascending"
  },
  CUS2: {
    name: "CUS2",
    discipline: "priority",
    informed: STRATEGIES.CUS2.informed,
    priority: weightedAStar,
    insertion: "ascending"
  }
};

/**
 * Run the named strategy over `graph`.
 *
 * @example
 * const { goal, created, path } = search(graph, "AS");
 */
export function search(
  graph: Graph,
  strategy: StrategyName,
  options: SearchOptions = {},
  logger: Logger = defaultLogger
): SearchResult {
  return runSearch(graph, STRATEGY_TABLE[strategy], options, logger);
}

export const depthFirstSearch = (graph: Graph, options?: SearchOptions) => search(graph, "DFS", options);
export const breadthFirstSearch = (graph: Graph, options?: SearchOptions) => search(graph, "BFS", options);
export const greedyBestFirstSearch = (graph: Graph, options?: SearchOptions) => search(graph, "GBFS", options);
export const aStarSearch = (graph: Graph, options?: SearchOptions) => search(graph, "AS", options);
export const uniformCostSearch = (graph: Graph, options?: SearchOptions) => search(graph, "CUS1", options);
export const weightedAStarSearch = (graph: Graph, options?: SearchOptions) => search(graph, "CUS2", options);
