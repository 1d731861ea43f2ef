export type {
  NodeId,
  Point,
  NodeCoords,
  Neighbor,
  StaticEdge,
  GraphInput,
  SearchResult,
  SearchOptions,
  FrontierEntry,
  StrategyName,
} from "./types.js";

export type { Logger } from "./logger.js";
export type { Strategy } from "./search.js";
export type { Discipline, Frontier } from "./frontier.js";
export type {
  VolumeHistory,
  Predictor,
  FallbackReason,
  EdgeOutcome,
  ReweightSummary,
  ReweightOptions,
} from "./reweight.js";

export { Graph, compareNodeIds, euclideanDistance } from "./graph.js";
export { defaultLogger } from "./logger.js";
export { StackFrontier, QueueFrontier, PriorityFrontier, createFrontier } from "./frontier.js";
export { runSearch } from "./search.js";
export {
  STRATEGY_TABLE,
  search,
  depthFirstSearch,
  breadthFirstSearch,
  greedyBestFirstSearch,
  aStarSearch,
  uniformCostSearch,
  weightedAStarSearch,
} from "./strategies.js";
export { reweightEdges } from "./reweight.js";
