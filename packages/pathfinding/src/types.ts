import type { StrategyName } from "@roadsearch/config";

export type NodeId = string | number;

export type Point = [number, number]; // [x, y]; [lng, lat] for geographic inputs

export type NodeCoords = Map<NodeId, Point>;

export type Neighbor = [neighbor: NodeId, cost: number];

export type StaticEdge = {
  from: NodeId;
  to: NodeId;
  /** Original cost before any reweighting; absent when the source row had none */
  cost?: number;
};

export type GraphInput = {
  nodes: NodeCoords;
  edges: Iterable<StaticEdge>;
  origin: NodeId | null;
  destinations: Iterable<NodeId>;
};

export type SearchResult = {
  goal: NodeId | null;
  /** Frontier entries constructed, including ones later discarded as already expanded */
  created: number;
  path: NodeId[];
};

export type FrontierEntry = {
  node: NodeId;
  path: NodeId[];
  cost: number;
};

export type SearchOptions = {
  /** Stop once more than this many entries would be created */
  maxCreated?: number;
  /** Heuristic weight for CUS2 */
  heuristicWeight?: number;
};

export type { StrategyName };
