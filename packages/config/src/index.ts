export type StrategyName = "DFS" | "BFS" | "GBFS" | "AS" | "CUS1" | "CUS2";

export const STRATEGY_NAMES: StrategyName[] = ["DFS", "BFS", "GBFS", "AS", "CUS1", "CUS2"];

export type StrategyInfo = {
  label: string;
  /** Whether the strategy consults the straight-line heuristic */
  informed: boolean;
};

export const STRATEGIES: Record<StrategyName, StrategyInfo> = {
  DFS: { label: "Depth-first search", informed: false },
  BFS: { label: "Breadth-first search", informed: false },
  GBFS: { label: "Greedy best-first search", informed: true },
  AS: { label: "A* search", informed: true },
  CUS1: { label: "Uniform-cost search", informed: false },
  CUS2: { label: "Weighted A* search", informed: true }
};

// Aliases accepted on the command line and in pipeline calls
const STRATEGY_ALIASES: Record<string, StrategyName> = {
  ASTAR: "AS",
  "A*": "AS",
  UCS: "CUS1",
  WASTAR: "CUS2"
};

/**
 * Resolve a user-supplied method name (case-insensitive) to a strategy.
 * Returns null for names that match nothing.
 */
export function parseStrategyName(input: string): StrategyName | null {
  const upper = input.trim().toUpperCase();
  const direct = STRATEGY_NAMES.find((name) => name === upper);
  if (direct) return direct;
  return STRATEGY_ALIASES[upper] ?? null;
}

// Heuristic value returned when no destination is configured
export const UNREACHABLE = Number.POSITIVE_INFINITY;

// Weight on the heuristic term for CUS2 (f = g + w * h)
export const CUS2_HEURISTIC_WEIGHT = 2;

// Number of recent volume observations the predictor consumes
export const LOOKBACK_WINDOW = 4;

// Volume counts are recorded per 15-minute interval
export const VOLUME_INTERVALS_PER_HOUR = 4;

export type TravelTimeModel = {
  /** Quadratic coefficient of the flow/speed curve */
  a: number;
  /** Linear coefficient of the flow/speed curve */
  b: number;
  speedLimitKmh: number;
  /** Flow (veh/h) at or below which traffic runs at the speed limit */
  capacityFlow: number;
  /** Fixed per-segment intersection delay in seconds */
  delayS: number;
};

export const TRAVEL_TIME_MODEL: TravelTimeModel = {
  a: 1.4648375,
  b: 93.75,
  speedLimitKmh: 60,
  capacityFlow: 351,
  delayS: 30
};

/**
 * Free-flow travel time in seconds for a segment, used as a lower bound
 * when sanity-checking predicted costs.
 */
export function freeFlowSeconds(distanceKm: number, model: TravelTimeModel = TRAVEL_TIME_MODEL): number {
  return (Math.max(0, distanceKm) / model.speedLimitKmh) * 3600 + model.delayS;
}
