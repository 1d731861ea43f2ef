import { LOOKBACK_WINDOW } from "@roadsearch/config";
import type { Graph } from "./graph.js";
import { defaultLogger, type Logger } from "./logger.js";
import type { NodeId, StaticEdge } from "./types.js";

/** Chronologically ordered volume observations keyed by location (edge source) */
export type VolumeHistory = Map<NodeId, number[]>;

/**
 * Maps the most recent `window` volume observations for an edge's source to
 * a new edge cost. May throw.
 */
export type Predictor = (window: readonly number[], edge: StaticEdge) => number;

export type FallbackReason = "no-history" | "short-history" | "predictor-error" | "invalid-prediction";

export type EdgeOutcome =
  | { from: NodeId; to: NodeId; status: "updated"; cost: number }
  | { from: NodeId; to: NodeId; status: "fallback"; cost: number; reason: FallbackReason }
  | { from: NodeId; to: NodeId; status: "skipped"; reason: FallbackReason };

export type ReweightSummary = {
  total: number;
  updated: number;
  fallback: number;
  skipped: number;
  outcomes: EdgeOutcome[];
};

export type ReweightOptions = {
  /** Observations required before the predictor is consulted */
  window?: number;
  logger?: Logger;
};

function isUsableCost(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function predict(
  predictor: Predictor,
  window: readonly number[],
  edge: StaticEdge,
  logger: Logger
): { cost: number } | { reason: FallbackReason } {
  let value: unknown;
  try {
    value = predictor(window, edge);
  } catch (err) {
    logger.warn({ err, from: edge.from, to: edge.to }, "prediction failed, using static cost");
    return { reason: "predictor-error" };
  }

  if (!isUsableCost(value)) {
    logger.warn({ value, from: edge.from, to: edge.to }, "prediction is not a usable cost, using static cost");
    return { reason: "invalid-prediction" };
  }
  return { cost: value };
}

/**
 * Rewrite the cost of every edge in `staticEdges` on `graph`.
 *
 * Each edge ends in one of three states: updated from the predictor, reset to
 * its static cost, or skipped when neither a prediction nor a usable static
 * cost exists. Node and destination sets are never touched.
 */
export function reweightEdges(
  graph: Graph,
  staticEdges: Iterable<StaticEdge>,
  history: VolumeHistory,
  predictor: Predictor,
  options: ReweightOptions = {}
): ReweightSummary {
  const window = options.window ?? LOOKBACK_WINDOW;
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`lookback window must be a positive integer, got ${window}`);
  }
  const logger = options.logger ?? defaultLogger;
  const outcomes: EdgeOutcome[] = [];
  const summary: ReweightSummary = { total: 0, updated: 0, fallback: 0, skipped: 0, outcomes };

  for (const edge of staticEdges) {
    summary.total++;
    const { from, to } = edge;
    const observations = history.get(from);

    let reason: FallbackReason;
    if (!observations || observations.length === 0) {
      reason = "no-history";
    } else if (observations.length < window) {
      reason = "short-history";
    } else {
      const result = predict(predictor, observations.slice(-window), edge, logger);
      if ("cost" in result) {
        graph.setEdgeCost(from, to, result.cost);
        outcomes.push({ from, to, status: "updated", cost: result.cost });
        summary.updated++;
        continue;
      }
      reason = result.reason;
    }

    if (isUsableCost(edge.cost)) {
      graph.setEdgeCost(from, to, edge.cost);
      outcomes.push({ from, to, status: "fallback", cost: edge.cost, reason });
      summary.fallback++;
    } else {
      logger.warn({ from, to, reason }, "edge has no prediction and no static cost, skipped");
      outcomes.push({ from, to, status: "skipped", reason });
      summary.skipped++;
    }
  }

  logger.info(
    { total: summary.total, updated: summary.updated, fallback: summary.fallback, skipped: summary.skipped },
    "edge reweight complete"
  );

  return summary;
}
