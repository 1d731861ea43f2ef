import { createFrontier, type Discipline } from "./frontier.js";
import type { Graph } from "./graph.js";
import { defaultLogger, type Logger } from "./logger.js";
import type { FrontierEntry, NodeId, SearchOptions, SearchResult, StrategyName } from "./types.js";

/**
 * What distinguishes one search strategy from another: how the frontier
 * orders entries, and whether that ordering consults the heuristic.
 */
export type Strategy = {
  name: StrategyName;
  discipline: Discipline;
  informed: boolean;
  /** Ordering key for priority frontiers; lower pops first */
  priority?: (entry: FrontierEntry, graph: Graph, options: SearchOptions) => number;
  /**
   * Order in which a node's children are inserted. Stacks insert descending
   * so the smallest neighbor id is popped next.
   */
  insertion: "ascending" | "descending";
};

function failure(created: number): SearchResult {
  return { goal: null, created, path: [] };
}

/**
 * Generic graph search shared by every strategy.
 *
 * Every child entry built from an expanded node counts as created, even when
 * its node turns out to be expanded already; such duplicates are dropped when
 * popped. A destination is recognised when its entry is popped, not when it
 * is created.
 */
export function runSearch(
  graph: Graph,
  strategy: Strategy,
  options: SearchOptions = {},
  logger: Logger = defaultLogger
): SearchResult {
  const origin = graph.origin;
  if (origin === null) {
    logger.warn({ strategy: strategy.name }, "no origin configured, search skipped");
    return failure(0);
  }
  if (graph.destinations.size === 0) {
    // Informed strategies cannot order anything without a destination to measure against
    if (strategy.informed) {
      logger.error({ strategy: strategy.name }, "no destinations configured, search skipped");
      return failure(0);
    }
    logger.warn({ strategy: strategy.name }, "no destinations configured, search will exhaust the frontier");
  }

  const priority = strategy.priority;
  const frontier = createFrontier(
    strategy.discipline,
    priority ? (entry) => priority(entry, graph, options) : undefined
  );
  const expanded = new Set<NodeId>();
  const maxCreated = options.maxCreated ?? Number.POSITIVE_INFINITY;

  frontier.push({ node: origin, path: [origin], cost: 0 });
  let created = 1;

  while (frontier.size > 0) {
    const entry = frontier.pop();
    if (!entry) break;

    if (expanded.has(entry.node)) {
      continue;
    }

    if (graph.isDestination(entry.node)) {
      return { goal: entry.node, created, path: entry.path };
    }

    expanded.add(entry.node);

    const neighbors = graph.neighbors(entry.node);
    if (strategy.insertion === "descending") {
      neighbors.reverse();
    }

    for (const [neighbor, cost] of neighbors) {
      if (created >= maxCreated) {
        logger.warn({ strategy: strategy.name, created, maxCreated }, "created-node limit reached, search stopped");
        return failure(created);
      }
      frontier.push({
        node: neighbor,
        path: [...entry.path, neighbor],
        cost: entry.cost + cost
      });
      created++;
    }
  }

  return failure(created);
}
