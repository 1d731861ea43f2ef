import { UNREACHABLE } from "@roadsearch/config";
import { defaultLogger, type Logger } from "./logger.js";
import type { GraphInput, Neighbor, NodeCoords, NodeId, Point, StaticEdge } from "./types.js";

/**
 * Canonical node ordering used for every tie-break.
 * Numbers sort numerically, strings by code unit, numbers before strings.
 */
export function compareNodeIds(a: NodeId, b: NodeId): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function euclideanDistance(a: Point, b: Point): number {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  return Math.sqrt(dx * dx + dy * dy);
}

function isValidCost(cost: number): boolean {
  return Number.isFinite(cost) && cost >= 0;
}

/**
 * Directed, weighted route graph.
 *
 * Topology (nodes, origin, destinations) is fixed at construction. Edge costs
 * change only through setEdgeCost, which is how the reweighter applies
 * predicted travel times between searches.
 */
export class Graph {
  readonly origin: NodeId | null;
  readonly destinations: ReadonlySet<NodeId>;

  private readonly nodes: NodeCoords;
  // from -> (to -> cost); one cost per ordered pair
  private readonly adjacency = new Map<NodeId, Map<NodeId, number>>();
  // from -> sorted neighbors, dropped whenever a cost under `from` changes
  private readonly neighborCache = new Map<NodeId, Neighbor[]>();
  private readonly logger: Logger;
  private readonly warnedMissing = new Set<NodeId>();

  constructor(input: GraphInput, logger: Logger = defaultLogger) {
    this.logger = logger;
    this.nodes = new Map(Array.from(input.nodes, ([id, [x, y]]): [NodeId, Point] => [id, [x, y]]));
    this.origin = input.origin;
    this.destinations = new Set(input.destinations);

    for (const edge of input.edges) {
      if (edge.cost === undefined || !isValidCost(edge.cost)) {
        this.logger.warn({ from: edge.from, to: edge.to, cost: edge.cost }, "edge has no usable cost, skipping");
        continue;
      }
      this.setEdgeCost(edge.from, edge.to, edge.cost);
    }

    if (this.origin !== null && !this.nodes.has(this.origin)) {
      this.logger.warn({ origin: this.origin }, "origin is not in the node table");
    }
    for (const destination of this.destinations) {
      if (!this.nodes.has(destination)) {
        this.logger.warn({ destination }, "destination is not in the node table");
      }
    }
  }

  hasNode(node: NodeId): boolean {
    return this.nodes.has(node);
  }

  nodeIds(): NodeId[] {
    return Array.from(this.nodes.keys()).sort(compareNodeIds);
  }

  /**
   * Outgoing edges of `node`, ascending by neighbor id.
   * The returned array is a fresh copy; callers may not mutate graph state through it.
   */
  neighbors(node: NodeId): Neighbor[] {
    let sorted = this.neighborCache.get(node);
    if (!sorted) {
      const targets = this.adjacency.get(node);
      sorted = targets
        ? Array.from(targets.entries()).sort((a, b) => compareNodeIds(a[0], b[0]))
        : [];
      this.neighborCache.set(node, sorted);
    }
    return sorted.map(([neighbor, cost]): Neighbor => [neighbor, cost]);
  }

  isDestination(node: NodeId): boolean {
    return this.destinations.has(node);
  }

  coordinates(node: NodeId): Point {
    const point = this.nodes.get(node);
    if (point) return [point[0], point[1]];

    if (!this.warnedMissing.has(node)) {
      this.warnedMissing.add(node);
      this.logger.warn({ node }, "no coordinates for node, using [0, 0]");
    }
    return [0, 0];
  }

  /**
   * Straight-line distance from `node` to `target`, or to the nearest
   * destination when no target is given. Returns UNREACHABLE when there is
   * no destination to measure against.
   */
  heuristic(node: NodeId, target?: NodeId): number {
    const from = this.coordinates(node);

    if (target !== undefined) {
      return euclideanDistance(from, this.coordinates(target));
    }

    if (this.destinations.size === 0) {
      this.logger.error({ node }, "heuristic requested with no destinations configured");
      return UNREACHABLE;
    }

    let best = UNREACHABLE;
    for (const destination of this.destinations) {
      const distance = euclideanDistance(from, this.coordinates(destination));
      if (distance < best) {
        best = distance;
      }
    }
    return best;
  }

  edgeCost(from: NodeId, to: NodeId): number | undefined {
    return this.adjacency.get(from)?.get(to);
  }

  /** Insert or overwrite the cost of edge (from, to). */
  setEdgeCost(from: NodeId, to: NodeId, cost: number): void {
    if (!isValidCost(cost)) {
      throw new RangeError(`Edge (${String(from)}, ${String(to)}) cost must be a non-negative finite number, got ${cost}`);
    }

    let targets = this.adjacency.get(from);
    if (!targets) {
      targets = new Map();
      this.adjacency.set(from, targets);
    }
    targets.set(to, cost);
    this.neighborCache.delete(from);
  }

  edges(): Required<StaticEdge>[] {
    const result: Required<StaticEdge>[] = [];
    for (const from of Array.from(this.adjacency.keys()).sort(compareNodeIds)) {
      for (const [to, cost] of this.neighbors(from)) {
        result.push({ from, to, cost });
      }
    }
    return result;
  }

  /** Sum of edge costs along `path`, or null when a hop has no edge. */
  pathCost(path: readonly NodeId[]): number | null {
    let total = 0;
    for (let i = 1; i < path.length; i++) {
      const cost = this.edgeCost(path[i - 1], path[i]);
      if (cost === undefined) {
        return null;
      }
      total += cost;
    }
    return total;
  }
}
