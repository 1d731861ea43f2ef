import { Graph, defaultLogger } from "@roadsearch/pathfinding";
import type { Logger, NodeCoords, NodeId, Point, StaticEdge } from "@roadsearch/pathfinding";
import { normalizeLocation, readCoordinatesCsv, readEdgesCsv } from "./csv.js";

export type LoadGraphOptions = {
  edgesPath: string;
  coordsPath?: string;
  origin?: string;
  destinations?: string[];
  logger?: Logger;
};

export type LoadedGraph = {
  graph: Graph;
  /** Edges as read from disk, kept for reweighting fallbacks */
  staticEdges: StaticEdge[];
};

/**
 * Assemble a Graph from edge rows and optional coordinates. Every edge
 * endpoint becomes a node; nodes without a coordinate row sit at [0, 0].
 * Unknown origin or destinations are reported and dropped.
 */
export function buildGraph(
  staticEdges: StaticEdge[],
  coords: Map<string, Point> | null,
  origin: string | undefined,
  destinations: string[],
  logger: Logger = defaultLogger
): Graph {
  const nodes: NodeCoords = new Map();
  let missingCoords = 0;

  for (const edge of staticEdges) {
    for (const id of [edge.from, edge.to]) {
      if (nodes.has(id)) continue;
      const point = coords?.get(String(id));
      if (coords && !point) missingCoords++;
      nodes.set(id, point ?? [0, 0]);
    }
  }

  if (missingCoords > 0) {
    logger.warn({ missingCoords }, "nodes without coordinates placed at [0, 0]");
  }

  let resolvedOrigin: NodeId | null = null;
  if (origin) {
    const normalized = normalizeLocation(origin);
    if (nodes.has(normalized)) {
      resolvedOrigin = normalized;
    } else {
      logger.warn({ origin: normalized }, "origin node not found in graph");
    }
  }

  const resolvedDestinations: NodeId[] = [];
  for (const destination of destinations.map(normalizeLocation)) {
    if (nodes.has(destination)) {
      resolvedDestinations.push(destination);
    } else {
      logger.warn({ destination }, "destination node not found in graph");
    }
  }

  return new Graph(
    { nodes, edges: staticEdges, origin: resolvedOrigin, destinations: resolvedDestinations },
    logger
  );
}

export async function loadGraphFromCsv(options: LoadGraphOptions): Promise<LoadedGraph> {
  const logger = options.logger ?? defaultLogger;
  const staticEdges = await readEdgesCsv(options.edgesPath);
  const coords = options.coordsPath ? await readCoordinatesCsv(options.coordsPath) : null;

  const graph = buildGraph(staticEdges, coords, options.origin, options.destinations ?? [], logger);
  logger.info(
    { nodes: graph.nodeIds().length, edges: staticEdges.length, edgesPath: options.edgesPath },
    "graph loaded"
  );

  return { graph, staticEdges };
}
