/**
 * Reader for route-finding problem files:
 *
 *   Nodes:
 *   1: (4,1)
 *   2: (2,2)
 *   Edges:
 *   (2,1): 4
 *   Origin:
 *   2
 *   Destinations:
 *   5; 4
 */

import { readFile } from "node:fs/promises";
import { Graph, defaultLogger } from "@roadsearch/pathfinding";
import type { Logger, NodeCoords, NodeId, StaticEdge } from "@roadsearch/pathfinding";
import { ProblemFileError } from "./errors.js";

export type Problem = {
  nodes: NodeCoords;
  edges: StaticEdge[];
  origin: NodeId;
  destinations: NodeId[];
};

type Section = "nodes" | "edges" | "origin" | "destinations";

const HEADER = /^(nodes|edges|origin|destinations?)\s*:\s*(.*)$/i;
const NUMBER = "(-?\\d+(?:\\.\\d+)?)";
const NODE_LINE = new RegExp(`^([^:()]+?)\\s*:\\s*\\(\\s*${NUMBER}\\s*,\\s*${NUMBER}\\s*\\)$`);
const EDGE_LINE = /^\(\s*([^,()]+?)\s*,\s*([^,()]+?)\s*\)\s*:\s*(\S+)$/;

export function parseNodeId(raw: string): NodeId {
  const trimmed = raw.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

function toSection(header: string): Section {
  switch (header.toLowerCase()) {
    case "nodes":
      return "nodes";
    case "edges":
      return "edges";
    case "origin":
      return "origin";
    default:
      return "destinations";
  }
}

export function parseProblemFile(text: string, logger: Logger = defaultLogger): Problem {
  const nodes: NodeCoords = new Map();
  const edges: StaticEdge[] = [];
  const origins: NodeId[] = [];
  const destinations: NodeId[] = [];
  let section: Section | null = null;

  const handle = (content: string, lineNo: number) => {
    switch (section) {
      case null:
        throw new ProblemFileError(`content before any section header: "${content}"`, lineNo);
      case "nodes": {
        const match = NODE_LINE.exec(content);
        if (!match) throw new ProblemFileError(`malformed node "${content}"`, lineNo);
        nodes.set(parseNodeId(match[1]), [Number(match[2]), Number(match[3])]);
        return;
      }
      case "edges": {
        const match = EDGE_LINE.exec(content);
        if (!match) throw new ProblemFileError(`malformed edge "${content}"`, lineNo);
        const cost = Number(match[3]);
        if (!Number.isFinite(cost) || cost < 0) {
          throw new ProblemFileError(`edge cost must be a non-negative number, got "${match[3]}"`, lineNo);
        }
        edges.push({ from: parseNodeId(match[1]), to: parseNodeId(match[2]), cost });
        return;
      }
      case "origin":
        origins.push(parseNodeId(content));
        return;
      case "destinations":
        for (const part of content.split(/[;,]/)) {
          if (part.trim()) destinations.push(parseNodeId(part));
        }
        return;
    }
  };

  const lines = text.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const lineNo = index + 1;
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) return;

    const header = HEADER.exec(line);
    if (header) {
      section = toSection(header[1]);
      const rest = header[2].trim();
      if (rest) handle(rest, lineNo);
      return;
    }
    handle(line, lineNo);
  });

  const lastLine = lines.length;
  if (origins.length !== 1) {
    throw new ProblemFileError(`expected exactly one origin, found ${origins.length}`, lastLine);
  }
  if (destinations.length === 0) {
    throw new ProblemFileError("no destinations listed", lastLine);
  }

  const origin = origins[0];
  if (!nodes.has(origin)) {
    logger.warn({ origin }, "origin is not a listed node");
  }

  const known = destinations.filter((destination) => {
    if (nodes.has(destination)) return true;
    logger.warn({ destination }, "destination is not a listed node, dropping it");
    return false;
  });

  return { nodes, edges, origin, destinations: known };
}

export async function loadProblemFile(path: string, logger: Logger = defaultLogger): Promise<Problem> {
  const text = await readFile(path, "utf8");
  return parseProblemFile(text, logger);
}

export function problemToGraph(problem: Problem, logger: Logger = defaultLogger): Graph {
  return new Graph(
    {
      nodes: problem.nodes,
      edges: problem.edges,
      origin: problem.origin,
      destinations: problem.destinations
    },
    logger
  );
}
