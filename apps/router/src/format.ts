import type { NodeId, SearchResult } from "@roadsearch/pathfinding";
import type { RouteOutcome } from "./pipeline.js";

export const NO_SOLUTION = "No solution found.";

export function formatPath(path: readonly NodeId[]): string {
  return path.map(String).join(" -> ");
}

/**
 * Three-line search report:
 *   <file> <method>
 *   <goal> <created>
 *   <path>
 */
export function formatResult(file: string, method: string, result: SearchResult): string {
  const header = `${file} ${method}`;
  if (result.goal === null) {
    return `${header}\n${NO_SOLUTION}`;
  }
  return `${header}\n${String(result.goal)} ${result.created}\n${formatPath(result.path)}`;
}

export function formatRoute(outcome: RouteOutcome): string {
  const { result, cost, reweight } = outcome;
  const lines: string[] = [];

  if (reweight) {
    lines.push(
      `Edges reweighted: ${reweight.updated}/${reweight.total} predicted, ${reweight.fallback} static, ${reweight.skipped} skipped`
    );
  }

  if (result.goal === null) {
    lines.push(NO_SOLUTION);
  } else {
    lines.push(`Path: ${formatPath(result.path)}`);
    lines.push(`Cost: ${cost === null ? "unknown" : cost.toFixed(2)}`);
    lines.push(`Nodes created: ${result.created}`);
  }

  return lines.join("\n");
}
