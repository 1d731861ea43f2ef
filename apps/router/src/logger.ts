import { destination, pino } from "pino";
import type { Logger } from "@roadsearch/pathfinding";

/**
 * Router logger. Writes to stderr so command output on stdout stays clean;
 * silent under test.
 */
export function createLogger(level: string): Logger {
  const resolved = process.env.NODE_ENV === "test" ? "silent" : level;
  return pino({ name: "router", level: resolved }, destination(2));
}
