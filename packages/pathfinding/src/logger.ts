import { pino } from "pino";

export type Logger = {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
};

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === "test") {
    return "silent";
  }

  return "info";
}

export const defaultLogger: Logger = pino({ name: "pathfinding", level: resolveLevel() });
