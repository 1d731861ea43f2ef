import { z } from "zod";
import { CUS2_HEURISTIC_WEIGHT, LOOKBACK_WINDOW } from "@roadsearch/config";

const configSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Upper bound on frontier entries per search; unset means unbounded
  SEARCH_MAX_CREATED: z.coerce.number().int().positive().optional(),
  SEARCH_CUS2_WEIGHT: z.coerce.number().nonnegative().default(CUS2_HEURISTIC_WEIGHT),
  REWEIGHT_LOOKBACK: z.coerce.number().int().positive().default(LOOKBACK_WINDOW),
  GRAPH_EDGES_PATH: z.string().min(1).default("data/graph_edges.csv"),
  GRAPH_COORDS_PATH: z.string().min(1).optional(),
  VOLUME_PATH: z.string().min(1).optional()
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

// For testing: reset cached config
export function resetConfig(): void {
  cachedConfig = null;
}
