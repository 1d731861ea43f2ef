export { getConfig, resetConfig, type Config } from "./config.js";
export { createLogger } from "./logger.js";
export { ProblemFileError, CsvFormatError, UsageError } from "./errors.js";
export { parseProblemFile, loadProblemFile, problemToGraph, parseNodeId, type Problem } from "./problem-file.js";
export {
  parseCsv,
  normalizeLocation,
  edgeRowSchema,
  coordinateRowSchema,
  volumeRowSchema,
  edgesFromRows,
  coordinatesFromRows,
  volumeHistoryFromRows,
  readEdgesCsv,
  readCoordinatesCsv,
  loadVolumeHistory,
  type CsvRow
} from "./csv.js";
export { buildGraph, loadGraphFromCsv, type LoadGraphOptions, type LoadedGraph } from "./graph-loader.js";
export { speedForFlow, flowToTime, createFlowPredictor, type FlowPredictorOptions } from "./travel-time.js";
export { runRoutePipeline, type RouteRequest, type RouteOutcome } from "./pipeline.js";
export { NO_SOLUTION, formatPath, formatResult, formatRoute } from "./format.js";
export { main, parseArgs, USAGE, type CliIO, type ParsedArgs } from "./cli.js";
