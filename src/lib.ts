export {
  LogAnalyzer,
  addressFrequency,
  applyFilters,
  describeFilters,
  resolveGranularity,
  softwareDistribution,
  summarizeRecords,
  trafficOverTime,
} from "./analysis/index.js";
export { resolveRuntimeConfig, type RuntimeConfig } from "./config/index.js";
export { findCandidateFiles, ingestDirectory, type IngestOptions } from "./ingest/index.js";
export { createLogger, type Logger } from "./logger.js";
export { LOG_FORMATS, classifySoftwareFamily, parseLogLine, type LogFormat } from "./parser/index.js";
export { RecordStore, type RecordLoader } from "./store/index.js";
export * from "./types.js";
