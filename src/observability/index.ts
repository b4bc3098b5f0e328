// src/observability/index.ts
// Central export point for logging and metrics.

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  loggerOptions,
  type LogLevel,
  type Logger,
} from "./logger";

/* ---------- Metrics ---------- */
export {
  registry,
  unitsTotal,
  unitDuration,
  recordsTotal,
  placeholdersCreatedTotal,
  unresolvedSpeakersTotal,
  recordUnit,
  recordRecords,
  recordPlaceholders,
  recordUnresolvedSpeaker,
  renderMetrics,
  METRICS_ENABLED,
} from "./metrics";
