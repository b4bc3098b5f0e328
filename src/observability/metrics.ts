// src/observability/metrics.ts
// Prometheus metrics for pipeline runs
//
// Defined with prom-client on a module registry. There is no HTTP endpoint;
// the run script writes the text exposition to a file when asked to.

import { Registry, Counter, Histogram } from "prom-client";
import { config } from "../config";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = config.metrics.prefix;
const METRICS_ENABLED = config.metrics.enabled;

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "parliament-pipeline",
});

/* ---------- Unit Metrics ---------- */

/**
 * Units processed, by kind and terminal outcome
 */
export const unitsTotal = new Counter({
  name: `${METRICS_PREFIX}_units_total`,
  help: "Total number of raw units processed",
  labelNames: ["kind", "outcome"] as const,
  registers: [registry],
});

export const unitDuration = new Histogram({
  name: `${METRICS_PREFIX}_unit_duration_seconds`,
  help: "Time spent processing one raw unit",
  labelNames: ["kind"] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

/* ---------- Record Metrics ---------- */

export const recordsTotal = new Counter({
  name: `${METRICS_PREFIX}_records_total`,
  help: "Canonical records written or skipped, by entity and action",
  labelNames: ["entity", "action"] as const,
  registers: [registry],
});

export const placeholdersCreatedTotal = new Counter({
  name: `${METRICS_PREFIX}_placeholders_created_total`,
  help: "Placeholder persons created for unresolved speakers",
  registers: [registry],
});

export const unresolvedSpeakersTotal = new Counter({
  name: `${METRICS_PREFIX}_unresolved_speakers_total`,
  help: "Speaker names that fell through to a placeholder",
  labelNames: ["reason"] as const,
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordUnit(
  kind: string,
  outcome: "committed" | "rolled_back",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;
  unitsTotal.inc({ kind, outcome });
  unitDuration.observe({ kind }, durationMs / 1000);
}

export function recordRecords(
  entity: string,
  action: "created" | "updated" | "skipped" | "invalid",
  count = 1
): void {
  if (!METRICS_ENABLED || count <= 0) return;
  recordsTotal.inc({ entity, action }, count);
}

export function recordPlaceholders(count: number): void {
  if (!METRICS_ENABLED || count <= 0) return;
  placeholdersCreatedTotal.inc(count);
}

export function recordUnresolvedSpeaker(reason: string): void {
  if (!METRICS_ENABLED) return;
  unresolvedSpeakersTotal.inc({ reason });
}

/** Prometheus text exposition of every registered metric */
export function renderMetrics(): Promise<string> {
  return registry.metrics();
}

export { METRICS_ENABLED };
