// src/observability/logger.ts
// pino loggers for the pipeline and its scripts.
//
// LOG_LEVEL sets the level (info when unset or unknown). LOG_PRETTY=true routes
// output through pino-pretty; otherwise each entry is one JSON line on stdout.

import pino, { type Logger } from "pino";

export type LogLevel = pino.LevelWithSilent;

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LogLevel[];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/* ---------- Options ---------- */

export function loggerOptions(env: NodeJS.ProcessEnv = process.env): pino.LoggerOptions {
  const requested = env.LOG_LEVEL?.trim().toLowerCase() ?? "";

  const options: pino.LoggerOptions = {
    level: isLogLevel(requested) ? requested : "info",
    base: { service: "parliament-pipeline" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (env.LOG_PRETTY === "true") {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname,service" },
    };
  }

  return options;
}

/* ---------- Loggers ---------- */

let root: Logger | null = null;

/**
 * Logger bound to `module`. The root is built from the environment on first use.
 *
 * @example
 * const log = createLogger('db/sqlite');
 */
export function createLogger(module: string): Logger {
  root ??= pino(loggerOptions());
  return root.child({ module });
}

/** Per-run and per-unit context: `createChildLogger(log, { runId, unitId })` */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

export type { Logger };
