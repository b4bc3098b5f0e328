/* src/config.ts
   Centralized config & source data roots */
import path from "node:path";
import "dotenv/config";

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? "").toString();

export type DatabaseDriver = "sqlite" | "postgresql";
export type Chamber = "C" | "S";

export const CHAMBERS: readonly Chamber[] = ["C", "S"];

export function isChamber(value: string): value is Chamber {
  return CHAMBERS.some((chamber) => chamber === value);
}

// Determine database driver from DATABASE_URL scheme
const databaseUrl = env("DATABASE_URL", "sqlite://local");
const databaseDriver: DatabaseDriver = databaseUrl.startsWith("postgres")
  ? "postgresql"
  : "sqlite";

const chamberSetting = env("TRANSCRIPT_CHAMBER", "C").toUpperCase();

export const config = {
  nodeEnv: env("NODE_ENV", "development"),

  // ── Database ─────────────────────────────────────────────────────
  database: {
    url: databaseUrl,
    driver: databaseDriver,
    sqlitePath: path.resolve(process.cwd(), env("PIPELINE_DB_PATH", "data/db/parliament.db")),
  },

  // ── Raw sources ──────────────────────────────────────────────────
  sources: {
    profilesPath: path.resolve(process.cwd(), env("PROFILES_DATA_PATH", "data/raw/openparlamento")),
    transcriptsPath: path.resolve(process.cwd(), env("TRANSCRIPTS_DATA_PATH", "data/raw/camera")),
    defaultChamber: isChamber(chamberSetting) ? chamberSetting : "C",
  },

  // ── Metrics ──────────────────────────────────────────────────────
  metrics: {
    enabled: env("METRICS_ENABLED", "true") !== "false",
    prefix: env("METRICS_PREFIX", "parliament"),
  },
} as const;
