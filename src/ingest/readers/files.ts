// src/ingest/readers/files.ts
// Directory discovery shared by both source readers.

import fs from "node:fs";
import path from "node:path";

/** JSON files directly inside `dir`, sorted by name. Missing directory → empty list. */
export function listJsonFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];

  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".json"))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/** Read and parse one JSON file. Throws on I/O or syntax errors. */
export function readJsonFile(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf8"));
}

/* ---------- Untyped JSON helpers ---------- */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Trimmed string for string or number input, null for anything else or blank */
export function optString(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
