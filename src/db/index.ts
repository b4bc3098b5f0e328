// src/db/index.ts
// Adapter factory: picks the DbAdapter from the database settings
// (postgresql://... → PostgresAdapter, otherwise SqliteAdapter).

import path from "node:path";
import fs from "node:fs";
import type { DatabaseDriver } from "../config";
import { SqliteAdapter } from "./sqlite";
import { PostgresAdapter } from "./postgres";
import type { DbAdapter } from "./types";

export type { DbAdapter, RunResult } from "./types";
export { SqliteAdapter } from "./sqlite";
export { PostgresAdapter, toPositional, type PgPool } from "./postgres";
export { initSchema, SCHEMA_SQL } from "./schema";

export interface AdapterOptions {
  driver: DatabaseDriver;
  url: string;
  sqlitePath: string;
}

/**
 * Create a database adapter. The caller owns the handle and closes it.
 *
 * - driver 'postgresql' opens a pg pool on `url`.
 * - Otherwise a SQLite file is opened at `sqlitePath` (its directory is created).
 */
export function createAdapter(options: AdapterOptions): DbAdapter {
  if (options.driver === "postgresql") {
    return PostgresAdapter.connect(options.url);
  }

  if (options.sqlitePath !== ":memory:") {
    fs.mkdirSync(path.dirname(options.sqlitePath), { recursive: true });
  }
  return SqliteAdapter.open(options.sqlitePath);
}
