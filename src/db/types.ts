// src/db/types.ts
// Canonical store adapter interface: one async API over SQLite and PostgreSQL

/* ---------- Result Types ---------- */

export interface RunResult {
  changes: number;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Unified async database interface.
 * Both SQLite (better-sqlite3) and PostgreSQL (pg) implement this.
 * The pipeline receives an adapter explicitly; nothing in the core holds one globally.
 *
 * Query methods use SQLite '?' placeholders in SQL strings.
 * The PostgresAdapter converts '?' to '$1, $2, ...' before execution.
 */
export interface DbAdapter {
  /** Identifies the underlying database driver. */
  readonly dbType: "sqlite" | "postgresql";

  /** Execute a SELECT and return the first matching row, or undefined if no match. */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  /** Execute a SELECT and return all matching rows. */
  queryAll<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T[]>;

  /** Execute an INSERT, UPDATE, or DELETE statement. */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /**
   * Execute raw SQL without parameters. Used for DDL.
   * Multi-statement DDL is separated with semicolons.
   */
  exec(sql: string): Promise<void>;

  /**
   * Execute a series of operations atomically.
   * The callback receives a transaction-scoped adapter; on error, ROLLBACK is
   * issued and the original error is rethrown.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  /** Close the database connection (pool). */
  close(): Promise<void>;
}
