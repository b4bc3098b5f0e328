// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// All methods return Promises that resolve synchronously (better-sqlite3 is sync).

import Database from "better-sqlite3";
import { createLogger } from "../observability/logger";
import type { DbAdapter, RunResult } from "./types";

const log = createLogger("db/sqlite");

export class SqliteAdapter implements DbAdapter {
  readonly dbType = "sqlite" as const;
  private _db: Database.Database;

  constructor(db: Database.Database) {
    this._db = db;
  }

  /**
   * Open an adapter on a file path, or ':memory:' for a throwaway database.
   * Foreign keys are enforced; file databases use WAL journaling.
   */
  static open(filename: string): SqliteAdapter {
    const raw = new Database(filename);
    if (filename !== ":memory:") {
      raw.pragma("journal_mode = WAL");
    }
    raw.pragma("foreign_keys = ON");
    return new SqliteAdapter(raw);
  }

  /** Underlying better-sqlite3 handle. Pragmas only; store modules use the adapter methods. */
  get raw(): Database.Database {
    return this._db;
  }

  queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const row = this._db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const rows = this._db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({ changes: result.changes });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // better-sqlite3's db.transaction() doesn't take async callbacks, so
    // BEGIN/COMMIT/ROLLBACK are issued by hand. Units run one at a time,
    // so no other writer interleaves between the awaits.
    this._db.exec("BEGIN");
    try {
      const result = await fn(this);
      this._db.exec("COMMIT");
      return result;
    } catch (e) {
      try {
        this._db.exec("ROLLBACK");
      } catch (rollbackErr) {
        log.error({ err: rollbackErr }, "ROLLBACK failed");
      }
      throw e;
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}
