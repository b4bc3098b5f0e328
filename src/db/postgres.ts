// src/db/postgres.ts
// PostgreSQL adapter over a `pg` pool.
//
// Store SQL uses '?' placeholders; they are rewritten to '$n' here. A
// transaction pins one pooled client for the life of the unit: every store
// call made through the handle passed to the callback runs on that client.

import { Pool } from "pg";
import { createLogger } from "../observability/logger";
import type { DbAdapter, RunResult } from "./types";

const log = createLogger("db/postgres");

/* ---------- Driver Surface ---------- */

export interface PgResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<PgResult>;
}

export interface PgClient extends PgQueryable {
  /** `true` destroys the connection instead of returning it to the pool */
  release(destroy?: boolean): void;
}

/** The part of `pg.Pool` the adapter drives; tests pass a stand-in */
export interface PgPool extends PgQueryable {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

/* ---------- Placeholders ---------- */

/**
 * "WHERE person_id = ? AND party = ?" → "WHERE person_id = $1 AND party = $2"
 */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

/* ---------- Adapter ---------- */

export class PostgresAdapter implements DbAdapter {
  readonly dbType = "postgresql" as const;

  private constructor(
    private readonly pool: PgPool,
    /** Set on the handle given to a transaction callback */
    private readonly pinned: PgClient | null
  ) {}

  /** Open a pool on `connectionString` */
  static connect(connectionString: string, maxConnections = 10): PostgresAdapter {
    return new PostgresAdapter(new Pool({ connectionString, max: maxConnections }), null);
  }

  static fromPool(pool: PgPool): PostgresAdapter {
    return new PostgresAdapter(pool, null);
  }

  private async execute(sql: string, params: unknown[]): Promise<PgResult> {
    const target: PgQueryable = this.pinned ?? this.pool;
    return target.query(toPositional(sql), params);
  }

  async queryOne<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    const { rows } = await this.execute(sql, params);
    return rows[0] as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    const { rows } = await this.execute(sql, params);
    return rows as T[];
  }

  async run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const { rowCount } = await this.execute(sql, params);
    return { changes: rowCount ?? 0 };
  }

  /** Runs `sql` unparameterized, so a multi-statement schema script goes in one call */
  async exec(sql: string): Promise<void> {
    await (this.pinned ?? this.pool).query(sql);
  }

  /**
   * BEGIN on a pinned client, COMMIT when `fn` resolves, ROLLBACK when it
   * rejects. Called on a handle that is already in a transaction, `fn` joins it.
   * A client whose ROLLBACK failed is destroyed rather than pooled.
   */
  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    if (this.pinned) return fn(this);

    const client = await this.pool.connect();
    let broken = false;
    try {
      await client.query("BEGIN");
      const result = await fn(new PostgresAdapter(this.pool, client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        broken = true;
        log.error({ err: rollbackErr, cause: err }, "ROLLBACK failed, discarding connection");
      }
      throw err;
    } finally {
      client.release(broken);
    }
  }

  /** Ends the pool. On a transaction handle this does nothing: the owner releases the client. */
  async close(): Promise<void> {
    if (this.pinned) return;
    await this.pool.end();
  }
}
