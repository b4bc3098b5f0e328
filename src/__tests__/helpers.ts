// Shared fixtures for the store and pipeline tests.

import { SqliteAdapter } from '../db/sqlite.js';
import { initSchema } from '../db/schema.js';
import type { DbAdapter, RunResult } from '../db/types.js';
import type { ProfileRawUnit, TranscriptRawUnit } from '../ingest/types.js';

/** Fresh in-memory database with the canonical schema */
export async function openTestDb(): Promise<SqliteAdapter> {
  const db = SqliteAdapter.open(':memory:');
  await initSchema(db);
  return db;
}

export function profileUnit(unitId: string, data: unknown): ProfileRawUnit {
  return { kind: 'profile', unitId, sourceRef: `test://${unitId}`, read: () => data };
}

export function transcriptUnit(sessionKey: string, body: unknown): TranscriptRawUnit {
  return {
    kind: 'transcript',
    unitId: `${sessionKey}.json`,
    sourceRef: `test://${sessionKey}.json`,
    sessionKey,
    read: () => body,
  };
}

/**
 * Delegates to a real adapter but rejects `run` when `shouldFail` matches
 * and `queryAll` when `shouldFailRead` does, to exercise unit rollback.
 */
export class FailingAdapter implements DbAdapter {
  readonly dbType = 'sqlite' as const;

  constructor(
    private readonly inner: DbAdapter,
    private readonly shouldFail: (sql: string, params: unknown[]) => boolean,
    private readonly shouldFailRead: (sql: string) => boolean = () => false
  ) {}

  queryOne<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return this.inner.queryOne<T>(sql, params);
  }

  queryAll<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    if (this.shouldFailRead(sql)) {
      return Promise.reject(new Error('injected read failure'));
    }
    return this.inner.queryAll<T>(sql, params);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    if (this.shouldFail(sql, params)) {
      return Promise.reject(new Error('injected store failure'));
    }
    return this.inner.run(sql, params);
  }

  exec(sql: string): Promise<void> {
    return this.inner.exec(sql);
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return this.inner.transaction(() => fn(this));
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
