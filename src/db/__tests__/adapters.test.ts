import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { toPositional } from '../postgres.js';
import { SqliteAdapter } from '../sqlite.js';
import { initSchema } from '../schema.js';

/* ============= toPositional ============= */

describe('toPositional', () => {
  it('numbers placeholders in order', () => {
    expect(toPositional('SELECT * FROM persons WHERE person_id = ? AND party = ?'))
      .toBe('SELECT * FROM persons WHERE person_id = $1 AND party = $2');
  });

  it('leaves SQL without placeholders alone', () => {
    expect(toPositional('SELECT COUNT(*) AS count FROM sessions')).toBe('SELECT COUNT(*) AS count FROM sessions');
  });
});

/* ============= SqliteAdapter ============= */

describe('SqliteAdapter.transaction', () => {
  let db: SqliteAdapter;

  beforeEach(async () => {
    db = SqliteAdapter.open(':memory:');
    await initSchema(db);
  });

  afterEach(async () => {
    await db.close();
  });

  const insertSession = (id: string, num: number) =>
    db.run(
      `INSERT INTO sessions (session_id, date, chamber, legislature, session_number, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
      [id, 'unknown', 'C', 19, num, 0]
    );

  it('commits when the callback resolves', async () => {
    const result = await db.transaction(async (tx) => {
      await tx.run(
        `INSERT INTO sessions (session_id, date, chamber, legislature, session_number, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
        ['a', 'unknown', 'C', 19, 1, 0]
      );
      return 'done';
    });

    expect(result).toBe('done');
    expect(await db.queryOne<{ count: number }>('SELECT COUNT(*) AS count FROM sessions')).toEqual({ count: 1 });
  });

  it('rolls back and rethrows when the callback rejects', async () => {
    const failure = new Error('stop');

    await expect(db.transaction(async () => {
      await insertSession('a', 1);
      throw failure;
    })).rejects.toBe(failure);

    expect(await db.queryAll('SELECT * FROM sessions')).toEqual([]);
  });

  it('can run again after a rollback', async () => {
    await expect(db.transaction(async () => {
      await insertSession('a', 1);
      await insertSession('b', 1);
    })).rejects.toThrow(/UNIQUE/);

    await db.transaction(() => insertSession('c', 2));
    expect(await db.queryAll<{ session_id: string }>('SELECT session_id FROM sessions')).toEqual([{ session_id: 'c' }]);
  });

  it('enforces foreign keys', () => {
    expect(db.raw.pragma('foreign_keys', { simple: true })).toBe(1);
  });
});
