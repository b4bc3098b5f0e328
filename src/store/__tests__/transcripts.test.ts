import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { SqliteAdapter } from '../../db/sqlite.js';
import { openTestDb } from '../../__tests__/helpers.js';
import { SessionsStore } from '../sessions.js';
import { TopicsStore } from '../topics.js';

let db: SqliteAdapter;

beforeEach(async () => {
  db = await openTestDb();
});

afterEach(async () => {
  await db.close();
});

/* ============= SessionsStore ============= */

describe('SessionsStore', () => {
  it('stores and reads back a session', async () => {
    await SessionsStore.create(db, {
      sessionId: 'session_19_S_12',
      date: 'unknown',
      chamber: 'S',
      legislature: 19,
      sessionNumber: 12,
      sourceReference: 'data/raw/19__S__12.json',
    });

    const session = await SessionsStore.getById(db, 'session_19_S_12');
    expect(session).toMatchObject({
      sessionId: 'session_19_S_12',
      date: 'unknown',
      chamber: 'S',
      legislature: 19,
      sessionNumber: 12,
      sourceReference: 'data/raw/19__S__12.json',
    });
    expect(await SessionsStore.count(db)).toBe(1);
  });

  it('keeps (legislature, chamber, number) unique', async () => {
    const base = { date: '2024-06-12', chamber: 'C' as const, legislature: 19, sessionNumber: 1 };
    await SessionsStore.create(db, { ...base, sessionId: 'a' });
    await expect(SessionsStore.create(db, { ...base, sessionId: 'b' })).rejects.toThrow(/UNIQUE/);
  });
});

/* ============= TopicsStore ============= */

describe('TopicsStore', () => {
  beforeEach(async () => {
    await SessionsStore.create(db, {
      sessionId: 'session_19_C_1',
      date: '2024-06-12',
      chamber: 'C',
      legislature: 19,
      sessionNumber: 1,
    });
  });

  it('lists topics of a session by ordinal', async () => {
    await TopicsStore.create(db, { topicId: 't2', sessionId: 'session_19_C_1', title: 'Varie', ordinal: 1 });
    await TopicsStore.create(db, { topicId: 't1', sessionId: 'session_19_C_1', title: 'Bilancio', ordinal: 0 });

    const topics = await TopicsStore.listBySession(db, 'session_19_C_1');
    expect(topics.map((t) => t.title)).toEqual(['Bilancio', 'Varie']);
    expect(await TopicsStore.count(db)).toBe(2);
  });

  it('refuses a topic for a missing session', async () => {
    await expect(
      TopicsStore.create(db, { topicId: 't1', sessionId: 'session_19_C_404', title: 'Bilancio', ordinal: 0 })
    ).rejects.toThrow(/FOREIGN KEY/);
  });
});
