import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { SqliteAdapter } from '../../db/sqlite.js';
import { openTestDb } from '../../__tests__/helpers.js';
import { PersonsStore } from '../persons.js';
import { SessionsStore } from '../sessions.js';
import { TopicsStore } from '../topics.js';
import { SpeechSegmentsStore } from '../speechSegments.js';

let db: SqliteAdapter;

beforeEach(async () => {
  db = await openTestDb();
  await PersonsStore.create(db, { personId: 'op_1', fullName: 'Rossi Mario', familyName: 'Rossi', givenName: 'Mario' });
  await PersonsStore.create(db, { personId: 'op_2', fullName: 'Verdi Anna', familyName: 'Verdi', givenName: 'Anna' });
  await SessionsStore.create(db, {
    sessionId: 'session_19_C_1',
    date: '2024-06-12',
    chamber: 'C',
    legislature: 19,
    sessionNumber: 1,
  });
  await TopicsStore.create(db, { topicId: 't1', sessionId: 'session_19_C_1', title: 'Bilancio', ordinal: 0 });
});

afterEach(async () => {
  await db.close();
});

function speech(speechId: string, speakerId: string, orderInTopic: number) {
  return {
    speechId,
    sessionId: 'session_19_C_1',
    topicId: 't1',
    speakerId,
    text: 'Intervento.',
    date: '2024-06-12',
    orderInTopic,
  };
}

/* ============= create / getById ============= */

describe('SpeechSegmentsStore', () => {
  it('reads back a stored speech', async () => {
    await SpeechSegmentsStore.create(db, speech('s1', 'op_1', 0));

    const stored = await SpeechSegmentsStore.getById(db, 's1');
    expect(stored?.speakerId).toBe('op_1');
    expect(stored?.orderInTopic).toBe(0);
    expect(stored?.sourceReference).toBeNull();
  });

  it('refuses a speech whose speaker does not exist', async () => {
    await expect(SpeechSegmentsStore.create(db, speech('s1', 'op_404', 0))).rejects.toThrow(/FOREIGN KEY/);
  });

  it('counts speeches per requested speaker', async () => {
    await SpeechSegmentsStore.create(db, speech('s1', 'op_1', 0));
    await SpeechSegmentsStore.create(db, speech('s2', 'op_1', 1));
    await SpeechSegmentsStore.create(db, speech('s3', 'op_2', 2));

    const counts = await SpeechSegmentsStore.countBySpeaker(db, ['op_1', 'op_404']);
    expect([...counts.entries()]).toEqual([['op_1', 2]]);
    expect(await SpeechSegmentsStore.count(db)).toBe(3);
  });

  it('returns an empty map for no speakers', async () => {
    expect((await SpeechSegmentsStore.countBySpeaker(db, [])).size).toBe(0);
  });
});

/* ============= findOrphans ============= */

describe('SpeechSegmentsStore.findOrphans', () => {
  it('is empty on a consistent store', async () => {
    await SpeechSegmentsStore.create(db, speech('s1', 'op_1', 0));
    expect(await SpeechSegmentsStore.findOrphans(db)).toEqual([]);
  });

  it('reports which references are missing', async () => {
    db.raw.pragma('foreign_keys = OFF');
    await SpeechSegmentsStore.create(db, { ...speech('s9', 'op_404', 0), topicId: 't404' });

    expect(await SpeechSegmentsStore.findOrphans(db)).toEqual([
      { speechId: 's9', missing: ['speaker', 'topic'] },
    ]);
  });
});
