import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EmptyContentError, MalformedRecordError } from '../../errors.js';
import type { InterventionRecord, InvalidRecord, TopicRecord } from '../../types.js';
import {
  discoverTranscriptUnits,
  parseSessionKey,
  parseTranscriptUnit,
} from '../transcriptReader.js';

const KEY = { legislature: 19, chamber: 'C' as const, sessionNumber: 347 };

function asTopic(record: TopicRecord | InvalidRecord): TopicRecord {
  if (record.kind !== 'topic') throw new Error(`expected topic, got ${record.kind}`);
  return record;
}

function asInvalid(record: TopicRecord | InterventionRecord | InvalidRecord): InvalidRecord {
  if (record.kind !== 'invalid') throw new Error(`expected invalid, got ${record.kind}`);
  return record;
}

/* ============= parseSessionKey ============= */

describe('parseSessionKey', () => {
  it('uses the default chamber for a two-part key', () => {
    expect(parseSessionKey('19__347', 'C')).toEqual({ legislature: 19, chamber: 'C', sessionNumber: 347 });
    expect(parseSessionKey('19__347', 'S')).toEqual({ legislature: 19, chamber: 'S', sessionNumber: 347 });
  });

  it('reads an explicit chamber in any case', () => {
    expect(parseSessionKey('18__S__12', 'C')).toEqual({ legislature: 18, chamber: 'S', sessionNumber: 12 });
    expect(parseSessionKey('18__s__12', 'C')).toEqual({ legislature: 18, chamber: 'S', sessionNumber: 12 });
  });

  it('rejects keys it cannot read', () => {
    expect(() => parseSessionKey('seduta', 'C')).toThrow(MalformedRecordError);
    expect(() => parseSessionKey('19__abc', 'C')).toThrow(MalformedRecordError);
    expect(() => parseSessionKey('19__C__1__2', 'C')).toThrow(MalformedRecordError);
  });

  it('rejects an unknown chamber', () => {
    expect(() => parseSessionKey('19__X__1', 'C')).toThrow('Unknown chamber "X" in session key "19__X__1"');
  });
});

/* ============= parseTranscriptUnit ============= */

describe('parseTranscriptUnit', () => {
  it('reads the fetcher layout with a date and contents', () => {
    const unit = parseTranscriptUnit({
      date: '2024-06-12',
      contents: {
        Interrogazioni: [{ speaker: 'ROSSI Mario', text: ' Grazie. ' }],
      },
    }, KEY, '19__347.json');

    expect(unit.session).toEqual(KEY);
    expect(unit.date).toBe('2024-06-12');
    expect(unit.topics).toEqual([
      {
        kind: 'topic',
        ordinal: 0,
        sourceKey: 'Interrogazioni',
        title: 'Interrogazioni',
        interventions: [{ kind: 'intervention', ordinal: 0, speaker: 'ROSSI Mario', text: 'Grazie.' }],
      },
    ]);
  });

  it('reads a bare title to interventions mapping', () => {
    const unit = parseTranscriptUnit({
      Bilancio: [{ speaker: 'Anna Verdi', text: 'Intervengo.' }],
    }, KEY, '19__347.json');

    expect(unit.date).toBe('unknown');
    expect(asTopic(unit.topics[0]).title).toBe('Bilancio');
  });

  it('keeps topic order', () => {
    const unit = parseTranscriptUnit({
      contents: {
        Primo: [{ speaker: 'A', text: 'a' }],
        Secondo: [{ speaker: 'B', text: 'b' }],
      },
    }, KEY, 'u');

    expect(unit.topics.map((t) => t.ordinal)).toEqual([0, 1]);
    expect(asTopic(unit.topics[1]).title).toBe('Secondo');
  });

  it('marks a topic that is not a list as malformed', () => {
    const unit = parseTranscriptUnit({ contents: { Bilancio: 'testo' } }, KEY, 'u');
    const invalid = asInvalid(unit.topics[0]);

    expect(invalid.error).toBeInstanceOf(MalformedRecordError);
    expect(invalid.error.path).toBe('topics["Bilancio"]');
  });

  it('marks an empty topic and a blank title as empty content', () => {
    const unit = parseTranscriptUnit({
      contents: {
        Varie: [],
        '   ': [{ speaker: 'A', text: 'a' }],
      },
    }, KEY, 'u');

    expect(asInvalid(unit.topics[0]).error).toBeInstanceOf(EmptyContentError);
    expect(asInvalid(unit.topics[1]).error).toBeInstanceOf(EmptyContentError);
  });

  it('classifies each bad intervention on its own', () => {
    const unit = parseTranscriptUnit({
      contents: {
        Bilancio: [
          'just a string',
          { speaker: 'A' },
          { speaker: 'A', text: '   ' },
          { speaker: { name: 'A' }, text: 'ok' },
          { text: 'Nessun oratore.' },
        ],
      },
    }, KEY, 'u');

    const [notObject, noText, blank, badSpeaker, anonymous] = asTopic(unit.topics[0]).interventions;

    expect(asInvalid(notObject).error).toBeInstanceOf(MalformedRecordError);
    expect(asInvalid(notObject).error.path).toBe('topics["Bilancio"][0]');
    expect(asInvalid(noText).error).toBeInstanceOf(MalformedRecordError);
    expect(asInvalid(blank).error).toBeInstanceOf(EmptyContentError);
    expect(asInvalid(badSpeaker).error).toBeInstanceOf(MalformedRecordError);
    expect(anonymous).toEqual({ kind: 'intervention', ordinal: 4, speaker: 'Unknown', text: 'Nessun oratore.' });
  });

  it('rejects a body that is not an object', () => {
    expect(() => parseTranscriptUnit([1, 2], KEY, 'u')).toThrow(MalformedRecordError);
  });

  it('rejects contents that are not an object', () => {
    expect(() => parseTranscriptUnit({ contents: null }, KEY, 'u')).toThrow('Transcript contents is not an object (u at $.contents)');
  });

  it('falls back to the unknown date for a bad date', () => {
    const unit = parseTranscriptUnit({ date: '31/02/2024', contents: {} }, KEY, 'u');
    expect(unit.date).toBe('unknown');
    expect(unit.topics).toEqual([]);
  });
});

/* ============= discoverTranscriptUnits ============= */

describe('discoverTranscriptUnits', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'transcripts-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('takes the session key from the file stem', () => {
    fs.writeFileSync(path.join(dir, '19__347.json'), JSON.stringify({ contents: {} }));
    fs.writeFileSync(path.join(dir, '19__S__12.json'), JSON.stringify({ contents: {} }));

    const units = discoverTranscriptUnits(dir);

    expect(units.map((u) => [u.unitId, u.sessionKey])).toEqual([
      ['19__347.json', '19__347'],
      ['19__S__12.json', '19__S__12'],
    ]);
    expect(units[0].read()).toEqual({ contents: {} });
  });
});
