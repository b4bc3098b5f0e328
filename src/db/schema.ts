// src/db/schema.ts
// Canonical tables. The same DDL runs on SQLite and PostgreSQL: ids are TEXT,
// JSON columns are stored as TEXT, timestamps as epoch milliseconds.

import type { DbAdapter } from "./types";

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS persons (
  person_id TEXT PRIMARY KEY,
  full_name TEXT NOT NULL DEFAULT '',
  family_name TEXT NOT NULL DEFAULT '',
  given_name TEXT NOT NULL DEFAULT '',
  party TEXT,
  roles_json TEXT NOT NULL DEFAULT '[]',
  source_ids_json TEXT NOT NULL DEFAULT '{}',
  birth_date TEXT,
  birth_place TEXT,
  image_url TEXT,
  slug TEXT,
  url TEXT,
  raw_json TEXT,
  is_placeholder INTEGER NOT NULL DEFAULT 0,
  created_at BIGINT NOT NULL,
  updated_at BIGINT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_persons_family_name ON persons (family_name);
CREATE INDEX IF NOT EXISTS idx_persons_placeholder ON persons (is_placeholder);

CREATE TABLE IF NOT EXISTS sessions (
  session_id TEXT PRIMARY KEY,
  date TEXT NOT NULL,
  chamber TEXT NOT NULL CHECK (chamber IN ('C', 'S')),
  legislature INTEGER NOT NULL,
  session_number INTEGER NOT NULL,
  source_reference TEXT,
  created_at BIGINT NOT NULL,
  UNIQUE (legislature, chamber, session_number)
);

CREATE TABLE IF NOT EXISTS topics (
  topic_id TEXT PRIMARY KEY,
  session_id TEXT NOT NULL REFERENCES sessions (session_id),
  title TEXT NOT NULL,
  ordinal INTEGER NOT NULL,
  created_at BIGINT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_topics_session ON topics (session_id);

CREATE TABLE IF NOT EXISTS speech_segments (
  speech_id TEXT PRIMARY KEY,
  session_id TEXT NOT NULL REFERENCES sessions (session_id),
  topic_id TEXT NOT NULL REFERENCES topics (topic_id),
  speaker_id TEXT NOT NULL REFERENCES persons (person_id),
  text TEXT NOT NULL,
  date TEXT NOT NULL,
  order_in_topic INTEGER NOT NULL,
  source_reference TEXT,
  created_at BIGINT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_speech_session ON speech_segments (session_id);
CREATE INDEX IF NOT EXISTS idx_speech_topic ON speech_segments (topic_id);
CREATE INDEX IF NOT EXISTS idx_speech_speaker ON speech_segments (speaker_id);
`;

/** Create the canonical tables if they are missing. Safe to call on every start. */
export async function initSchema(db: DbAdapter): Promise<void> {
  await db.exec(SCHEMA_SQL);
}
