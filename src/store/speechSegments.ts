// src/store/speechSegments.ts
// Speech segments (one intervention by one speaker under one topic)
//
// Tables: speech_segments

import type { DbAdapter } from "../db/types";
import { toNumber } from "./json";

/* ---------- Types ---------- */

export interface SpeechSegment {
  speechId: string;
  sessionId: string;
  topicId: string;
  speakerId: string;
  text: string;
  date: string;
  orderInTopic: number;
  sourceReference: string | null;
  createdAt: string;
}

interface SpeechSegmentRow {
  speech_id: string;
  session_id: string;
  topic_id: string;
  speaker_id: string;
  text: string;
  date: string;
  order_in_topic: number;
  source_reference: string | null;
  created_at: number | string;
}

export interface CreateSpeechSegmentInput {
  speechId: string;
  sessionId: string;
  topicId: string;
  speakerId: string;
  text: string;
  date: string;
  orderInTopic: number;
  sourceReference?: string | null;
}

/** A speech row whose speaker, topic or session row is missing */
export interface OrphanSpeech {
  speechId: string;
  missing: Array<"speaker" | "topic" | "session">;
}

function rowToSpeech(row: SpeechSegmentRow): SpeechSegment {
  return {
    speechId: row.speech_id,
    sessionId: row.session_id,
    topicId: row.topic_id,
    speakerId: row.speaker_id,
    text: row.text,
    date: row.date,
    orderInTopic: toNumber(row.order_in_topic),
    sourceReference: row.source_reference,
    createdAt: new Date(toNumber(row.created_at)).toISOString(),
  };
}

/* ---------- CRUD Operations ---------- */

export async function getSpeechById(db: DbAdapter, speechId: string): Promise<SpeechSegment | null> {
  const row = await db.queryOne<SpeechSegmentRow>(
    `SELECT * FROM speech_segments WHERE speech_id = ?`,
    [speechId]
  );
  return row ? rowToSpeech(row) : null;
}

export async function createSpeech(db: DbAdapter, input: CreateSpeechSegmentInput): Promise<void> {
  await db.run(`
    INSERT INTO speech_segments (
      speech_id, session_id, topic_id, speaker_id, text, date,
      order_in_topic, source_reference, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `, [
    input.speechId,
    input.sessionId,
    input.topicId,
    input.speakerId,
    input.text,
    input.date,
    input.orderInTopic,
    input.sourceReference ?? null,
    Date.now(),
  ]);
}

export async function countSpeeches(db: DbAdapter): Promise<number> {
  const row = await db.queryOne<{ count: number | string }>(
    `SELECT COUNT(*) AS count FROM speech_segments`
  );
  return toNumber(row?.count);
}

/** Speech counts keyed by speaker id, for the given speakers only */
export async function countSpeechesBySpeaker(
  db: DbAdapter,
  speakerIds: string[]
): Promise<Map<string, number>> {
  const counts = new Map<string, number>();
  if (speakerIds.length === 0) return counts;

  const placeholders = speakerIds.map(() => "?").join(", ");
  const rows = await db.queryAll<{ speaker_id: string; count: number | string }>(`
    SELECT speaker_id, COUNT(*) AS count
    FROM speech_segments
    WHERE speaker_id IN (${placeholders})
    GROUP BY speaker_id
  `, speakerIds);

  for (const row of rows) {
    counts.set(row.speaker_id, toNumber(row.count));
  }
  return counts;
}

/** Speech rows whose references do not resolve. Empty on a consistent store. */
export async function findOrphanSpeeches(db: DbAdapter): Promise<OrphanSpeech[]> {
  const rows = await db.queryAll<{
    speech_id: string;
    speaker_missing: number | string;
    topic_missing: number | string;
    session_missing: number | string;
  }>(`
    SELECT s.speech_id,
      CASE WHEN p.person_id IS NULL THEN 1 ELSE 0 END AS speaker_missing,
      CASE WHEN t.topic_id IS NULL THEN 1 ELSE 0 END AS topic_missing,
      CASE WHEN se.session_id IS NULL THEN 1 ELSE 0 END AS session_missing
    FROM speech_segments s
    LEFT JOIN persons p ON p.person_id = s.speaker_id
    LEFT JOIN topics t ON t.topic_id = s.topic_id
    LEFT JOIN sessions se ON se.session_id = s.session_id
    WHERE p.person_id IS NULL OR t.topic_id IS NULL OR se.session_id IS NULL
    ORDER BY s.speech_id ASC
  `);

  return rows.map((row) => {
    const missing: OrphanSpeech["missing"] = [];
    if (toNumber(row.speaker_missing) === 1) missing.push("speaker");
    if (toNumber(row.topic_missing) === 1) missing.push("topic");
    if (toNumber(row.session_missing) === 1) missing.push("session");
    return { speechId: row.speech_id, missing };
  });
}

export const SpeechSegmentsStore = {
  getById: getSpeechById,
  create: createSpeech,
  count: countSpeeches,
  countBySpeaker: countSpeechesBySpeaker,
  findOrphans: findOrphanSpeeches,
};
