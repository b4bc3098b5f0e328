// src/store/topics.ts
// Debate topics within a session
//
// Tables: topics

import type { DbAdapter } from "../db/types";
import { toNumber } from "./json";

/* ---------- Types ---------- */

export interface Topic {
  topicId: string;
  sessionId: string;
  title: string;
  ordinal: number;
  createdAt: string;
}

interface TopicRow {
  topic_id: string;
  session_id: string;
  title: string;
  ordinal: number;
  created_at: number | string;
}

export interface CreateTopicInput {
  topicId: string;
  sessionId: string;
  title: string;
  ordinal: number;
}

function rowToTopic(row: TopicRow): Topic {
  return {
    topicId: row.topic_id,
    sessionId: row.session_id,
    title: row.title,
    ordinal: toNumber(row.ordinal),
    createdAt: new Date(toNumber(row.created_at)).toISOString(),
  };
}

/* ---------- CRUD Operations ---------- */

export async function getTopicById(db: DbAdapter, topicId: string): Promise<Topic | null> {
  const row = await db.queryOne<TopicRow>(
    `SELECT * FROM topics WHERE topic_id = ?`,
    [topicId]
  );
  return row ? rowToTopic(row) : null;
}

export async function createTopic(db: DbAdapter, input: CreateTopicInput): Promise<void> {
  await db.run(`
    INSERT INTO topics (topic_id, session_id, title, ordinal, created_at)
    VALUES (?, ?, ?, ?, ?)
  `, [input.topicId, input.sessionId, input.title, input.ordinal, Date.now()]);
}

/** Topics of a session in document order */
export async function listTopicsBySession(db: DbAdapter, sessionId: string): Promise<Topic[]> {
  const rows = await db.queryAll<TopicRow>(
    `SELECT * FROM topics WHERE session_id = ? ORDER BY ordinal ASC`,
    [sessionId]
  );
  return rows.map(rowToTopic);
}

export async function countTopics(db: DbAdapter): Promise<number> {
  const row = await db.queryOne<{ count: number | string }>(
    `SELECT COUNT(*) AS count FROM topics`
  );
  return toNumber(row?.count);
}

export const TopicsStore = {
  getById: getTopicById,
  create: createTopic,
  listBySession: listTopicsBySession,
  count: countTopics,
};
