// src/store/sessions.ts
// Parliamentary sessions, one row per (legislature, chamber, session number)
//
// Tables: sessions

import type { DbAdapter } from "../db/types";
import type { Chamber } from "../config";
import { toNumber } from "./json";

/* ---------- Types ---------- */

export interface Session {
  sessionId: string;
  date: string; // ISO date or UNKNOWN_DATE
  chamber: Chamber;
  legislature: number;
  sessionNumber: number;
  sourceReference: string | null;
  createdAt: string;
}

interface SessionRow {
  session_id: string;
  date: string;
  chamber: Chamber;
  legislature: number;
  session_number: number;
  source_reference: string | null;
  created_at: number | string;
}

export interface CreateSessionInput {
  sessionId: string;
  date: string;
  chamber: Chamber;
  legislature: number;
  sessionNumber: number;
  sourceReference?: string | null;
}

function rowToSession(row: SessionRow): Session {
  return {
    sessionId: row.session_id,
    date: row.date,
    chamber: row.chamber,
    legislature: toNumber(row.legislature),
    sessionNumber: toNumber(row.session_number),
    sourceReference: row.source_reference,
    createdAt: new Date(toNumber(row.created_at)).toISOString(),
  };
}

/* ---------- CRUD Operations ---------- */

export async function getSessionById(db: DbAdapter, sessionId: string): Promise<Session | null> {
  const row = await db.queryOne<SessionRow>(
    `SELECT * FROM sessions WHERE session_id = ?`,
    [sessionId]
  );
  return row ? rowToSession(row) : null;
}

export async function createSession(db: DbAdapter, input: CreateSessionInput): Promise<void> {
  await db.run(`
    INSERT INTO sessions (
      session_id, date, chamber, legislature, session_number, source_reference, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?)
  `, [
    input.sessionId,
    input.date,
    input.chamber,
    input.legislature,
    input.sessionNumber,
    input.sourceReference ?? null,
    Date.now(),
  ]);
}

export async function countSessions(db: DbAdapter): Promise<number> {
  const row = await db.queryOne<{ count: number | string }>(
    `SELECT COUNT(*) AS count FROM sessions`
  );
  return toNumber(row?.count);
}

export const SessionsStore = {
  getById: getSessionById,
  create: createSession,
  count: countSessions,
};
