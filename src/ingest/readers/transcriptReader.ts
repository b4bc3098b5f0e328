// src/ingest/readers/transcriptReader.ts
// Nested session → topic → intervention reader for transcript files.
//
// Session identity comes from the file name (`19__347.json`, or
// `19__S__12.json` with an explicit chamber), never from the body.
// The body is what the transcript fetcher writes:
//   { "date": "2024-06-12", "contents": { "<topic title>": [ { "speaker", "text" }, ... ] } }
// A bare title → interventions mapping is accepted too.
//
// Bad topics and interventions come back as `invalid` records so the
// orchestrator can skip them one by one.

import path from "node:path";
import { isChamber, type Chamber } from "../../config";
import { EmptyContentError, MalformedRecordError } from "../errors";
import { normalizeText, normalizeTitle, parseDate, UNKNOWN_DATE } from "../normalizer";
import type {
  InterventionRecord,
  InvalidRecord,
  SessionKey,
  TopicRecord,
  TranscriptRawUnit,
  TranscriptUnit,
} from "../types";
import { isRecord, listJsonFiles, optString, readJsonFile } from "./files";

/** Speaker name used when an intervention has none */
export const UNKNOWN_SPEAKER_NAME = "Unknown";

const NUMERIC = /^\d+$/;

/* ---------- Session Key ---------- */

/**
 * Parse `<legislature>__<session>` or `<legislature>__<chamber>__<session>`.
 * Throws MalformedRecordError for anything else.
 */
export function parseSessionKey(key: string, defaultChamber: Chamber, unitId = key): SessionKey {
  const parts = key.split("__");
  let legislature: string | undefined;
  let chamber: string = defaultChamber;
  let sessionNumber: string | undefined;

  if (parts.length === 2) {
    [legislature, sessionNumber] = parts;
  } else if (parts.length === 3) {
    [legislature, chamber, sessionNumber] = parts;
    chamber = chamber.toUpperCase();
  }

  if (!legislature || !sessionNumber || !NUMERIC.test(legislature) || !NUMERIC.test(sessionNumber)) {
    throw new MalformedRecordError(`Unrecognized session key "${key}"`, { unitId, path: "$name" });
  }
  if (!isChamber(chamber)) {
    throw new MalformedRecordError(`Unknown chamber "${chamber}" in session key "${key}"`, {
      unitId,
      path: "$name",
    });
  }

  return {
    legislature: Number(legislature),
    chamber,
    sessionNumber: Number(sessionNumber),
  };
}

/* ---------- Interventions & Topics ---------- */

function parseIntervention(
  value: unknown,
  ordinal: number,
  unitId: string,
  recordPath: string
): InterventionRecord | InvalidRecord {
  const location = { unitId, path: recordPath };

  if (!isRecord(value)) {
    return {
      kind: "invalid",
      ordinal,
      error: new MalformedRecordError("Intervention is not an object", location),
    };
  }
  if (typeof value.text !== "string") {
    return {
      kind: "invalid",
      ordinal,
      error: new MalformedRecordError("Intervention has no text", location),
    };
  }
  if (value.speaker !== undefined && value.speaker !== null &&
      typeof value.speaker !== "string" && typeof value.speaker !== "number") {
    return {
      kind: "invalid",
      ordinal,
      error: new MalformedRecordError("Intervention speaker is not text", location),
    };
  }

  const text = normalizeText(value.text);
  if (!text) {
    return {
      kind: "invalid",
      ordinal,
      error: new EmptyContentError("Intervention text is empty", location),
    };
  }

  return {
    kind: "intervention",
    ordinal,
    speaker: optString(value.speaker) ?? UNKNOWN_SPEAKER_NAME,
    text,
  };
}

function parseTopic(
  rawTitle: string,
  value: unknown,
  ordinal: number,
  unitId: string
): TopicRecord | InvalidRecord {
  const topicPath = `topics[${JSON.stringify(rawTitle)}]`;
  const location = { unitId, path: topicPath };

  if (!Array.isArray(value)) {
    return {
      kind: "invalid",
      ordinal,
      error: new MalformedRecordError("Topic interventions are not a list", location),
    };
  }

  const title = normalizeTitle(rawTitle);
  if (!title) {
    return { kind: "invalid", ordinal, error: new EmptyContentError("Topic title is empty", location) };
  }
  if (value.length === 0) {
    return { kind: "invalid", ordinal, error: new EmptyContentError("Topic has no interventions", location) };
  }

  return {
    kind: "topic",
    ordinal,
    sourceKey: rawTitle,
    title,
    interventions: value.map((item, idx) =>
      parseIntervention(item, idx, unitId, `${topicPath}[${idx}]`)
    ),
  };
}

/* ---------- Unit ---------- */

/**
 * Validate a transcript body into a TranscriptUnit.
 * Throws MalformedRecordError only when the body as a whole is unusable.
 */
export function parseTranscriptUnit(raw: unknown, session: SessionKey, unitId: string): TranscriptUnit {
  if (!isRecord(raw)) {
    throw new MalformedRecordError("Transcript is not a JSON object", { unitId, path: "$" });
  }

  let contents: Record<string, unknown>;
  let date = UNKNOWN_DATE;

  if ("contents" in raw) {
    if (!isRecord(raw.contents)) {
      throw new MalformedRecordError("Transcript contents is not an object", { unitId, path: "$.contents" });
    }
    contents = raw.contents;
    date = parseDate(raw.date);
  } else {
    contents = raw;
  }

  const topics = Object.entries(contents).map(([title, value], ordinal) =>
    parseTopic(title, value, ordinal, unitId)
  );

  return { kind: "transcript", session, date, topics };
}

/* ---------- Discovery ---------- */

/** One unit per transcript file in `dir`; the file stem is the session key */
export function discoverTranscriptUnits(dir: string): TranscriptRawUnit[] {
  return listJsonFiles(dir).map((filePath) => ({
    kind: "transcript",
    unitId: path.basename(filePath),
    sourceRef: filePath,
    sessionKey: path.basename(filePath, path.extname(filePath)),
    read: () => readJsonFile(filePath),
  }));
}
