// src/ingest/types.ts
// Record shapes flowing from the source readers through the merge engine,
// plus the unit and event types the orchestrator reports.

import type { Chamber } from "../config";
import type { PersonRole, SourceIds } from "../store/persons";
import type { MalformedRecordError, EmptyContentError } from "./errors";

/* ---------- Raw Units ---------- */

export type UnitKind = "profile" | "transcript";

interface RawUnitBase {
  /** Stable identifier for logs and events (usually the file name) */
  unitId: string;
  /** Where the unit came from, stored as source_reference */
  sourceRef: string;
  /** Load the unit's raw JSON. May throw (I/O, JSON syntax). */
  read(): unknown;
}

export interface ProfileRawUnit extends RawUnitBase {
  kind: "profile";
}

export interface TranscriptRawUnit extends RawUnitBase {
  kind: "transcript";
  /** Session key supplied by the collaborator, e.g. the file stem "19__347" */
  sessionKey: string;
}

export type RawUnit = ProfileRawUnit | TranscriptRawUnit;

/* ---------- Profile Records ---------- */

export interface ProfileRecord {
  kind: "profile";
  nativeId: string;
  familyName: string;
  givenName: string;
  fullName: string;
  party: string | null;
  roles: PersonRole[];
  sourceIds: SourceIds;
  url: string | null;
  slug: string | null;
  birthDate: string | null;
  birthPlace: string | null;
  imageUrl: string | null;
  raw: Record<string, unknown>;
}

/* ---------- Transcript Records ---------- */

export interface SessionKey {
  legislature: number;
  chamber: Chamber;
  sessionNumber: number;
}

export interface InterventionRecord {
  kind: "intervention";
  ordinal: number;
  speaker: string;
  text: string;
}

export interface InvalidRecord {
  kind: "invalid";
  ordinal: number;
  error: MalformedRecordError | EmptyContentError;
}

export interface TopicRecord {
  kind: "topic";
  ordinal: number;
  /** The topic's key exactly as it appears in the transcript */
  sourceKey: string;
  title: string;
  interventions: Array<InterventionRecord | InvalidRecord>;
}

export interface TranscriptUnit {
  kind: "transcript";
  session: SessionKey;
  date: string;
  topics: Array<TopicRecord | InvalidRecord>;
}

/* ---------- Upsert Outcomes ---------- */

export type UpsertAction = "created" | "updated" | "skipped";

export interface UpsertOutcome {
  id: string;
  action: UpsertAction;
}

export type EntityKind = "person" | "session" | "topic" | "speech";

export interface RecordCounts {
  created: number;
  updated: number;
  skipped: number;
  invalid: number;
}

/* ---------- Unit State Machine ---------- */

export type UnitState = "pending" | "processing" | "committed" | "rolled_back";
export type UnitOutcome = "committed" | "rolled_back";

/* ---------- Events ---------- */

export interface UnitCompletedEvent {
  event: "unit.completed";
  runId: string;
  unitId: string;
  kind: UnitKind;
  outcome: UnitOutcome;
  counts: RecordCounts;
  placeholdersCreated: number;
  durationMs: number;
  error?: string;
}

export type UnresolvedReason = "no_match" | "ambiguous_surname";

export interface SpeakerUnresolvedEvent {
  event: "speaker.unresolved";
  runId: string;
  unitId: string;
  rawName: string;
  normalizedName: string;
  placeholderId: string;
  reason: UnresolvedReason;
  candidates: string[];
}

export type PipelineEvent = UnitCompletedEvent | SpeakerUnresolvedEvent;

/** A rejected promise from the sink is logged like a throw */
export type PipelineEventSink = (event: PipelineEvent) => void | Promise<void>;
