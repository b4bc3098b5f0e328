// src/ingest/merge.ts
// Create / update / skip decisions per entity kind.
//
// Persons accrete metadata across fetches: party, source ids and the raw
// payload are refreshed on every pass, names only fill gaps, roles are
// fixed at creation. Sessions, topics and speeches come from published
// transcripts and are written once; a rerun skips them.

import type { DbAdapter } from "../db/types";
import {
  PersonsStore,
  type CreatePersonInput,
  type Person,
  type UpdatePersonInput,
} from "../store/persons";
import { SessionsStore, type CreateSessionInput } from "../store/sessions";
import { TopicsStore, type CreateTopicInput } from "../store/topics";
import { SpeechSegmentsStore, type CreateSpeechSegmentInput } from "../store/speechSegments";
import { ReferentialIntegrityError } from "./errors";
import type { UpsertOutcome } from "./types";

/* ---------- Persons ---------- */

function sameJson(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/** Columns that would change if `candidate` were merged into `existing` */
export function personChanges(existing: Person, candidate: CreatePersonInput): UpdatePersonInput {
  const changes: UpdatePersonInput = {};

  if (!existing.fullName && candidate.fullName) changes.fullName = candidate.fullName;
  if (!existing.familyName && candidate.familyName) changes.familyName = candidate.familyName;
  if (!existing.givenName && candidate.givenName) changes.givenName = candidate.givenName;

  if (candidate.party !== undefined && candidate.party !== existing.party) {
    changes.party = candidate.party;
  }

  if (candidate.sourceIds !== undefined) {
    const merged = { ...existing.sourceIds, ...candidate.sourceIds };
    if (!sameJson(merged, existing.sourceIds)) changes.sourceIds = merged;
  }

  if (candidate.raw !== undefined && !sameJson(candidate.raw, existing.raw)) {
    changes.raw = candidate.raw;
  }

  return changes;
}

export async function upsertPerson(db: DbAdapter, candidate: CreatePersonInput): Promise<UpsertOutcome> {
  const existing = await PersonsStore.getById(db, candidate.personId);
  if (!existing) {
    await PersonsStore.create(db, candidate);
    return { id: candidate.personId, action: "created" };
  }

  const changes = personChanges(existing, candidate);
  if (Object.keys(changes).length === 0) {
    return { id: candidate.personId, action: "skipped" };
  }

  await PersonsStore.update(db, candidate.personId, changes);
  return { id: candidate.personId, action: "updated" };
}

/* ---------- Transcript Entities ---------- */

export async function upsertSession(db: DbAdapter, candidate: CreateSessionInput): Promise<UpsertOutcome> {
  if (await SessionsStore.getById(db, candidate.sessionId)) {
    return { id: candidate.sessionId, action: "skipped" };
  }
  await SessionsStore.create(db, candidate);
  return { id: candidate.sessionId, action: "created" };
}

export async function upsertTopic(db: DbAdapter, candidate: CreateTopicInput): Promise<UpsertOutcome> {
  if (await TopicsStore.getById(db, candidate.topicId)) {
    return { id: candidate.topicId, action: "skipped" };
  }
  if (!(await SessionsStore.getById(db, candidate.sessionId))) {
    throw new ReferentialIntegrityError("topic", candidate.topicId, `session ${candidate.sessionId}`);
  }
  await TopicsStore.create(db, candidate);
  return { id: candidate.topicId, action: "created" };
}

/**
 * Write a speech once its session, topic and speaker exist.
 * Placeholder speakers must be upserted before calling this.
 */
export async function upsertSpeech(
  db: DbAdapter,
  candidate: CreateSpeechSegmentInput
): Promise<UpsertOutcome> {
  if (await SpeechSegmentsStore.getById(db, candidate.speechId)) {
    return { id: candidate.speechId, action: "skipped" };
  }

  if (!(await SessionsStore.getById(db, candidate.sessionId))) {
    throw new ReferentialIntegrityError("speech", candidate.speechId, `session ${candidate.sessionId}`);
  }
  if (!(await TopicsStore.getById(db, candidate.topicId))) {
    throw new ReferentialIntegrityError("speech", candidate.speechId, `topic ${candidate.topicId}`);
  }
  if (!(await PersonsStore.getById(db, candidate.speakerId))) {
    throw new ReferentialIntegrityError("speech", candidate.speechId, `person ${candidate.speakerId}`);
  }

  await SpeechSegmentsStore.create(db, candidate);
  return { id: candidate.speechId, action: "created" };
}
