// src/ingest/reports.ts
// Post-run reports: placeholder speakers awaiting manual re-linking, and the
// referential integrity check over speech segments.

import type { DbAdapter } from "../db/types";
import { PersonsStore } from "../store/persons";
import { SpeechSegmentsStore, type OrphanSpeech } from "../store/speechSegments";
import { normalizeName } from "./normalizer";

export interface UnmatchedSpeaker {
  personId: string;
  fullName: string;
  normalized: string;
  familyName: string;
  givenName: string;
  speechCount: number;
}

export interface UnmatchedSpeakersReport {
  generatedAt: string;
  totalUnmatched: number;
  unmatchedSpeakers: UnmatchedSpeaker[];
}

/** Every placeholder person, most-quoted first */
export async function buildUnmatchedSpeakersReport(db: DbAdapter): Promise<UnmatchedSpeakersReport> {
  const placeholders = await PersonsStore.listPlaceholders(db);
  const speechCounts = await SpeechSegmentsStore.countBySpeaker(
    db,
    placeholders.map((p) => p.personId)
  );

  const unmatchedSpeakers = placeholders
    .map((person) => ({
      personId: person.personId,
      fullName: person.fullName,
      normalized: normalizeName(person.fullName),
      familyName: person.familyName,
      givenName: person.givenName,
      speechCount: speechCounts.get(person.personId) ?? 0,
    }))
    .sort((a, b) => b.speechCount - a.speechCount || a.personId.localeCompare(b.personId));

  return {
    generatedAt: new Date().toISOString(),
    totalUnmatched: unmatchedSpeakers.length,
    unmatchedSpeakers,
  };
}

export interface IntegrityReport {
  ok: boolean;
  checkedSpeeches: number;
  orphans: OrphanSpeech[];
}

export async function verifyReferentialIntegrity(db: DbAdapter): Promise<IntegrityReport> {
  const orphans = await SpeechSegmentsStore.findOrphans(db);
  return {
    ok: orphans.length === 0,
    checkedSpeeches: await SpeechSegmentsStore.count(db),
    orphans,
  };
}
