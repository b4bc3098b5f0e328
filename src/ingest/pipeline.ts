// src/ingest/pipeline.ts
// Pipeline orchestrator.
//
// Profile units run first so the roster is complete before any transcript
// speaker is resolved; the roster is loaded once, between the two passes.
// Every unit runs in its own transaction. Invalid sub-records are skipped
// and counted; any other failure rolls the unit back and the run moves on.

import { nanoid } from "nanoid";
import type { Chamber } from "../config";
import type { DbAdapter } from "../db/types";
import {
  createChildLogger,
  createLogger,
  type Logger,
} from "../observability/logger";
import {
  recordPlaceholders,
  recordRecords,
  recordUnit,
  recordUnresolvedSpeaker,
} from "../observability/metrics";
import { PersonsStore, type CreatePersonInput } from "../store/persons";
import { isRecordLevelError, UnitProcessingError, type RecordLevelError } from "./errors";
import { profilePersonId, sessionId, speechId, topicId, UNKNOWN_SPEAKER } from "./ids";
import { upsertPerson, upsertSession, upsertSpeech, upsertTopic } from "./merge";
import { parseProfileRecord } from "./readers/profileReader";
import { parseSessionKey, parseTranscriptUnit } from "./readers/transcriptReader";
import { SpeakerResolver } from "./speakerResolver";
import type {
  EntityKind,
  PipelineEvent,
  PipelineEventSink,
  ProfileRawUnit,
  ProfileRecord,
  RawUnit,
  RecordCounts,
  SpeakerUnresolvedEvent,
  TranscriptRawUnit,
  UnitKind,
  UnitOutcome,
  UnitState,
  UpsertOutcome,
} from "./types";
import { transitionUnit } from "./unitState";

/* ---------- Types ---------- */

export interface PipelineOptions {
  db: DbAdapter;
  profileUnits?: readonly ProfileRawUnit[];
  transcriptUnits?: readonly TranscriptRawUnit[];
  logger?: Logger;
  onEvent?: PipelineEventSink;
  /** Chamber for transcript keys that do not name one (default "C") */
  defaultChamber?: Chamber;
  runId?: string;
}

export interface UnitReport {
  unitId: string;
  kind: UnitKind;
  outcome: UnitOutcome;
  counts: RecordCounts;
  placeholdersCreated: number;
  unresolvedSpeakers: number;
  durationMs: number;
  error?: string;
}

export interface PipelineSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  units: UnitReport[];
  totals: {
    units: number;
    committed: number;
    rolledBack: number;
    counts: RecordCounts;
    placeholdersCreated: number;
    unresolvedSpeakers: number;
  };
}

/* ---------- Counting ---------- */

export function emptyCounts(): RecordCounts {
  return { created: 0, updated: 0, skipped: 0, invalid: 0 };
}

function addCounts(target: RecordCounts, source: RecordCounts): void {
  target.created += source.created;
  target.updated += source.updated;
  target.skipped += source.skipped;
  target.invalid += source.invalid;
}

/**
 * What one unit did inside its transaction. Discarded on rollback, so
 * nothing here is reported for writes that did not persist.
 */
class UnitTally {
  readonly byEntity = new Map<EntityKind, RecordCounts>();
  invalid = 0;
  placeholdersCreated = 0;
  readonly unresolved = new Map<string, Omit<SpeakerUnresolvedEvent, "event" | "runId" | "unitId">>();

  constructor(private readonly log: Logger) {}

  write(entity: EntityKind, outcome: UpsertOutcome): void {
    let counts = this.byEntity.get(entity);
    if (!counts) {
      counts = emptyCounts();
      this.byEntity.set(entity, counts);
    }
    counts[outcome.action] += 1;
  }

  skipRecord(err: RecordLevelError): void {
    this.invalid += 1;
    this.log.warn({ path: err.path, reason: err.name }, err.message);
  }

  get counts(): RecordCounts {
    const total = emptyCounts();
    this.byEntity.forEach((counts) => addCounts(total, counts));
    total.invalid = this.invalid;
    return total;
  }
}

/* ---------- Unit Handlers ---------- */

function profileToPerson(record: ProfileRecord): CreatePersonInput {
  return {
    personId: profilePersonId(record.nativeId),
    fullName: record.fullName,
    familyName: record.familyName,
    givenName: record.givenName,
    party: record.party,
    roles: record.roles,
    sourceIds: record.sourceIds,
    birthDate: record.birthDate,
    birthPlace: record.birthPlace,
    imageUrl: record.imageUrl,
    slug: record.slug,
    url: record.url,
    raw: record.raw,
    isPlaceholder: false,
  };
}

async function processProfileUnit(tx: DbAdapter, unit: ProfileRawUnit, tally: UnitTally): Promise<void> {
  const raw = unit.read();

  let record: ProfileRecord;
  try {
    record = parseProfileRecord(raw, unit.unitId);
  } catch (err) {
    if (isRecordLevelError(err)) {
      tally.skipRecord(err);
      return;
    }
    throw err;
  }

  tally.write("person", await upsertPerson(tx, profileToPerson(record)));
}

async function processTranscriptUnit(
  tx: DbAdapter,
  unit: TranscriptRawUnit,
  resolver: SpeakerResolver,
  defaultChamber: Chamber,
  tally: UnitTally
): Promise<void> {
  const key = parseSessionKey(unit.sessionKey, defaultChamber, unit.unitId);
  const transcript = parseTranscriptUnit(unit.read(), key, unit.unitId);

  const sid = sessionId(key.legislature, key.chamber, key.sessionNumber);
  tally.write("session", await upsertSession(tx, {
    sessionId: sid,
    date: transcript.date,
    chamber: key.chamber,
    legislature: key.legislature,
    sessionNumber: key.sessionNumber,
    sourceReference: unit.sourceRef,
  }));

  for (const topic of transcript.topics) {
    if (topic.kind === "invalid") {
      tally.skipRecord(topic.error);
      continue;
    }

    const tid = topicId(sid, topic.sourceKey);
    tally.write("topic", await upsertTopic(tx, {
      topicId: tid,
      sessionId: sid,
      title: topic.title,
      ordinal: topic.ordinal,
    }));

    for (const intervention of topic.interventions) {
      if (intervention.kind === "invalid") {
        tally.skipRecord(intervention.error);
        continue;
      }

      const resolution = resolver.resolve(intervention.speaker);

      // Placeholder person goes in before the speech that points at it
      if (resolution.kind === "placeholder") {
        const outcome = await upsertPerson(tx, resolution.placeholder);
        tally.write("person", outcome);
        if (outcome.action === "created") tally.placeholdersCreated += 1;

        if (!tally.unresolved.has(resolution.normalizedName)) {
          tally.unresolved.set(resolution.normalizedName, {
            rawName: intervention.speaker,
            normalizedName: resolution.normalizedName,
            placeholderId: resolution.personId,
            reason: resolution.reason,
            candidates: resolution.ambiguity?.candidateIds ?? [],
          });
        }
      }

      tally.write("speech", await upsertSpeech(tx, {
        speechId: speechId(tid, intervention.ordinal, resolution.normalizedName || UNKNOWN_SPEAKER),
        sessionId: sid,
        topicId: tid,
        speakerId: resolution.personId,
        text: intervention.text,
        date: transcript.date,
        orderInTopic: intervention.ordinal,
        sourceReference: unit.sourceRef,
      }));
    }
  }
}

/* ---------- Orchestrator ---------- */

/**
 * Run every profile unit, then every transcript unit.
 * Never throws for a unit failure; those show up as rolled_back in the summary.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineSummary> {
  const { db } = options;
  const runId = options.runId ?? nanoid(12);
  const defaultChamber: Chamber = options.defaultChamber ?? "C";
  const log = createChildLogger(options.logger ?? createLogger("ingest/pipeline"), { runId });
  const profileUnits = options.profileUnits ?? [];
  const transcriptUnits = options.transcriptUnits ?? [];

  const started = Date.now();
  const reports: UnitReport[] = [];

  const emit = (event: PipelineEvent): void => {
    if (!options.onEvent) return;
    const sinkFailed = (err: unknown): void => {
      log.error({ err, event: event.event }, "Event sink failed");
    };
    try {
      const result: unknown = options.onEvent(event);
      if (result instanceof Promise) result.catch(sinkFailed);
    } catch (err) {
      sinkFailed(err);
    }
  };

  const runUnit = async (
    unit: RawUnit,
    handler: (tx: DbAdapter, tally: UnitTally) => Promise<void>
  ): Promise<void> => {
    const unitLog = createChildLogger(log, { unitId: unit.unitId, kind: unit.kind });
    const unitStarted = Date.now();
    let state: UnitState = "pending";
    let tally = new UnitTally(unitLog);
    let error: UnitProcessingError | null = null;

    state = transitionUnit(state, "processing");
    try {
      await db.transaction((tx) => handler(tx, tally));
      state = transitionUnit(state, "committed");
    } catch (err) {
      error = err instanceof UnitProcessingError ? err : new UnitProcessingError(unit.unitId, err);
      state = transitionUnit(state, "rolled_back");
      tally = new UnitTally(unitLog);
      unitLog.error({ err: error.cause ?? error, source: unit.sourceRef }, "Unit rolled back");
    }

    const outcome: UnitOutcome = state === "committed" ? "committed" : "rolled_back";
    const durationMs = Date.now() - unitStarted;
    const counts = tally.counts;

    recordUnit(unit.kind, outcome, durationMs);
    tally.byEntity.forEach((entityCounts, entity) => {
      recordRecords(entity, "created", entityCounts.created);
      recordRecords(entity, "updated", entityCounts.updated);
      recordRecords(entity, "skipped", entityCounts.skipped);
    });
    recordRecords(unit.kind, "invalid", tally.invalid);
    recordPlaceholders(tally.placeholdersCreated);

    if (outcome === "committed") {
      unitLog.info({ counts, placeholdersCreated: tally.placeholdersCreated, durationMs }, "Unit committed");
    }

    for (const unresolved of tally.unresolved.values()) {
      recordUnresolvedSpeaker(unresolved.reason);
      unitLog.info(
        { speaker: unresolved.rawName, placeholderId: unresolved.placeholderId, reason: unresolved.reason },
        "Speaker unresolved"
      );
      emit({ event: "speaker.unresolved", runId, unitId: unit.unitId, ...unresolved });
    }

    const report: UnitReport = {
      unitId: unit.unitId,
      kind: unit.kind,
      outcome,
      counts,
      placeholdersCreated: tally.placeholdersCreated,
      unresolvedSpeakers: tally.unresolved.size,
      durationMs,
      ...(error ? { error: error.message } : {}),
    };
    reports.push(report);

    emit({
      event: "unit.completed",
      runId,
      unitId: unit.unitId,
      kind: unit.kind,
      outcome,
      counts,
      placeholdersCreated: report.placeholdersCreated,
      durationMs,
      ...(error ? { error: error.message } : {}),
    });
  };

  log.info({ profiles: profileUnits.length, transcripts: transcriptUnits.length }, "Pipeline run started");

  for (const unit of profileUnits) {
    await runUnit(unit, (tx, tally) => processProfileUnit(tx, unit, tally));
  }

  if (transcriptUnits.length > 0) {
    let resolver: SpeakerResolver | null = null;
    let rosterError: unknown = null;
    try {
      resolver = new SpeakerResolver(await PersonsStore.listRoster(db));
      log.info({ rosterSize: resolver.size }, "Speaker roster loaded");
    } catch (err) {
      rosterError = err;
      log.error({ err, transcripts: transcriptUnits.length }, "Speaker roster failed to load");
    }

    for (const unit of transcriptUnits) {
      await runUnit(unit, async (tx, tally) => {
        // Without a roster every speaker would become a placeholder
        if (!resolver) throw new UnitProcessingError(unit.unitId, rosterError);
        await processTranscriptUnit(tx, unit, resolver, defaultChamber, tally);
      });
    }
  }

  const finished = Date.now();
  const totals = {
    units: reports.length,
    committed: reports.filter((r) => r.outcome === "committed").length,
    rolledBack: reports.filter((r) => r.outcome === "rolled_back").length,
    counts: emptyCounts(),
    placeholdersCreated: 0,
    unresolvedSpeakers: 0,
  };
  for (const report of reports) {
    addCounts(totals.counts, report.counts);
    totals.placeholdersCreated += report.placeholdersCreated;
    totals.unresolvedSpeakers += report.unresolvedSpeakers;
  }

  log.info({ ...totals, durationMs: finished - started }, "Pipeline run finished");

  return {
    runId,
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
    durationMs: finished - started,
    units: reports,
    totals,
  };
}
