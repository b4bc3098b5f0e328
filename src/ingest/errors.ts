// src/ingest/errors.ts
// Error taxonomy for the ingestion pipeline.
//
// Record-level errors (MalformedRecordError, EmptyContentError) skip one
// sub-record and the unit carries on. Anything else raised inside a unit is
// wrapped in UnitProcessingError and rolls the whole unit back.

export interface RecordLocation {
  unitId: string;
  /** Position inside the unit, e.g. `topics["Interrogazioni"][2]` */
  path: string;
}

/** A sub-record has the wrong shape or lacks a required field */
export class MalformedRecordError extends Error {
  readonly unitId: string;
  readonly path: string;

  constructor(message: string, location: RecordLocation) {
    super(`${message} (${location.unitId} at ${location.path})`);
    this.name = "MalformedRecordError";
    this.unitId = location.unitId;
    this.path = location.path;
  }
}

/** Normalized text or title is empty */
export class EmptyContentError extends Error {
  readonly unitId: string;
  readonly path: string;

  constructor(message: string, location: RecordLocation) {
    super(`${message} (${location.unitId} at ${location.path})`);
    this.name = "EmptyContentError";
    this.unitId = location.unitId;
    this.path = location.path;
  }
}

/**
 * Surname-only fallback found more than one person.
 * Never thrown out of the resolver: it rides on the placeholder resolution.
 */
export class AmbiguousMatchError extends Error {
  readonly surname: string;
  readonly candidateIds: string[];

  constructor(surname: string, candidateIds: string[]) {
    super(`Surname "${surname}" matches ${candidateIds.length} persons: ${candidateIds.join(", ")}`);
    this.name = "AmbiguousMatchError";
    this.surname = surname;
    this.candidateIds = candidateIds;
  }
}

/** A parent row required by a write is absent */
export class ReferentialIntegrityError extends Error {
  readonly entity: string;
  readonly entityId: string;
  readonly missing: string;

  constructor(entity: string, entityId: string, missing: string) {
    super(`Cannot write ${entity} ${entityId}: ${missing} does not exist`);
    this.name = "ReferentialIntegrityError";
    this.entity = entity;
    this.entityId = entityId;
    this.missing = missing;
  }
}

/** Any unclassified failure while processing a unit; the unit is rolled back */
export class UnitProcessingError extends Error {
  readonly unitId: string;

  constructor(unitId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Unit ${unitId} failed: ${detail}`, { cause });
    this.name = "UnitProcessingError";
    this.unitId = unitId;
  }
}

export type RecordLevelError = MalformedRecordError | EmptyContentError;

export function isRecordLevelError(err: unknown): err is RecordLevelError {
  return err instanceof MalformedRecordError || err instanceof EmptyContentError;
}
