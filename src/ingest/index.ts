// src/ingest/index.ts
// Public surface of the ingestion core.

export * from "./errors";
export * from "./ids";
export * from "./normalizer";
export * from "./types";
export * from "./speakerResolver";
export * from "./merge";
export * from "./unitState";
export * from "./pipeline";
export * from "./reports";
export { parseProfileRecord, discoverProfileUnits, PROFILE_SOURCE } from "./readers/profileReader";
export {
  parseSessionKey,
  parseTranscriptUnit,
  discoverTranscriptUnits,
  UNKNOWN_SPEAKER_NAME,
} from "./readers/transcriptReader";
