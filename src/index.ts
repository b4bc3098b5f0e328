// src/index.ts
// Package entry: configuration, database adapters, stores and the ingestion core.

export { config, isChamber, CHAMBERS, type Chamber, type DatabaseDriver } from "./config";
export * from "./db";
export * from "./ingest";
export { PersonsStore } from "./store/persons";
export type { Person, PersonRole, RosterEntry, SourceIds } from "./store/persons";
export { SessionsStore } from "./store/sessions";
export type { Session } from "./store/sessions";
export { TopicsStore } from "./store/topics";
export type { Topic } from "./store/topics";
export { SpeechSegmentsStore } from "./store/speechSegments";
export type { SpeechSegment, OrphanSpeech } from "./store/speechSegments";
export { createLogger, renderMetrics } from "./observability";
