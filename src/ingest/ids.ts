// src/ingest/ids.ts
// Deterministic identity scheme. Reruns over the same input reproduce the
// same ids, which is what makes skip-on-exists idempotent.
//
//   profile person      op_<native id>
//   placeholder person  unknown_<sha256(normalized name)[0..16]>
//   session             session_<legislature>_<chamber>_<number>
//   topic               <session_id>_topic_<sha256(title)[0..12]>
//   speech              <topic_id>_speech_<sha256(topic_id|ordinal|speaker)[0..16]>

import { createHash } from "node:crypto";
import type { Chamber } from "../config";

export const PROFILE_ID_PREFIX = "op_";
export const PLACEHOLDER_ID_PREFIX = "unknown_";

/** Normalized name used when a speaker string normalizes to nothing */
export const UNKNOWN_SPEAKER = "UNKNOWN";

function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

export function profilePersonId(nativeId: string): string {
  return `${PROFILE_ID_PREFIX}${nativeId}`;
}

export function placeholderPersonId(normalizedName: string): string {
  const key = normalizedName || UNKNOWN_SPEAKER;
  return `${PLACEHOLDER_ID_PREFIX}${sha256Hex(key).slice(0, 16)}`;
}

export function isPlaceholderId(personId: string): boolean {
  return personId.startsWith(PLACEHOLDER_ID_PREFIX);
}

export function sessionId(legislature: number, chamber: Chamber, sessionNumber: number): string {
  return `session_${legislature}_${chamber}_${sessionNumber}`;
}

/**
 * Hashes the topic key as written in the transcript. Keys that differ only in
 * whitespace are distinct topics and keep distinct ids.
 */
export function topicId(sessionIdValue: string, topicKey: string): string {
  return `${sessionIdValue}_topic_${sha256Hex(topicKey).slice(0, 12)}`;
}

/**
 * The speaker part is the normalized raw speaker string, not the resolved
 * person id, so a roster that grows between runs does not change speech ids.
 */
export function speechId(topicIdValue: string, ordinal: number, normalizedSpeaker: string): string {
  const digest = sha256Hex(`${topicIdValue}|${ordinal}|${normalizedSpeaker}`).slice(0, 16);
  return `${topicIdValue}_speech_${digest}`;
}
