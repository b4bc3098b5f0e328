// src/ingest/normalizer.ts
// Source-independent text canonicalization. Pure and total: nothing here throws.

/** Honorific and role tokens stripped from speaker names (whole tokens only) */
export const TITLE_TOKENS: ReadonlySet<string> = new Set([
  "PRESIDENT",
  "PRESIDENTE",
  "HONORABLE",
  "ON",
  "ONOREVOLE",
  "SENATOR",
  "SENATORE",
  "SENATRICE",
  "DEPUTY",
  "DEPUTATO",
  "DEPUTATA",
  "MINISTER",
  "MINISTRO",
  "MINISTRA",
]);

/** Stored in place of a session/speech date that is missing or unparseable */
export const UNKNOWN_DATE = "unknown";

/**
 * Canonical form of a person name for matching.
 *
 * Uppercases, deletes every character that is not a letter, digit or
 * whitespace, drops title tokens, and collapses whitespace. Titles are
 * matched after punctuation is gone so "On." and "Presidente," are caught.
 * Idempotent.
 */
export function normalizeName(raw: unknown): string {
  if (typeof raw !== "string") return "";

  const tokens = raw
    .normalize("NFC")
    .toUpperCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    // Stripping can leave composable code points side by side
    .normalize("NFC")
    .split(/\s+/)
    .filter((token) => token.length > 0 && !TITLE_TOKENS.has(token));

  return tokens.join(" ");
}

/** Split a normalized name into tokens */
export function nameTokens(normalized: string): string[] {
  return normalized.split(" ").filter((t) => t.length > 0);
}

/** Speech body: trimmed, all-whitespace becomes empty */
export function normalizeText(raw: unknown): string {
  if (typeof raw !== "string") return "";
  return raw.trim();
}

/** Topic titles: trimmed with inner whitespace collapsed */
export function normalizeTitle(raw: unknown): string {
  if (typeof raw !== "string") return "";
  return raw.replace(/\s+/g, " ").trim();
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Parse a calendar date to YYYY-MM-DD.
 * Accepts ISO dates (with or without a time part) and the compact YYYYMMDD
 * form used in transcript headers. Anything else yields UNKNOWN_DATE.
 */
export function parseDate(raw: unknown): string {
  if (typeof raw !== "string") return UNKNOWN_DATE;
  const value = raw.trim();
  const match = ISO_DATE.exec(value) ?? COMPACT_DATE.exec(value);
  if (!match) return UNKNOWN_DATE;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Reject rollovers like 2024-02-31
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return UNKNOWN_DATE;
  }

  return `${match[1]}-${match[2]}-${match[3]}`;
}
