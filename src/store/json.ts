// src/store/json.ts
// Shared column helpers for the store modules.

/** Safely parse a JSON column with fallback */
export function parseJson<T>(json: string | null, fallback: T): T {
  if (!json) return fallback;
  try {
    return JSON.parse(json) as T;
  } catch {
    return fallback;
  }
}

/** pg returns BIGINT and COUNT(*) as strings; SQLite returns numbers. */
export function toNumber(value: number | string | bigint | null | undefined): number {
  if (value == null) return 0;
  return Number(value);
}
