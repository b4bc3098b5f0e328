// src/store/persons.ts
// Canonical persons: profile-sourced politicians and placeholder speakers
//
// Tables: persons

import type { DbAdapter } from "../db/types";
import { parseJson, toNumber } from "./json";

/* ---------- Types ---------- */

export interface PersonRole {
  role: string;
  startDate: string | null;
  endDate: string | null;
  party: string | null;
}

export type SourceIds = Record<string, string | null>;

// Domain type (camelCase)
export interface Person {
  personId: string;
  fullName: string;
  familyName: string;
  givenName: string;
  party: string | null;
  roles: PersonRole[];
  sourceIds: SourceIds;
  birthDate: string | null;
  birthPlace: string | null;
  imageUrl: string | null;
  slug: string | null;
  url: string | null;
  raw: Record<string, unknown> | null;
  isPlaceholder: boolean;
  createdAt: string; // ISO string
  updatedAt: string; // ISO string
}

// Row type (snake_case, matches DB)
interface PersonRow {
  person_id: string;
  full_name: string;
  family_name: string;
  given_name: string;
  party: string | null;
  roles_json: string;
  source_ids_json: string;
  birth_date: string | null;
  birth_place: string | null;
  image_url: string | null;
  slug: string | null;
  url: string | null;
  raw_json: string | null;
  is_placeholder: number;
  created_at: number | string;
  updated_at: number | string;
}

export interface CreatePersonInput {
  personId: string;
  fullName: string;
  familyName: string;
  givenName: string;
  party?: string | null;
  roles?: PersonRole[];
  sourceIds?: SourceIds;
  birthDate?: string | null;
  birthPlace?: string | null;
  imageUrl?: string | null;
  slug?: string | null;
  url?: string | null;
  raw?: Record<string, unknown> | null;
  isPlaceholder?: boolean;
}

/** Columns the merge engine may change on an existing person. Roles are absent on purpose. */
export interface UpdatePersonInput {
  fullName?: string;
  familyName?: string;
  givenName?: string;
  party?: string | null;
  sourceIds?: SourceIds;
  raw?: Record<string, unknown> | null;
}

/** Slim projection used to build the speaker roster */
export interface RosterEntry {
  personId: string;
  fullName: string;
  familyName: string;
  givenName: string;
}

/* ---------- Row to Domain Converters ---------- */

function rowToPerson(row: PersonRow): Person {
  return {
    personId: row.person_id,
    fullName: row.full_name,
    familyName: row.family_name,
    givenName: row.given_name,
    party: row.party,
    roles: parseJson<PersonRole[]>(row.roles_json, []),
    sourceIds: parseJson<SourceIds>(row.source_ids_json, {}),
    birthDate: row.birth_date,
    birthPlace: row.birth_place,
    imageUrl: row.image_url,
    slug: row.slug,
    url: row.url,
    raw: parseJson<Record<string, unknown> | null>(row.raw_json, null),
    isPlaceholder: toNumber(row.is_placeholder) === 1,
    createdAt: new Date(toNumber(row.created_at)).toISOString(),
    updatedAt: new Date(toNumber(row.updated_at)).toISOString(),
  };
}

/* ---------- CRUD Operations ---------- */

/** Get person by canonical id */
export async function getPersonById(db: DbAdapter, personId: string): Promise<Person | null> {
  const row = await db.queryOne<PersonRow>(
    `SELECT * FROM persons WHERE person_id = ?`,
    [personId]
  );
  return row ? rowToPerson(row) : null;
}

/** Insert a new person. Fails on duplicate id (callers check first). */
export async function createPerson(db: DbAdapter, input: CreatePersonInput): Promise<void> {
  const now = Date.now();
  await db.run(`
    INSERT INTO persons (
      person_id, full_name, family_name, given_name, party,
      roles_json, source_ids_json, birth_date, birth_place, image_url,
      slug, url, raw_json, is_placeholder, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `, [
    input.personId,
    input.fullName,
    input.familyName,
    input.givenName,
    input.party ?? null,
    JSON.stringify(input.roles ?? []),
    JSON.stringify(input.sourceIds ?? {}),
    input.birthDate ?? null,
    input.birthPlace ?? null,
    input.imageUrl ?? null,
    input.slug ?? null,
    input.url ?? null,
    input.raw ? JSON.stringify(input.raw) : null,
    input.isPlaceholder ? 1 : 0,
    now,
    now,
  ]);
}

/** Update the given columns of a person. Returns false when the id is unknown. */
export async function updatePerson(
  db: DbAdapter,
  personId: string,
  updates: UpdatePersonInput
): Promise<boolean> {
  const sets: string[] = [];
  const params: unknown[] = [];

  if (updates.fullName !== undefined) {
    sets.push("full_name = ?");
    params.push(updates.fullName);
  }
  if (updates.familyName !== undefined) {
    sets.push("family_name = ?");
    params.push(updates.familyName);
  }
  if (updates.givenName !== undefined) {
    sets.push("given_name = ?");
    params.push(updates.givenName);
  }
  if (updates.party !== undefined) {
    sets.push("party = ?");
    params.push(updates.party);
  }
  if (updates.sourceIds !== undefined) {
    sets.push("source_ids_json = ?");
    params.push(JSON.stringify(updates.sourceIds));
  }
  if (updates.raw !== undefined) {
    sets.push("raw_json = ?");
    params.push(updates.raw ? JSON.stringify(updates.raw) : null);
  }

  if (sets.length === 0) return false;

  sets.push("updated_at = ?");
  params.push(Date.now());
  params.push(personId);

  const result = await db.run(
    `UPDATE persons SET ${sets.join(", ")} WHERE person_id = ?`,
    params
  );
  return result.changes > 0;
}

/** Every profile-sourced person, for speaker resolution. Placeholders are excluded. */
export async function listRoster(db: DbAdapter): Promise<RosterEntry[]> {
  const rows = await db.queryAll<Pick<PersonRow, "person_id" | "full_name" | "family_name" | "given_name">>(`
    SELECT person_id, full_name, family_name, given_name
    FROM persons
    WHERE is_placeholder = 0
    ORDER BY person_id ASC
  `);
  return rows.map((row) => ({
    personId: row.person_id,
    fullName: row.full_name,
    familyName: row.family_name,
    givenName: row.given_name,
  }));
}

/** Placeholder persons awaiting manual re-linking */
export async function listPlaceholders(db: DbAdapter): Promise<Person[]> {
  const rows = await db.queryAll<PersonRow>(
    `SELECT * FROM persons WHERE is_placeholder = 1 ORDER BY person_id ASC`
  );
  return rows.map(rowToPerson);
}

/** Count persons, optionally only placeholders */
export async function countPersons(
  db: DbAdapter,
  opts?: { placeholdersOnly?: boolean }
): Promise<number> {
  const where = opts?.placeholdersOnly ? " WHERE is_placeholder = 1" : "";
  const row = await db.queryOne<{ count: number | string }>(
    `SELECT COUNT(*) AS count FROM persons${where}`
  );
  return toNumber(row?.count);
}

/* ---------- Export aggregated store object ---------- */

export const PersonsStore = {
  getById: getPersonById,
  create: createPerson,
  update: updatePerson,
  listRoster,
  listPlaceholders,
  count: countPersons,
};
