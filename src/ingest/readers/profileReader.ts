// src/ingest/readers/profileReader.ts
// Flat person-profile reader: one JSON object per politician.
//
// Missing optional fields default to empty values. Party and roles fall back
// to the profile service's `current_roles.parl` block when not given directly.

import path from "node:path";
import type { PersonRole } from "../../store/persons";
import { MalformedRecordError } from "../errors";
import type { ProfileRawUnit, ProfileRecord } from "../types";
import { isRecord, listJsonFiles, optString, readJsonFile } from "./files";

/** Source name under which the native id is kept in `source_ids` */
export const PROFILE_SOURCE = "openparlamento";

/** Native id used when a profile carries none */
export const MISSING_NATIVE_ID = "unknown";

/* ---------- Field Helpers ---------- */

function parseRole(value: unknown): PersonRole | null {
  if (typeof value === "string") {
    const role = value.trim();
    return role ? { role, startDate: null, endDate: null, party: null } : null;
  }
  if (!isRecord(value)) return null;

  const role = optString(value.role) ?? optString(value.label);
  if (!role) return null;

  return {
    role,
    startDate: optString(value.start_date) ?? optString(value.startDate),
    endDate: optString(value.end_date) ?? optString(value.endDate),
    party: optString(value.party),
  };
}

/** Party and role from `current_roles.parl.latest_group` */
function parliamentaryRole(data: Record<string, unknown>): { party: string | null; role: PersonRole | null } {
  const currentRoles = data.current_roles;
  if (!isRecord(currentRoles)) return { party: null, role: null };

  const parl = currentRoles.parl;
  if (!isRecord(parl)) return { party: null, role: null };

  const group: Record<string, unknown> = isRecord(parl.latest_group) ? parl.latest_group : {};
  const party = optString(group.acronym) ?? optString(group.name);
  const roleName = optString(parl.role);

  return {
    party,
    role: roleName
      ? {
          role: roleName,
          startDate: optString(parl.start_date),
          endDate: optString(parl.end_date),
          party,
        }
      : null,
  };
}

/* ---------- Parsing ---------- */

/**
 * Validate one raw profile into a ProfileRecord.
 * Throws MalformedRecordError when the value is not an object. Missing fields
 * default to empty values; a missing id becomes MISSING_NATIVE_ID.
 */
export function parseProfileRecord(raw: unknown, unitId: string): ProfileRecord {
  if (!isRecord(raw)) {
    throw new MalformedRecordError("Profile is not a JSON object", { unitId, path: "$" });
  }

  const nativeId = optString(raw.id) ?? MISSING_NATIVE_ID;

  const familyName = optString(raw.family_name) ?? "";
  const givenName = optString(raw.given_name) ?? "";
  const derived = parliamentaryRole(raw);

  let roles: PersonRole[];
  if (Array.isArray(raw.roles)) {
    roles = raw.roles
      .map(parseRole)
      .filter((role): role is PersonRole => role !== null);
  } else {
    roles = derived.role ? [derived.role] : [];
  }

  const slug = optString(raw.slug);

  return {
    kind: "profile",
    nativeId,
    familyName,
    givenName,
    fullName: `${familyName} ${givenName}`.trim(),
    party: optString(raw.party) ?? derived.party,
    roles,
    sourceIds: { [PROFILE_SOURCE]: `p${nativeId}`, slug },
    url: optString(raw.url),
    slug,
    birthDate: optString(raw.birth_date),
    birthPlace: optString(raw.birth_place),
    imageUrl: optString(raw.image),
    raw,
  };
}

/* ---------- Discovery ---------- */

/** One unit per profile file in `dir` */
export function discoverProfileUnits(dir: string): ProfileRawUnit[] {
  return listJsonFiles(dir).map((filePath) => ({
    kind: "profile",
    unitId: path.basename(filePath),
    sourceRef: filePath,
    read: () => readJsonFile(filePath),
  }));
}
