// src/ingest/speakerResolver.ts
// Matches free-text transcript speaker names against the person roster.
//
// The cascade runs from strict to loose and the first step that lands on
// exactly one person wins. A step that lands on several people fails and the
// next step is tried; the surname-only step never picks between namesakes.
// When nothing matches the caller gets a placeholder person to upsert.
//
// No I/O here: the orchestrator loads the roster and reports outcomes.

import type { CreatePersonInput, RosterEntry } from "../store/persons";
import { AmbiguousMatchError } from "./errors";
import { placeholderPersonId } from "./ids";
import { nameTokens, normalizeName } from "./normalizer";

/* ---------- Types ---------- */

export type MatchStep =
  | "exact"
  | "reversed"
  | "surname_first"
  | "given_first"
  | "surname_first_given"
  | "surname_only";

export interface ResolvedSpeaker {
  kind: "resolved";
  personId: string;
  step: MatchStep;
  normalizedName: string;
}

export interface PlaceholderSpeaker {
  kind: "placeholder";
  personId: string;
  normalizedName: string;
  /** Person row to upsert before any speech references it */
  placeholder: CreatePersonInput;
  reason: "no_match" | "ambiguous_surname";
  ambiguity?: AmbiguousMatchError;
}

export type SpeakerResolution = ResolvedSpeaker | PlaceholderSpeaker;

type NameIndex = Map<string, Set<string>>;

/* ---------- Index Helpers ---------- */

function addKey(index: NameIndex, key: string, personId: string): void {
  if (!key) return;
  let ids = index.get(key);
  if (!ids) {
    ids = new Set<string>();
    index.set(key, ids);
  }
  ids.add(personId);
}

function lookup(index: NameIndex, keys: string[]): string[] {
  const found = new Set<string>();
  for (const key of keys) {
    const ids = index.get(key);
    if (ids) ids.forEach((id) => found.add(id));
  }
  return [...found].sort();
}

/** Placeholder person row for a name the roster does not know */
export function buildPlaceholderPerson(rawName: string, normalizedName: string): CreatePersonInput {
  const trimmed = rawName.trim();
  const tokens = trimmed.split(/\s+/).filter((t) => t.length > 0);

  return {
    personId: placeholderPersonId(normalizedName),
    fullName: trimmed,
    familyName: tokens.length > 0 ? tokens[tokens.length - 1] : "",
    givenName: tokens.length > 1 ? tokens[0] : "",
    isPlaceholder: true,
  };
}

/* ---------- Resolver ---------- */

export class SpeakerResolver {
  private readonly names: NameIndex = new Map();
  private readonly surnameFirstGiven: NameIndex = new Map();
  private readonly surnames: NameIndex = new Map();

  constructor(roster: readonly RosterEntry[]) {
    for (const person of roster) {
      this.add(person);
    }
  }

  /** Number of distinct people indexed */
  get size(): number {
    const ids = new Set<string>();
    this.names.forEach((set) => set.forEach((id) => ids.add(id)));
    return ids.size;
  }

  private add(person: RosterEntry): void {
    const family = normalizeName(person.familyName);
    const given = normalizeName(person.givenName);

    addKey(this.names, normalizeName(person.fullName), person.personId);
    if (family && given) {
      addKey(this.names, `${given} ${family}`, person.personId);
      addKey(this.names, `${family} ${given}`, person.personId);
    }

    const familyTokens = nameTokens(family);
    const surname = familyTokens[familyTokens.length - 1];
    const firstGiven = nameTokens(given)[0];

    if (surname) {
      addKey(this.surnames, surname, person.personId);
      if (firstGiven) {
        addKey(this.surnameFirstGiven, `${surname} ${firstGiven}`, person.personId);
      }
    }
  }

  resolve(rawName: string): SpeakerResolution {
    const normalizedName = normalizeName(rawName);
    const tokens = nameTokens(normalizedName);

    if (tokens.length === 0) {
      return this.placeholder(rawName, normalizedName, "no_match");
    }

    const first = tokens[0];
    const last = tokens[tokens.length - 1];

    const steps: Array<[MatchStep, NameIndex, string[]]> = [
      ["exact", this.names, [normalizedName]],
      ["reversed", this.names, [[...tokens].reverse().join(" ")]],
      ["surname_first", this.names, [[...tokens.slice(1), first].join(" ")]],
      ["given_first", this.names, [[last, ...tokens.slice(0, -1)].join(" ")]],
    ];
    if (tokens.length >= 2) {
      steps.push([
        "surname_first_given",
        this.surnameFirstGiven,
        [`${first} ${tokens[1]}`, `${last} ${first}`],
      ]);
    }

    for (const [step, index, keys] of steps) {
      const candidates = lookup(index, keys);
      if (candidates.length === 1) {
        return { kind: "resolved", personId: candidates[0], step, normalizedName };
      }
    }

    // Surname-only: accepted for a single namesake, never guessed between several
    const namesakes = lookup(this.surnames, [last]);
    if (namesakes.length === 1) {
      return { kind: "resolved", personId: namesakes[0], step: "surname_only", normalizedName };
    }
    if (namesakes.length > 1) {
      return this.placeholder(
        rawName,
        normalizedName,
        "ambiguous_surname",
        new AmbiguousMatchError(last, namesakes)
      );
    }

    return this.placeholder(rawName, normalizedName, "no_match");
  }

  private placeholder(
    rawName: string,
    normalizedName: string,
    reason: PlaceholderSpeaker["reason"],
    ambiguity?: AmbiguousMatchError
  ): PlaceholderSpeaker {
    const placeholder = buildPlaceholderPerson(rawName, normalizedName);
    return {
      kind: "placeholder",
      personId: placeholder.personId,
      normalizedName,
      placeholder,
      reason,
      ...(ambiguity ? { ambiguity } : {}),
    };
  }
}
