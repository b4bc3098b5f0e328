// src/ingest/unitState.ts
// Per-unit lifecycle: pending → processing → committed | rolled_back.
// Terminal states have no exits; a rolled-back unit is retried only by a later run.

import type { UnitState } from "./types";

const ALLOWED: Record<UnitState, readonly UnitState[]> = {
  pending: ["processing"],
  processing: ["committed", "rolled_back"],
  committed: [],
  rolled_back: [],
};

export class IllegalUnitTransitionError extends Error {
  readonly from: UnitState;
  readonly to: UnitState;

  constructor(from: UnitState, to: UnitState) {
    super(`Illegal unit transition ${from} → ${to}`);
    this.name = "IllegalUnitTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function canTransition(from: UnitState, to: UnitState): boolean {
  return ALLOWED[from].includes(to);
}

/** Returns `to`, or throws IllegalUnitTransitionError */
export function transitionUnit(from: UnitState, to: UnitState): UnitState {
  if (!canTransition(from, to)) {
    throw new IllegalUnitTransitionError(from, to);
  }
  return to;
}

export function isTerminal(state: UnitState): boolean {
  return ALLOWED[state].length === 0;
}
