// Poll cycle: pure phase machine.
//
// Phases:
//   Idle → Fetching → Parsing → Diffing → Reporting → Committing → Done
//
// Failed is the other terminal phase. It is reachable from Fetching,
// Parsing, Diffing (snapshot load) and Committing. Reporting is
// best-effort and never fails a cycle.
//
// This module contains only types and pure transition functions.

// --- Phases ---

export type CyclePhase =
  | "Idle"
  | "Fetching"
  | "Parsing"
  | "Diffing"
  | "Reporting"
  | "Committing"
  | "Done"
  | "Failed";

export type FailablePhase = "Fetching" | "Parsing" | "Diffing" | "Committing";

export const initialPhase: CyclePhase = "Idle";

const successor: Record<CyclePhase, CyclePhase> = {
  Idle: "Fetching",
  Fetching: "Parsing",
  Parsing: "Diffing",
  Diffing: "Reporting",
  Reporting: "Committing",
  Committing: "Done",
  // A new cycle starts over.
  Done: "Fetching",
  Failed: "Fetching",
};

// --- Transitions ---

export function isTerminal(phase: CyclePhase): boolean {
  return phase === "Done" || phase === "Failed";
}

export function canFail(phase: CyclePhase): phase is FailablePhase {
  switch (phase) {
    case "Fetching":
    case "Parsing":
    case "Diffing":
    case "Committing":
      return true;
    default:
      return false;
  }
}

/** Phase after the current step completes. */
export function advance(phase: CyclePhase): CyclePhase {
  return successor[phase];
}

/** Phase after the current step fails. Non-failable phases stay put. */
export function fail(phase: CyclePhase): CyclePhase {
  return canFail(phase) ? "Failed" : phase;
}
