/**
 * Backup entry lifecycle: pure logic, zero dependencies.
 *
 * BackupCatalog.mark() enforces this graph; no other code may change an
 * entry's state directly.
 *
 * Key invariant: PRUNED is terminal. A tombstone can never come back as a
 * chain base.
 */

import type { EntryState } from "./types.js";

/**
 * Complete transition graph.
 *
 * ```
 * RAW      → PREPARED, CORRUPT, PRUNED
 * PREPARED → CORRUPT, PRUNED
 * CORRUPT  → PREPARED (retried preparation), PRUNED
 * PRUNED   → (none)
 * ```
 */
export const VALID_TRANSITIONS: Record<EntryState, readonly EntryState[]> = {
  RAW: ["PREPARED", "CORRUPT", "PRUNED"],
  PREPARED: ["CORRUPT", "PRUNED"],
  CORRUPT: ["PREPARED", "PRUNED"],
  PRUNED: [],
};

/** Check whether a transition from one state to another is allowed. */
export function isValidTransition(from: EntryState, to: EntryState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Entries that still own an artifact on disk. */
export function isLive(state: EntryState): boolean {
  return state !== "PRUNED";
}

/** Thrown when code attempts a transition not in the valid graph. */
export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(
    readonly entryId: string,
    readonly from: EntryState,
    readonly to: EntryState,
  ) {
    super(`Invalid state transition for backup ${entryId}: ${from} → ${to}`);
  }
}
