import type { BackupEntry, BackupType } from "../catalog/types.js";
import { type Chain, chainEntries, chainTip, latestChain } from "../chain/chain-resolver.js";
import { startOfWeek } from "./periods.js";

export interface SchedulePolicy {
  /** 0 = Sunday … 6 = Saturday. */
  weekStart: number;
}

export type ScheduleDecision =
  | { type: "FULL"; reason: string }
  | {
      type: "INCREMENTAL";
      /** Chain the new delta joins; its anchor becomes the entry's base. */
      chain: Chain;
      /** Entry whose artifact the delta is taken against. */
      parent: BackupEntry;
    };

/** A forced incremental was requested but there is nothing safe to chain onto. */
export class NoIncrementalBaseError extends Error {
  readonly name = "NoIncrementalBaseError" as const;
  constructor(readonly reason: string) {
    super(`Cannot take an incremental backup: ${reason}`);
  }
}

/**
 * Decide what the next backup run takes.
 *
 * FULL when there is no live chain, when the latest chain started before
 * the current week boundary, or when the latest chain cannot accept another
 * delta. Otherwise INCREMENTAL on the latest chain. This keeps exactly one
 * FULL per week and never chains across a corrupt base.
 */
export function decide(
  now: Date,
  chains: readonly Chain[],
  policy: SchedulePolicy,
  forced?: BackupType,
): ScheduleDecision {
  if (forced === "FULL") {
    return { type: "FULL", reason: "full backup requested" };
  }

  const latest = latestChain(chains);
  const blocker = latest ? incrementalBlocker(latest) : "no existing full backup";

  if (forced === "INCREMENTAL") {
    if (blocker || !latest) throw new NoIncrementalBaseError(blocker ?? "no existing full backup");
    return { type: "INCREMENTAL", chain: latest, parent: chainTip(latest) };
  }

  if (!latest || blocker) {
    return { type: "FULL", reason: blocker ?? "no existing full backup" };
  }

  const boundary = startOfWeek(now, policy.weekStart);
  if (Date.parse(latest.anchor.createdAt) < boundary.getTime()) {
    return {
      type: "FULL",
      reason: `latest full backup ${latest.anchor.id} predates the week starting ${boundary.toISOString().slice(0, 10)}`,
    };
  }

  return { type: "INCREMENTAL", chain: latest, parent: chainTip(latest) };
}

/** Why a chain cannot take another delta, or null when it can. */
function incrementalBlocker(chain: Chain): string | null {
  const entries = chainEntries(chain);

  const corrupt = entries.find((e) => e.state === "CORRUPT");
  if (corrupt) return `latest chain ${chain.id} has corrupt entry ${corrupt.id}`;

  const pruned = entries.find((e) => e.state === "PRUNED");
  if (pruned) return `latest chain ${chain.id} has pruned entry ${pruned.id}`;

  const sealed = entries.find(
    (e) => e.state === "PREPARED" && e.preparedMode === "REDO_UNDO" && e.preparedPath === chain.anchor.storagePath,
  );
  if (sealed) return `latest chain ${chain.id} was finalised in place at ${sealed.id}`;
  return null;
}
