import { compareEntries } from "../catalog/types.js";
import { type Chain, chainEntries, latestChain } from "../chain/chain-resolver.js";
import { type PeriodKind, type PeriodSettings, periodStart, shiftPeriodBack, slotKey } from "../schedule/periods.js";

/**
 * Rotation policy.
 *
 * - Each bucket kind keeps the representative of its N most recent periods
 *   (counted back from `now`, the current period included)
 * - The representative of a period is its EARLIEST full backup, so the
 *   choice never moves as later backups land in the same period
 * - A chain holding several buckets reports the coarsest one
 */
export interface RetentionPolicy extends PeriodSettings {
  dailyCount: number;
  weeklyCount: number;
  monthlyCount: number;
  yearlyCount: number;
}

export interface RetentionBucket {
  kind: PeriodKind;
  slotKey: string;
  anchorId: string;
}

/** Coarsest last: later kinds override earlier ones. */
const KINDS_BY_GRANULARITY: readonly PeriodKind[] = ["DAILY", "WEEKLY", "MONTHLY", "YEARLY"];

function countFor(kind: PeriodKind, policy: RetentionPolicy): number {
  switch (kind) {
    case "DAILY":
      return policy.dailyCount;
    case "WEEKLY":
      return policy.weeklyCount;
    case "MONTHLY":
      return policy.monthlyCount;
    case "YEARLY":
      return policy.yearlyCount;
  }
}

/**
 * Assign every chain the bucket that retains it, or null.
 *
 * Pure: the result depends only on the set of chains, the policy and `now`,
 * never on input order. Keys are anchor ids.
 */
export function classify(
  chains: readonly Chain[],
  policy: RetentionPolicy,
  now: Date,
): ReadonlyMap<string, RetentionBucket | null> {
  const result = new Map<string, RetentionBucket | null>();
  for (const chain of [...chains].sort((a, b) => compareEntries(a.anchor, b.anchor))) {
    result.set(chain.id, null);
  }

  // Tombstoned and corrupt anchors never represent a period.
  const candidates = [...chains]
    .filter((c) => c.anchor.state !== "PRUNED" && c.anchor.state !== "CORRUPT")
    .sort((a, b) => compareEntries(a.anchor, b.anchor));

  for (const kind of KINDS_BY_GRANULARITY) {
    const count = countFor(kind, policy);
    if (count <= 0) continue;

    const windowStart = shiftPeriodBack(kind, periodStart(kind, now, policy), count - 1, policy).getTime();

    // Candidates are oldest-first, so the first seen per slot is the earliest.
    const representatives = new Map<string, Chain>();
    for (const chain of candidates) {
      const key = slotKey(kind, new Date(chain.anchor.createdAt), policy);
      if (!representatives.has(key)) representatives.set(key, chain);
    }

    for (const [key, chain] of representatives) {
      const start = periodStart(kind, new Date(chain.anchor.createdAt), policy).getTime();
      if (start >= windowStart) {
        result.set(chain.id, { kind, slotKey: key, anchorId: chain.id });
      }
    }
  }

  return result;
}

/**
 * Chains rotation may delete, oldest first.
 *
 * A chain qualifies only as a whole: it must be unretained, hold no RAW
 * entry (a never-prepared backup is never auto-pruned), still have
 * something left to prune, and not be the base the next incremental
 * builds on.
 */
export function eligibleForPruning(chains: readonly Chain[], policy: RetentionPolicy, now: Date): Chain[] {
  const buckets = classify(chains, policy, now);
  const latest = latestChain(chains);

  return [...chains]
    .filter((chain) => {
      if (buckets.get(chain.id)) return false;
      if (latest && chain.id === latest.id) return false;
      const entries = chainEntries(chain);
      if (entries.every((e) => e.state === "PRUNED")) return false;
      return entries.every((e) => e.state === "PREPARED" || e.state === "CORRUPT" || e.state === "PRUNED");
    })
    .sort((a, b) => compareEntries(a.anchor, b.anchor));
}
