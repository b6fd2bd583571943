import { type BackupEntry, compareEntries } from "../catalog/types.js";

/**
 * A FULL anchor plus every INCREMENTAL that resolves to it, in creation
 * order. Derived from the catalog on demand; never stored.
 */
export interface Chain {
  /** Same as `anchor.id`. */
  id: string;
  anchor: BackupEntry;
  incrementals: BackupEntry[];
}

export type ChainStatus = "UNPREPARED" | "PREPARING" | "PREPARED" | "FAILED" | "PRUNED";

export interface ResolvedChains {
  /** Oldest anchor first. */
  chains: Chain[];
  orphans: OrphanIncrementalError[];
}

/** An incremental whose base does not lead to a usable FULL backup. */
export class OrphanIncrementalError extends Error {
  readonly name = "OrphanIncrementalError" as const;
  constructor(
    readonly entryId: string,
    readonly baseId: string | null,
    readonly reason: string,
  ) {
    super(`Orphaned incremental ${entryId} (base ${baseId ?? "none"}): ${reason}`);
  }
}

/**
 * Group entries into chains by following `baseId` back to a FULL entry.
 *
 * Orphans are reported separately so one broken chain never hides the rest.
 * Every entry ends up in exactly one chain or in `orphans`.
 */
export function resolveChains(entries: readonly BackupEntry[]): ResolvedChains {
  const byId = new Map(entries.map((e) => [e.id, e]));
  const members = new Map<string, BackupEntry[]>();
  const orphans: OrphanIncrementalError[] = [];

  for (const entry of [...entries].sort(compareEntries)) {
    if (entry.type === "FULL") {
      if (!members.has(entry.id)) members.set(entry.id, []);
      continue;
    }

    const resolved = resolveAnchor(entry, byId);
    if (resolved instanceof OrphanIncrementalError) {
      orphans.push(resolved);
      continue;
    }

    const list = members.get(resolved.id) ?? [];
    list.push(entry);
    members.set(resolved.id, list);
  }

  const chains: Chain[] = [];
  for (const [anchorId, incrementals] of members) {
    const anchor = byId.get(anchorId);
    if (!anchor) continue;
    chains.push({ id: anchorId, anchor, incrementals: incrementals.sort(compareEntries) });
  }
  chains.sort((a, b) => compareEntries(a.anchor, b.anchor));

  return { chains, orphans };
}

/** Strict form of `resolveChains`: throws the first orphan found. */
export function chainsOf(entries: readonly BackupEntry[]): Chain[] {
  const { chains, orphans } = resolveChains(entries);
  if (orphans.length > 0) throw orphans[0];
  return chains;
}

/**
 * The live chain with the most recent anchor. Equal timestamps resolve to
 * the larger id, which is the more recently created entry.
 */
export function latestChain(chains: readonly Chain[]): Chain | null {
  let latest: Chain | null = null;
  for (const chain of chains) {
    if (chain.anchor.state === "PRUNED") continue;
    if (!latest || compareEntries(chain.anchor, latest.anchor) > 0) latest = chain;
  }
  return latest;
}

/** Anchor first, then incrementals in creation order. */
export function chainEntries(chain: Chain): BackupEntry[] {
  return [chain.anchor, ...chain.incrementals];
}

/** Newest entry of the chain: the artifact the next incremental builds on. */
export function chainTip(chain: Chain): BackupEntry {
  return chain.incrementals[chain.incrementals.length - 1] ?? chain.anchor;
}

export function chainStatus(chain: Chain): ChainStatus {
  const entries = chainEntries(chain);
  if (chain.anchor.state === "PRUNED") return "PRUNED";
  if (entries.some((e) => e.state === "CORRUPT")) return "FAILED";
  if (chain.anchor.preparation) return "PREPARING";
  if (entries.every((e) => e.state === "PREPARED")) return "PREPARED";
  return "UNPREPARED";
}

/** Find the chain anchored on `id`, or the chain containing entry `id`. */
export function findChain(chains: readonly Chain[], id: string): Chain | null {
  return chains.find((c) => c.id === id || c.incrementals.some((e) => e.id === id)) ?? null;
}

function resolveAnchor(entry: BackupEntry, byId: Map<string, BackupEntry>): BackupEntry | OrphanIncrementalError {
  const seen = new Set<string>([entry.id]);
  let cursor: BackupEntry = entry;

  while (cursor.type === "INCREMENTAL") {
    const baseId = cursor.baseId;
    if (baseId === null) {
      return new OrphanIncrementalError(entry.id, entry.baseId, `incremental ${cursor.id} names no base`);
    }
    if (seen.has(baseId)) {
      return new OrphanIncrementalError(entry.id, entry.baseId, "base references form a cycle");
    }
    const base = byId.get(baseId);
    if (!base) {
      return new OrphanIncrementalError(entry.id, entry.baseId, `base ${baseId} does not exist`);
    }
    seen.add(baseId);
    cursor = base;
  }

  const anchor = cursor;
  if (anchor.state === "PRUNED" && entry.state !== "PRUNED") {
    return new OrphanIncrementalError(entry.id, entry.baseId, `base ${anchor.id} has been pruned`);
  }
  if (anchor.state === "CORRUPT" && (entry.state === "RAW" || entry.state === "PREPARED")) {
    return new OrphanIncrementalError(entry.id, entry.baseId, `base ${anchor.id} is corrupt`);
  }
  return anchor;
}
