/** Proof of lock ownership, handed back on release. */
export interface LockToken {
  id: string;
  acquiredAt: string;
}

/** Cluster-wide advisory lock serializing backup, prepare, restore and rotate. */
export interface ClusterLock {
  /** Wait up to `timeoutMs`; rejects with LockTimeoutError when the lock stays held. */
  acquire(timeoutMs: number): Promise<LockToken>;
  release(token: LockToken): Promise<void>;
}

/** The lock stayed held by someone else for the whole timeout. */
export class LockTimeoutError extends Error {
  readonly name = "LockTimeoutError" as const;
  constructor(
    readonly timeoutMs: number,
    readonly holder: string | null = null,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for the cluster backup lock${holder ? ` (held by ${holder})` : ""}`);
  }
}

/** Run `fn` while holding the lock; the lock is released on every exit path. */
export async function withClusterLock<T>(lock: ClusterLock, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  const token = await lock.acquire(timeoutMs);
  try {
    return await fn();
  } finally {
    await lock.release(token);
  }
}
