import lockfile from "proper-lockfile";
import { getConfig } from "../config.js";
import { LockTimeoutError, StoreError } from "../errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("status");

export type LockOptions = {
  /** Give up with a LockTimeoutError after this long. */
  timeoutMs: number;
  /** A held lock not refreshed for this long is considered abandoned and taken over. */
  staleMs: number;
  minRetryMs: number;
  maxRetryMs: number;
};

export type ReleaseFn = () => Promise<void>;

/** Throws once the lock has been lost. Call it before writing. */
export type LockGuard = () => void;

function isLockedError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ELOCKED";
}

/**
 * Acquire an exclusive advisory lock on a file. The lock is a `<file>.lock`
 * directory whose mtime the holder keeps refreshing; contenders retry with
 * backoff until `timeoutMs` elapses. A lock whose refresh fails is
 * compromised; without `onCompromised` that throws.
 */
export async function acquireLock(
  filePath: string,
  options?: Partial<LockOptions>,
  onCompromised?: (err: Error) => void,
): Promise<ReleaseFn> {
  const opts: LockOptions = { ...getConfig().lock, ...options };
  try {
    return await lockfile.lock(filePath, {
      stale: opts.staleMs,
      realpath: false,
      retries: {
        retries: Math.ceil(opts.timeoutMs / opts.minRetryMs),
        factor: 1.5,
        minTimeout: opts.minRetryMs,
        maxTimeout: opts.maxRetryMs,
        maxRetryTime: opts.timeoutMs,
        randomize: true,
      },
      onCompromised:
        onCompromised ??
        ((err) => {
          throw err;
        }),
    });
  } catch (err) {
    if (isLockedError(err)) {
      throw new LockTimeoutError(filePath, opts.timeoutMs, { cause: err });
    }
    throw new StoreError("STORE_IO", `Failed to acquire lock: ${filePath}`, { cause: err });
  }
}

/** Check whether a file is currently locked by a live holder. */
export async function isLocked(filePath: string, staleMs?: number): Promise<boolean> {
  return lockfile.check(filePath, { realpath: false, stale: staleMs ?? getConfig().lock.staleMs });
}

/**
 * Run `fn` while holding the lock on `filePath`.
 * The lock is released when `fn` settles. If the lock is taken over
 * meanwhile, `guard` throws and there is nothing left to release.
 */
export async function withLock<T>(
  filePath: string,
  fn: (guard: LockGuard) => Promise<T>,
  options?: Partial<LockOptions>,
): Promise<T> {
  const held: { lost?: Error } = {};
  const release = await acquireLock(filePath, options, (err) => {
    held.lost = err;
    log.warn("Lock compromised", { file: filePath, error: err.message });
  });
  const guard: LockGuard = () => {
    if (held.lost) {
      throw new StoreError("LOCK_COMPROMISED", `Lock on ${filePath} was lost before the write`, { cause: held.lost });
    }
  };
  try {
    return await fn(guard);
  } finally {
    if (!held.lost) await release();
  }
}
