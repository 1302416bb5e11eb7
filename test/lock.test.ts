import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LockTimeoutError, StoreError } from "../src/errors.js";
import { acquireLock, isLocked, withLock } from "../src/persistence/lock.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("lock", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "taskwave-lock-"));
    file = join(dir, "status.json");
    await writeFile(file, "{}");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports whether a file is locked", async () => {
    expect(await isLocked(file)).toBe(false);
    const release = await acquireLock(file);
    expect(await isLocked(file)).toBe(true);
    await release();
    expect(await isLocked(file)).toBe(false);
  });

  it("times out when the holder keeps the lock past the timeout", async () => {
    const holding = withLock(file, () => sleep(2_000));
    await sleep(50);

    const started = Date.now();
    const err = await acquireLock(file, { timeoutMs: 1_000 }).then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(LockTimeoutError);
    expect(err instanceof LockTimeoutError && err.recoverable).toBe(true);
    expect(Date.now() - started).toBeLessThan(2_000);

    await holding;
  });

  it("waits for a holder that releases within the timeout", async () => {
    const holding = withLock(file, () => sleep(200));
    await sleep(20);
    const release = await acquireLock(file, { timeoutMs: 3_000 });
    await release();
    await holding;
  });

  it("serializes critical sections", async () => {
    const events: string[] = [];
    await Promise.all(
      ["a", "b", "c"].map((name) =>
        withLock(file, async () => {
          events.push(`${name}:in`);
          await sleep(30);
          events.push(`${name}:out`);
        }),
      ),
    );
    for (let i = 0; i < events.length; i += 2) {
      expect(events[i].endsWith(":in")).toBe(true);
      expect(events[i + 1]).toBe(events[i].replace(":in", ":out"));
    }
  });

  it("takes over a lock left behind by a dead holder", async () => {
    const lockDir = `${file}.lock`;
    await mkdir(lockDir);
    const old = new Date(Date.now() - 60_000);
    await utimes(lockDir, old, old);

    expect(await isLocked(file, 10_000)).toBe(false);
    const release = await acquireLock(file, { staleMs: 10_000, timeoutMs: 500 });
    expect(await isLocked(file, 10_000)).toBe(true);
    await release();
  });

  it("keeps waiting on a lock that is still fresh", async () => {
    await mkdir(`${file}.lock`);
    await expect(acquireLock(file, { staleMs: 10_000, timeoutMs: 300 })).rejects.toBeInstanceOf(LockTimeoutError);
  });

  it("refuses to write once the lock has been taken over", async () => {
    const writes: string[] = [];
    const section = withLock(
      file,
      async (guard) => {
        await rm(`${file}.lock`, { recursive: true, force: true });
        await sleep(1_500);
        guard();
        writes.push("written");
      },
      { staleMs: 2_000 },
    );

    const err = await section.then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(StoreError);
    expect(err instanceof StoreError && err.code).toBe("LOCK_COMPROMISED");
    expect(writes).toEqual([]);
  });

  it("releases the lock when the critical section throws", async () => {
    await expect(withLock(file, async () => Promise.reject(new Error("inside")))).rejects.toThrow("inside");
    expect(await isLocked(file)).toBe(false);
  });
});
