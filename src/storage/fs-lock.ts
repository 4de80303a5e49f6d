import { mkdir, open, readFile, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { RegistryError } from "../errors.js";
import { isErrnoException } from "./atomic.js";

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;
export const STALE_LOCK_AGE_MS = 300000; // 5 minutes

export type LockOptions = {
  timeoutMs?: number;
  staleAgeMs?: number;
};

export type ReleaseFn = () => Promise<void>;

/**
 * Acquire an exclusive lock file next to a document. The lock file holds the
 * owner pid and acquisition time; stale and orphaned locks are removed.
 */
export async function acquireFsLock(lockPath: string, opts: LockOptions = {}): Promise<ReleaseFn> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  const staleAgeMs = opts.staleAgeMs ?? STALE_LOCK_AGE_MS;

  await mkdir(dirname(lockPath), { recursive: true });
  const started = Date.now();
  const pid = process.pid;
  let retries = 0;

  for (;;) {
    await clearAbandonedLock(lockPath, pid, staleAgeMs);

    try {
      const fh = await open(lockPath, "wx");
      try {
        await fh.writeFile(`${pid}\n${Date.now()}\n`, "utf8");
        await fh.sync();
      } finally {
        await fh.close();
      }

      return async () => {
        const content = await readFile(lockPath, "utf8");
        const [lockPid] = content.split("\n");
        if (lockPid === String(pid)) {
          await unlink(lockPath);
        } else {
          console.warn(`[registry] Lock was taken by another process (current: ${lockPid}, ours: ${pid}): ${lockPath}`);
        }
      };
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "EEXIST") throw e;

      retries++;
      if (Date.now() - started > timeoutMs) {
        throw new RegistryError("LOCK_TIMEOUT", `Timed out acquiring lock after ${retries} retries: ${lockPath}`);
      }

      // Exponential backoff with jitter
      const backoff = Math.min(50 * Math.pow(1.5, retries), 1000);
      const jitter = Math.random() * backoff * 0.1;
      await new Promise((r) => setTimeout(r, backoff + jitter));
    }
  }
}

async function clearAbandonedLock(lockPath: string, pid: number, staleAgeMs: number): Promise<void> {
  let age: number;
  try {
    age = Date.now() - (await stat(lockPath)).mtimeMs;
  } catch {
    return;
  }

  if (age > staleAgeMs) {
    console.warn(`[registry] Removing stale lock (age: ${Math.round(age / 1000)}s): ${lockPath}`);
    await unlink(lockPath).catch(() => undefined);
    return;
  }

  const content = await readFile(lockPath, "utf8").catch(() => "");
  const [lockPid] = content.split("\n");
  if (!lockPid || lockPid === String(pid)) return;

  try {
    process.kill(Number(lockPid), 0); // Signal 0 checks existence
  } catch (e) {
    // EPERM: the owner exists but belongs to another user
    if (isErrnoException(e) && e.code === "EPERM") return;
    console.warn(`[registry] Removing orphaned lock (pid: ${lockPid}): ${lockPath}`);
    await unlink(lockPath).catch(() => undefined);
  }
}

/** Run `fn` while holding the lock for `targetPath` (`<targetPath>.lock`). */
export async function withFsLock<T>(targetPath: string, opts: LockOptions, fn: () => Promise<T> | T): Promise<T> {
  const release = await acquireFsLock(`${targetPath}.lock`, opts);
  try {
    return await fn();
  } finally {
    await release();
  }
}
