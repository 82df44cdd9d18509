import fs from "node:fs";
import path from "node:path";
import type { Reporter } from "../log/reporter.js";

export const STALE_LOCK_AGE_MS = 6 * 60 * 60 * 1000;

export class RunLockedError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly holderPid: number | null,
  ) {
    super(`Another redeploy is running (pid ${holderPid ?? "unknown"}); lock: ${lockPath}`);
    this.name = "RunLockedError";
  }
}

export type ReleaseLock = () => void;

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks existence
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else.
    return e instanceof Error && "code" in e && e.code === "EPERM";
  }
}

function readHolder(lockPath: string): { pid: number | null; ageMs: number } | null {
  try {
    const stats = fs.statSync(lockPath);
    const [pidLine] = fs.readFileSync(lockPath, "utf8").split("\n");
    const pid = Number.parseInt(pidLine ?? "", 10);
    return { pid: Number.isNaN(pid) ? null : pid, ageMs: Date.now() - stats.mtimeMs };
  } catch {
    return null;
  }
}

/**
 * Take the run-level lock. Fails immediately when a live process holds it;
 * stale locks (dead owner, or older than `staleAfterMs`) are removed first.
 */
export function acquireRunLock(
  lockPath: string,
  opts: { reporter?: Reporter; staleAfterMs?: number } = {},
): ReleaseLock {
  const staleAfter = opts.staleAfterMs ?? STALE_LOCK_AGE_MS;
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  const holder = readHolder(lockPath);
  if (holder) {
    const orphaned = holder.pid === null || !isAlive(holder.pid);
    if (orphaned || holder.ageMs > staleAfter) {
      opts.reporter?.warn(
        "LOCK_STALE",
        orphaned
          ? `Removing orphaned lock (pid: ${holder.pid ?? "unknown"}): ${lockPath}`
          : `Removing stale lock (age: ${Math.round(holder.ageMs / 1000)}s): ${lockPath}`,
      );
      fs.rmSync(lockPath, { force: true });
    }
  }

  let fd: number;
  try {
    fd = fs.openSync(lockPath, "wx");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "EEXIST") {
      throw new RunLockedError(lockPath, readHolder(lockPath)?.pid ?? null);
    }
    throw e;
  }
  try {
    fs.writeSync(fd, `${process.pid}\n${new Date().toISOString()}\n`);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }

  return () => {
    const current = readHolder(lockPath);
    // Only remove a lock that is still ours.
    if (current && current.pid === process.pid) fs.rmSync(lockPath, { force: true });
  };
}
