import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import type { DirectoryLock } from "../ports/directory-lock";
import { DirectoryLockedError, RepositoryUnavailableError, errorCode } from "../application/errors";

export function applyLockPath(locksDir: string, directory: string) {
  const id = createHash("sha1").update(path.resolve(directory)).digest("hex");
  return path.join(locksDir, `${id}.lock`);
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return errorCode(e) === "EPERM";
  }
}

async function tryCreateLockFile(lockPath: string): Promise<boolean> {
  try {
    await fs.writeFile(lockPath, String(process.pid), { flag: "wx", mode: 0o600 });
    return true;
  } catch (e) {
    if (errorCode(e) === "EEXIST") return false;
    throw e;
  }
}

async function readLockPid(lockPath: string): Promise<number | null> {
  try {
    const parsed = Number.parseInt((await fs.readFile(lockPath, "utf-8")).trim(), 10);
    return Number.isNaN(parsed) ? null : parsed;
  } catch (e) {
    if (errorCode(e) === "ENOENT") return null;
    throw e;
  }
}

/**
 * Best-effort guard against two invocations mutating the same managed
 * directory. Lock files live in the repository, never inside the directory,
 * so they are not archived or copied. A lock left by a dead process is
 * replaced.
 */
export class FileDirectoryLock implements DirectoryLock {
  private readonly held = new Set<string>();

  constructor(
    private readonly locksDir: string,
    private readonly repositoryRoot = path.dirname(locksDir)
  ) {}

  async withLock<T>(directory: string, fn: () => Promise<T>): Promise<T> {
    const lockPath = applyLockPath(this.locksDir, directory);

    // re-entrant within one process (sync -> apply)
    if (this.held.has(lockPath)) return fn();

    await this.acquire(path.resolve(directory), lockPath);
    this.held.add(lockPath);
    try {
      return await fn();
    } finally {
      this.held.delete(lockPath);
      await fs.rm(lockPath, { force: true });
    }
  }

  private async acquire(directory: string, lockPath: string): Promise<void> {
    try {
      await fs.mkdir(this.locksDir, { recursive: true });
    } catch (err) {
      throw new RepositoryUnavailableError(this.repositoryRoot, err);
    }

    for (let attempt = 0; attempt < 3; attempt++) {
      if (await tryCreateLockFile(lockPath)) return;

      const pid = await readLockPid(lockPath);
      if (pid !== null && pid !== process.pid && isProcessAlive(pid)) {
        throw new DirectoryLockedError(directory, lockPath, pid);
      }

      await fs.rm(lockPath, { force: true });
    }

    if (await tryCreateLockFile(lockPath)) return;
    throw new DirectoryLockedError(directory, lockPath, (await readLockPid(lockPath)) ?? -1);
  }
}
