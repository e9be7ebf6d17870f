import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DirectoryLockedError, RepositoryUnavailableError } from "../application/errors";
import { makeTempRoot, removeTempRoot } from "../testing/fixtures";
import { FileDirectoryLock, applyLockPath } from "./apply-lock";

describe("FileDirectoryLock", () => {
  let root: string;
  let locksDir: string;

  beforeEach(async () => {
    root = await makeTempRoot();
    locksDir = path.join(root, "locks");
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it("holds a pid lock file for the duration of the call", async () => {
    const lock = new FileDirectoryLock(locksDir);
    const lockPath = applyLockPath(locksDir, "/data/docs");

    const seen = await lock.withLock("/data/docs", async () => fs.readFile(lockPath, "utf-8"));

    expect(seen).toBe(String(process.pid));
    await expect(fs.stat(lockPath)).rejects.toThrow();
  });

  it("releases the lock when the call throws", async () => {
    const lock = new FileDirectoryLock(locksDir);

    await expect(
      lock.withLock("/data/docs", async () => {
        throw new Error("inner");
      })
    ).rejects.toThrow("inner");
    expect(await fs.readdir(locksDir)).toEqual([]);
  });

  it("is re-entrant within one instance", async () => {
    const lock = new FileDirectoryLock(locksDir);

    const value = await lock.withLock("/data/docs", () => lock.withLock("/data/docs", async () => 42));

    expect(value).toBe(42);
  });

  it("refuses a directory locked by a live process", async () => {
    await fs.mkdir(locksDir, { recursive: true });
    const lockPath = applyLockPath(locksDir, "/data/docs");
    // pid 1 is always alive
    await fs.writeFile(lockPath, "1");

    const err = await new FileDirectoryLock(locksDir)
      .withLock("/data/docs", async () => "ran")
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DirectoryLockedError);
    expect(err).toMatchObject({ directory: path.resolve("/data/docs"), lockPath, pid: 1 });
  });

  it("replaces a lock left by a dead process", async () => {
    await fs.mkdir(locksDir, { recursive: true });
    const lockPath = applyLockPath(locksDir, "/data/docs");
    await fs.writeFile(lockPath, "not-a-pid");

    const result = await new FileDirectoryLock(locksDir).withLock("/data/docs", async () => "ran");

    expect(result).toBe("ran");
  });

  it("reports a repository root it cannot create under", async () => {
    const blocker = path.join(root, "blocker");
    await fs.writeFile(blocker, "file");

    const err = await new FileDirectoryLock(path.join(blocker, "locks"))
      .withLock("/data/docs", async () => "ran")
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RepositoryUnavailableError);
    expect(err).toMatchObject({ repositoryRoot: blocker });
  });
});
