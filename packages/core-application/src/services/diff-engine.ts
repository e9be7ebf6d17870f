import fs from "node:fs/promises";
import path from "node:path";

import { isReservedName, toDiffResult, type DiffResult } from "@dirsnap/core-domain";

import type { FileComparer } from "../ports/file-comparer";
import { DirectoryMissingError, errorCode } from "../application/errors";
import { isDirectory } from "../infra/fs-utils";

type EntryKind = "file" | "directory" | "other";

async function entryKind(p: string): Promise<EntryKind | null> {
  try {
    const stat = await fs.stat(p);
    if (stat.isFile()) return "file";
    if (stat.isDirectory()) return "directory";
    return "other";
  } catch (err) {
    // dangling symlinks count as absent
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
}

/**
 * Top-level entries of `source` that an apply would add or overwrite in
 * `destination`:
 * - everything, when `destination` does not exist yet
 * - otherwise names only in `source`, plus same-named regular files whose
 *   content differs
 *
 * Directories present on both sides are not descended into, and a name that
 * is a file on one side and a directory on the other is left alone. A
 * `destination` that exists but is not a directory is rejected.
 */
export async function computeDiff(
  source: string,
  destination: string,
  comparer: FileComparer
): Promise<DiffResult> {
  const srcAbs = path.resolve(source);
  const dstAbs = path.resolve(destination);

  if (!(await isDirectory(srcAbs))) {
    throw new DirectoryMissingError(srcAbs, `Invalid source dir: '${srcAbs}'.`);
  }

  const names = (await fs.readdir(srcAbs)).filter((name) => !isReservedName(name));

  const dstRootKind = await entryKind(dstAbs);
  if (dstRootKind === null) {
    return toDiffResult(names);
  }
  if (dstRootKind !== "directory") {
    throw new DirectoryMissingError(dstAbs, `Destination '${dstAbs}' is not a directory.`);
  }

  const changed: string[] = [];
  for (const name of names) {
    const srcItem = path.join(srcAbs, name);
    const dstItem = path.join(dstAbs, name);

    const dstKind = await entryKind(dstItem);
    if (dstKind === null) {
      changed.push(name);
      continue;
    }

    const srcKind = await entryKind(srcItem);
    if (srcKind === "file" && dstKind === "file") {
      if (!(await comparer.same(srcItem, dstItem))) changed.push(name);
    }
  }

  return toDiffResult(changed);
}
