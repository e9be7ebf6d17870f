import fs from "node:fs/promises";
import path from "node:path";

import { BACKUP_POINTER_FILE, isSnapshotKey, type SnapshotKey } from "@dirsnap/core-domain";

import type { BackupPointerStore } from "../ports/backup-pointer-store";
import {
  DirectoryMissingError,
  PointerCorruptError,
  PointerMissingError,
  errorCode,
} from "../application/errors";
import { isDirectory } from "../infra/fs-utils";

export function pointerPath(directory: string) {
  return path.join(path.resolve(directory), BACKUP_POINTER_FILE);
}

/**
 * Parses the single-line pointer body. A trailing newline is tolerated,
 * anything else that is not a snapshot key is corruption.
 */
export function parsePointer(location: string, raw: string): SnapshotKey {
  const value = raw.replace(/\r?\n$/, "");
  if (!isSnapshotKey(value)) {
    throw new PointerCorruptError(location, raw);
  }
  return value;
}

/**
 * The pointer lives inside the managed directory, so the next snapshot of
 * that directory embeds it. That embedded copy is the chain's back link.
 */
export class NodeBackupPointerStore implements BackupPointerStore {
  async writePointer(directory: string, key: SnapshotKey): Promise<void> {
    if (!isSnapshotKey(key)) {
      throw new PointerCorruptError(path.resolve(directory), key, "refusing to write an invalid key");
    }
    if (!(await isDirectory(directory))) {
      throw new DirectoryMissingError(path.resolve(directory));
    }
    await fs.writeFile(pointerPath(directory), key, "utf-8");
  }

  async readPointer(directory: string): Promise<SnapshotKey> {
    const key = await this.tryReadPointer(directory);
    if (key === null) throw new PointerMissingError(path.resolve(directory));
    return key;
  }

  async tryReadPointer(directory: string): Promise<SnapshotKey | null> {
    let raw: string;
    try {
      raw = await fs.readFile(pointerPath(directory), "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
    return parsePointer(path.resolve(directory), raw);
  }
}
