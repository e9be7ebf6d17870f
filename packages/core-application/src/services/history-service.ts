import path from "node:path";

import { BACKUP_POINTER_FILE, type HistoryEntry, type SnapshotKey } from "@dirsnap/core-domain";

import type { ArchiveStore } from "../ports/archive-store";
import type { BackupPointerStore } from "../ports/backup-pointer-store";
import { DirectoryMissingError, PointerCorruptError } from "../application/errors";
import { parsePointer } from "../adapters/node-backup-pointer-store";
import { isDirectory } from "../infra/fs-utils";

/**
 * Walks a directory's backup chain. There is no separate index: each archive
 * is a full copy of the directory, including the pointer that named the
 * previous snapshot, so following embedded pointers reconstructs history.
 */
export class HistoryService {
  constructor(
    private readonly deps: {
      archives: ArchiveStore;
      pointers: BackupPointerStore;
    }
  ) {}

  /** Newest first; restartable, each call re-reads the chain from disk. */
  async *walk(directory: string): AsyncGenerator<HistoryEntry> {
    const { archives, pointers } = this.deps;
    const dirAbs = path.resolve(directory);

    if (!(await isDirectory(dirAbs))) throw new DirectoryMissingError(dirAbs);

    let key: SnapshotKey | null = await pointers.tryReadPointer(dirAbs);
    const seen = new Set<SnapshotKey>();

    while (key !== null) {
      if (seen.has(key)) {
        throw new PointerCorruptError(archives.archivePathFor(key), key, "history loops back on itself");
      }
      seen.add(key);

      const handle = await archives.readSnapshot(key);
      yield { key, archivePath: handle.archivePath, createdAtMs: handle.createdAtMs };

      const embedded = handle.reader.readText(BACKUP_POINTER_FILE);
      key = embedded === null ? null : parsePointer(handle.archivePath, embedded);
    }
  }

  /** Empty when the directory was never backed up. */
  async history(directory: string): Promise<HistoryEntry[]> {
    const out: HistoryEntry[] = [];
    for await (const entry of this.walk(directory)) out.push(entry);
    return out;
  }
}
