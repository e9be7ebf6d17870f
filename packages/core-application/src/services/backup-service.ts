import path from "node:path";

import type { SnapshotRecord, TagRecord } from "@dirsnap/core-domain";

import type { ArchiveStore } from "../ports/archive-store";
import type { BackupPointerStore } from "../ports/backup-pointer-store";
import type { Logger } from "../ports/logger";
import type { TagIndex } from "../ports/tag-index";

export type BackupResult = SnapshotRecord & {
  tag: TagRecord | null;
};

/**
 * Snapshot, then pointer, then (optionally) tag. The pointer is written only
 * once the archive is in place, so it never names a missing archive.
 */
export class BackupService {
  constructor(
    private readonly deps: {
      archives: ArchiveStore;
      pointers: BackupPointerStore;
      tags: TagIndex;
      logger: Logger;
    }
  ) {}

  async backup(directory: string, options: { tag?: string } = {}): Promise<BackupResult> {
    const { archives, pointers, tags, logger } = this.deps;
    const dirAbs = path.resolve(directory);

    const snapshot = await archives.createSnapshot(dirAbs);
    await pointers.writePointer(dirAbs, snapshot.key);

    let tag: TagRecord | null = null;
    if (options.tag !== undefined) {
      tag = await tags.setTag(options.tag, dirAbs, snapshot.archivePath);
    }

    logger.info(
      `Backed up ${dirAbs} as ${snapshot.key}` + (tag ? ` (tag '${tag.tag}')` : "")
    );
    return { ...snapshot, tag };
  }
}
