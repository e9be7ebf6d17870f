import path from "node:path";

import type { StoredSnapshot, TagTarget } from "@dirsnap/core-domain";

import type { ArchiveStore } from "../ports/archive-store";
import type { BackupPointerStore } from "../ports/backup-pointer-store";
import type { DirectoryLock } from "../ports/directory-lock";
import type { Logger } from "../ports/logger";
import type { TagIndex } from "../ports/tag-index";
import { ArchiveMissingError, DirectoryMissingError } from "../application/errors";
import { isDirectory } from "../infra/fs-utils";

export type RevertResult = {
  directory: string;
  archive: string;
};

/**
 * Reverts are one-way: no snapshot of the pre-revert state is taken. Going
 * back further means picking an earlier link of the chain.
 */
export class RevertService {
  constructor(
    private readonly deps: {
      archives: ArchiveStore;
      pointers: BackupPointerStore;
      tags: TagIndex;
      lock: DirectoryLock;
      logger: Logger;
    }
  ) {}

  /** Reverts to `archive` (key or path), or to the directory's latest snapshot. */
  async revert(directory: string, archive?: string): Promise<RevertResult> {
    const { archives, pointers, lock, logger } = this.deps;
    const dirAbs = path.resolve(directory);

    return lock.withLock(dirAbs, async () => {
      if (!(await isDirectory(dirAbs))) throw new DirectoryMissingError(dirAbs);

      const target = archive ?? (await pointers.readPointer(dirAbs));
      const handle = await archives.readSnapshot(target);

      await archives.extract(handle.archivePath, dirAbs);
      logger.info(`Reverted ${dirAbs} to ${handle.key ?? handle.archivePath}`);
      return { directory: dirAbs, archive: handle.archivePath };
    });
  }

  /** Tags can outlive their archives; that is reported, not trusted. */
  async revertTag(tag: string): Promise<RevertResult> {
    const target: TagTarget = await this.deps.tags.resolveTag(tag);
    if (!(await this.deps.archives.exists(target.archive))) {
      throw new ArchiveMissingError(target.archive);
    }
    return this.revert(target.directory, target.archive);
  }

  listRepository(): Promise<StoredSnapshot[]> {
    return this.deps.archives.listSnapshots();
  }

  /**
   * Manual revert: restores any repository snapshot into the directory it was
   * taken from, as recorded in the archive itself.
   */
  async revertFromRepository(keyOrArchive: string): Promise<RevertResult> {
    const handle = await this.deps.archives.readSnapshot(keyOrArchive);
    const origin = handle.reader.comment().trim();
    if (origin.length === 0) {
      throw new DirectoryMissingError(
        handle.archivePath,
        `Archive '${handle.archivePath}' does not record its source directory.`
      );
    }
    return this.revert(origin, handle.archivePath);
  }
}
