import type { ArchiveCodec } from "../ports/archive-codec";
import type { ArchiveStore } from "../ports/archive-store";
import type { BackupPointerStore } from "../ports/backup-pointer-store";
import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { DirectoryLock } from "../ports/directory-lock";
import type { FileComparer } from "../ports/file-comparer";
import type { FileCopier } from "../ports/file-copier";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import type { TagIndex } from "../ports/tag-index";

import { FileDirectoryLock } from "../adapters/apply-lock";
import { JsonTagIndex } from "../adapters/json-tag-index";
import { NodeArchiveStore } from "../adapters/node-archive-store";
import { NodeBackupPointerStore } from "../adapters/node-backup-pointer-store";
import { NodeFileComparer } from "../adapters/node-file-comparer";
import { NodeFileCopier } from "../adapters/node-file-copier";
import { ZipArchiveCodec } from "../adapters/zip-archive-codec";

import { ApplyService } from "../services/apply-service";
import { BackupService } from "../services/backup-service";
import { HistoryService } from "../services/history-service";
import { RevertService } from "../services/revert-service";
import { SyncService } from "../services/sync-service";

import type { DirsnapConfig } from "./config";

export type DirsnapOverrides = {
  logger?: Logger;
  clock?: Clock;
  codec?: ArchiveCodec;
  comparer?: FileComparer;
  copier?: FileCopier;
  lock?: DirectoryLock;
};

export type Dirsnap = {
  config: DirsnapConfig;
  archives: ArchiveStore;
  pointers: BackupPointerStore;
  tags: TagIndex;
  backups: BackupService;
  history: HistoryService;
  apply: ApplyService;
  sync: SyncService;
  revert: RevertService;
};

/** Wires the services around one repository root. */
export function createDirsnap(config: DirsnapConfig, overrides: DirsnapOverrides = {}): Dirsnap {
  const logger = overrides.logger ?? silentLogger;
  const clock = overrides.clock ?? systemClock;
  const lock = overrides.lock ?? new FileDirectoryLock(config.locksDir, config.repositoryRoot);

  const archives = new NodeArchiveStore({
    repositoryRoot: config.repositoryRoot,
    codec: overrides.codec ?? new ZipArchiveCodec(),
    clock,
    logger,
  });
  const pointers = new NodeBackupPointerStore();
  const tags = new JsonTagIndex(config.tagIndexPath, archives, clock);

  const backups = new BackupService({ archives, pointers, tags, logger });
  const history = new HistoryService({ archives, pointers });
  const apply = new ApplyService({
    backups,
    comparer: overrides.comparer ?? new NodeFileComparer(),
    copier: overrides.copier ?? new NodeFileCopier(),
    lock,
    logger,
  });
  const sync = new SyncService({ apply, backups, lock, logger });
  const revert = new RevertService({ archives, pointers, tags, lock, logger });

  return { config, archives, pointers, tags, backups, history, apply, sync, revert };
}
