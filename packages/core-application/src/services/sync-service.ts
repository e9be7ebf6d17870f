import fs from "node:fs/promises";
import path from "node:path";

import {
  SYNC_MANIFEST_FILE,
  parseManifest,
  serializeManifest,
  type SyncManifest,
} from "@dirsnap/core-domain";

import type { DirectoryLock } from "../ports/directory-lock";
import type { Logger } from "../ports/logger";
import {
  DirectoryMissingError,
  ManifestEmptyError,
  ManifestMissingError,
  errorCode,
} from "../application/errors";
import { isDirectory } from "../infra/fs-utils";
import type { ApplyService } from "./apply-service";
import type { BackupResult, BackupService } from "./backup-service";

export function manifestPath(directory: string) {
  return path.join(path.resolve(directory), SYNC_MANIFEST_FILE);
}

export type SyncPass = {
  source: string;
  diff: readonly string[];
  copied: string[];
};

export type SyncRunSummary = {
  directory: string;
  snapshot: BackupResult;
  passes: SyncPass[];
};

async function requireSources(sources: readonly string[]) {
  for (const source of sources) {
    if (!(await isDirectory(source))) {
      throw new DirectoryMissingError(source, `Invalid source dir: '${source}'.`);
    }
  }
}

export class SyncService {
  constructor(
    private readonly deps: {
      apply: ApplyService;
      backups: BackupService;
      lock: DirectoryLock;
      logger: Logger;
    }
  ) {}

  async createManifest(directory: string, sources: readonly string[]): Promise<SyncManifest> {
    const dirAbs = path.resolve(directory);
    if (!(await isDirectory(dirAbs))) throw new DirectoryMissingError(dirAbs);
    if (sources.length === 0) throw new ManifestEmptyError(dirAbs);

    const absolute = sources.map((s) => path.resolve(s));
    await requireSources(absolute);

    await fs.writeFile(manifestPath(dirAbs), serializeManifest(absolute), "utf-8");
    this.deps.logger.info(`Sync manifest for ${dirAbs}: ${absolute.length} source(s)`);
    return { directory: dirAbs, sources: absolute };
  }

  async readManifest(directory: string): Promise<SyncManifest> {
    const dirAbs = path.resolve(directory);

    let raw: string;
    try {
      raw = await fs.readFile(manifestPath(dirAbs), "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") {
        throw new ManifestMissingError(dirAbs);
      }
      throw err;
    }

    const sources = parseManifest(raw);
    if (sources.length === 0) throw new ManifestEmptyError(dirAbs);
    return { directory: dirAbs, sources };
  }

  /**
   * One snapshot up front for the whole run, then one diff/apply pass per
   * source in manifest order with auto-backup off. The snapshot is taken even
   * when every pass turns out empty.
   */
  async sync(directory: string, options: { tag?: string } = {}): Promise<SyncRunSummary> {
    const { apply, backups, lock, logger } = this.deps;
    const dirAbs = path.resolve(directory);

    return lock.withLock(dirAbs, async () => {
      if (!(await isDirectory(dirAbs))) throw new DirectoryMissingError(dirAbs);

      const manifest = await this.readManifest(dirAbs);
      await requireSources(manifest.sources);

      const snapshot = await backups.backup(dirAbs, { tag: options.tag });

      const passes: SyncPass[] = [];
      for (const source of manifest.sources) {
        const diff = await apply.diff(source, dirAbs);
        const { copied } = await apply.applyDiff(source, dirAbs, diff, { autoBackup: false });
        passes.push({ source, diff, copied });
        logger.debug(`sync pass ${source}: ${copied.length} copied`);
      }

      return { directory: dirAbs, snapshot, passes };
    });
  }
}
