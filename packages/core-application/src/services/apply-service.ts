import fs from "node:fs/promises";
import path from "node:path";

import { isReservedName, type DiffResult } from "@dirsnap/core-domain";

import type { DirectoryLock } from "../ports/directory-lock";
import type { FileComparer } from "../ports/file-comparer";
import type { FileCopier } from "../ports/file-copier";
import type { Logger } from "../ports/logger";
import { CopyFailedError, DirectoryMissingError, InvalidTagError } from "../application/errors";
import { exists, isDirectory } from "../infra/fs-utils";
import type { BackupResult, BackupService } from "./backup-service";
import { computeDiff } from "./diff-engine";

/** Caller-side decision hook; the engine itself never prompts. */
export type ConfirmDiff = (
  diff: DiffResult,
  context: { source: string; destination: string }
) => boolean | Promise<boolean>;

export type ApplyOptions = {
  autoBackup?: boolean;
  tag?: string;
};

export type ApplyResult = {
  copied: string[];
  snapshot: BackupResult | null;
};

export type CopyResult = ApplyResult & {
  diff: DiffResult;
  declined: boolean;
};

async function destinationState(dstAbs: string): Promise<"missing" | "directory"> {
  if (await isDirectory(dstAbs)) return "directory";
  if (await exists(dstAbs)) {
    throw new DirectoryMissingError(dstAbs, `Destination '${dstAbs}' is not a directory.`);
  }
  return "missing";
}

/** A tag names a snapshot; without one there is nothing to record. */
function assertTaggable(tag: string | undefined, dstAbs: string, willSnapshot: boolean) {
  if (tag === undefined || willSnapshot) return;
  throw new InvalidTagError(
    tag,
    `Tag ${JSON.stringify(tag)} not recorded: no snapshot of '${dstAbs}' is taken by this copy.`
  );
}

export class ApplyService {
  constructor(
    private readonly deps: {
      backups: BackupService;
      comparer: FileComparer;
      copier: FileCopier;
      lock: DirectoryLock;
      logger: Logger;
    }
  ) {}

  diff(source: string, destination: string): Promise<DiffResult> {
    return computeDiff(source, destination, this.deps.comparer);
  }

  /**
   * Applies a precomputed diff. The snapshot (and tag) is complete before the
   * first copy starts. Copies stop at the first failure; what was copied stays
   * copied and the snapshot is the way back.
   */
  async applyDiff(
    source: string,
    destination: string,
    diff: DiffResult,
    options: ApplyOptions = {}
  ): Promise<ApplyResult> {
    const { backups, copier, logger } = this.deps;
    const srcAbs = path.resolve(source);
    const dstAbs = path.resolve(destination);
    const autoBackup = options.autoBackup ?? true;

    const entries = diff.filter((name) => !isReservedName(name));
    if (entries.length === 0) {
      logger.debug(`No changes from ${srcAbs} to ${dstAbs}`);
      return { copied: [], snapshot: null };
    }

    if (!(await isDirectory(srcAbs))) {
      throw new DirectoryMissingError(srcAbs, `Invalid source dir: '${srcAbs}'.`);
    }

    const state = await destinationState(dstAbs);
    assertTaggable(options.tag, dstAbs, autoBackup && state === "directory");

    let snapshot: BackupResult | null = null;
    if (state === "directory") {
      if (autoBackup) {
        snapshot = await backups.backup(dstAbs, { tag: options.tag });
      }
    } else {
      // first sync: nothing to protect
      await fs.mkdir(dstAbs, { recursive: true });
      logger.debug(`Created ${dstAbs}`);
    }

    const copied: string[] = [];
    for (const name of entries) {
      const srcItem = path.join(srcAbs, name);
      const dstItem = path.join(dstAbs, name);
      try {
        if (await isDirectory(srcItem)) {
          await copier.copyTree(srcItem, dstItem, isReservedName);
        } else {
          await copier.copyFile(srcItem, dstItem);
        }
      } catch (err) {
        logger.error(`Copy failed after ${copied.length} of ${entries.length} entries`, err);
        throw new CopyFailedError(srcItem, dstItem, [...copied], err);
      }
      copied.push(name);
      logger.debug(`copied ${name}`);
    }

    logger.info(`Copied ${copied.length} entr${copied.length === 1 ? "y" : "ies"} into ${dstAbs}`);
    return { copied, snapshot };
  }

  /** perform-copy: diff, let the caller decide, apply under the destination lock. */
  async copy(
    source: string,
    destination: string,
    options: { tag?: string; confirm?: ConfirmDiff } = {}
  ): Promise<CopyResult> {
    const srcAbs = path.resolve(source);
    const dstAbs = path.resolve(destination);

    return this.deps.lock.withLock(dstAbs, async () => {
      const diff = await this.diff(srcAbs, dstAbs);
      if (diff.length === 0) {
        this.deps.logger.info("No changes found.");
        return { diff, copied: [], snapshot: null, declined: false };
      }

      // checked before the caller is asked
      assertTaggable(options.tag, dstAbs, (await destinationState(dstAbs)) === "directory");

      if (options.confirm) {
        const accepted = await options.confirm(diff, { source: srcAbs, destination: dstAbs });
        if (!accepted) {
          this.deps.logger.info("Nothing copied.");
          return { diff, copied: [], snapshot: null, declined: true };
        }
      }

      const applied = await this.applyDiff(srcAbs, dstAbs, diff, { tag: options.tag });
      return { diff, ...applied, declined: false };
    });
  }
}
