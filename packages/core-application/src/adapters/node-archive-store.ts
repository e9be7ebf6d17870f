import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import {
  formatSnapshotKey,
  isSnapshotKey,
  SNAPSHOT_KEY_SEQUENCE_MODULO,
  type SnapshotKey,
  type SnapshotRecord,
  type StoredSnapshot,
} from "@dirsnap/core-domain";

import type { ArchiveCodec, ArchiveReader } from "../ports/archive-codec";
import type { ArchiveStore, SnapshotHandle } from "../ports/archive-store";
import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import {
  ArchiveMissingError,
  DirectoryMissingError,
  RepositoryUnavailableError,
} from "../application/errors";
import { exists, isDirectory, isFile } from "../infra/fs-utils";
import { ZipArchiveCodec } from "./zip-archive-codec";

export const ARCHIVE_EXTENSION = ".zip";

const MAX_KEY_ATTEMPTS = 5;

export type NodeArchiveStoreOptions = {
  repositoryRoot: string;
  codec?: ArchiveCodec;
  clock?: Clock;
  logger?: Logger;
  randomHex?: () => string;
};

/**
 * Snapshot repository on disk: one `<key>.zip` per snapshot, the zip comment
 * carrying the absolute path of the directory it was taken from.
 */
export class NodeArchiveStore implements ArchiveStore {
  readonly repositoryRoot: string;

  private readonly codec: ArchiveCodec;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly randomHex: () => string;
  private sequence = 0;

  constructor(options: NodeArchiveStoreOptions) {
    this.repositoryRoot = path.resolve(options.repositoryRoot);
    this.codec = options.codec ?? new ZipArchiveCodec();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.randomHex = options.randomHex ?? (() => randomBytes(4).toString("hex"));
  }

  archivePathFor(key: SnapshotKey): string {
    return path.join(this.repositoryRoot, `${key}${ARCHIVE_EXTENSION}`);
  }

  /** Keys map into the repository, anything else is taken as a path. */
  resolveArchivePath(keyOrArchive: string): string {
    if (isSnapshotKey(keyOrArchive)) return this.archivePathFor(keyOrArchive);
    return path.resolve(keyOrArchive);
  }

  async exists(keyOrArchive: string): Promise<boolean> {
    return isFile(this.resolveArchivePath(keyOrArchive));
  }

  async createSnapshot(directory: string): Promise<SnapshotRecord> {
    const dirAbs = path.resolve(directory);
    if (!(await isDirectory(dirAbs))) {
      throw new DirectoryMissingError(dirAbs);
    }

    await this.ensureRepository();

    const key = await this.nextFreeKey();
    const archivePath = this.archivePathFor(key);
    const partialPath = `${archivePath}.partial`;

    try {
      await this.codec.createFromDirectory(dirAbs, partialPath, dirAbs);
      await fs.rename(partialPath, archivePath);
    } catch (err) {
      await fs.rm(partialPath, { force: true });
      throw err;
    }

    this.logger.debug(`snapshot ${key} <- ${dirAbs}`);
    return { key, archivePath, directory: dirAbs };
  }

  async readSnapshot(keyOrArchive: string): Promise<SnapshotHandle> {
    const archivePath = this.resolveArchivePath(keyOrArchive);

    let createdAtMs: number;
    try {
      const stat = await fs.stat(archivePath);
      if (!stat.isFile()) throw new ArchiveMissingError(archivePath);
      createdAtMs = stat.mtimeMs;
    } catch (err) {
      if (err instanceof ArchiveMissingError) throw err;
      throw new ArchiveMissingError(archivePath, err);
    }

    let reader: ArchiveReader;
    try {
      reader = await this.codec.open(archivePath);
    } catch (err) {
      throw new ArchiveMissingError(archivePath, err);
    }

    return {
      key: keyFromArchivePath(archivePath),
      archivePath,
      createdAtMs,
      reader,
    };
  }

  /**
   * Replaces the contents of `targetDirectory` with the snapshot. The archive
   * is opened before anything is removed; once removal starts there is no
   * undo, a failure leaves the target partially empty. The whole archive is
   * held in memory while it is read.
   */
  async extract(keyOrArchive: string, targetDirectory: string): Promise<void> {
    const handle = await this.readSnapshot(keyOrArchive);
    const targetAbs = path.resolve(targetDirectory);

    if (await exists(targetAbs)) {
      const entries = await fs.readdir(targetAbs);
      for (const name of entries) {
        await fs.rm(path.join(targetAbs, name), { recursive: true, force: true });
      }
    }

    await handle.reader.extractTo(targetAbs);
    this.logger.debug(`extracted ${handle.archivePath} -> ${targetAbs}`);
  }

  async listSnapshots(): Promise<StoredSnapshot[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.repositoryRoot);
    } catch {
      return [];
    }

    const out: StoredSnapshot[] = [];
    for (const name of names) {
      if (!name.endsWith(ARCHIVE_EXTENSION)) continue;
      const key = name.slice(0, -ARCHIVE_EXTENSION.length);
      if (!isSnapshotKey(key)) continue;

      try {
        const handle = await this.readSnapshot(key);
        const comment = handle.reader.comment().trim();
        out.push({
          key,
          archivePath: handle.archivePath,
          directory: comment.length > 0 ? comment : null,
          createdAtMs: handle.createdAtMs,
        });
      } catch (err) {
        this.logger.warn(`skipping unreadable archive ${name}: ${String(err)}`);
      }
    }

    // keys start with the UTC timestamp, so they sort chronologically
    return out.sort((a, b) => (a.key < b.key ? 1 : a.key > b.key ? -1 : 0));
  }

  private async ensureRepository(): Promise<void> {
    try {
      await fs.mkdir(this.repositoryRoot, { recursive: true });
    } catch (err) {
      throw new RepositoryUnavailableError(this.repositoryRoot, err);
    }
    if (!(await isDirectory(this.repositoryRoot))) {
      throw new RepositoryUnavailableError(this.repositoryRoot);
    }
  }

  /**
   * Clock + per-store sequence + random bits, and never a key whose archive
   * already exists in the repository.
   */
  private async nextFreeKey(): Promise<SnapshotKey> {
    for (let attempt = 0; attempt < MAX_KEY_ATTEMPTS; attempt++) {
      this.sequence = (this.sequence + 1) % SNAPSHOT_KEY_SEQUENCE_MODULO;
      const key = formatSnapshotKey({
        at: this.clock.now(),
        sequence: this.sequence,
        randomHex: this.randomHex(),
      });
      const archivePath = this.archivePathFor(key);
      if (!(await exists(archivePath)) && !(await exists(`${archivePath}.partial`))) {
        return key;
      }
    }
    throw new RepositoryUnavailableError(
      this.repositoryRoot,
      new Error(`could not allocate a unique snapshot key after ${MAX_KEY_ATTEMPTS} attempts`)
    );
  }
}

function keyFromArchivePath(archivePath: string): SnapshotKey | null {
  const base = path.basename(archivePath);
  if (!base.endsWith(ARCHIVE_EXTENSION)) return null;
  const key = base.slice(0, -ARCHIVE_EXTENSION.length);
  return isSnapshotKey(key) ? key : null;
}
