import type { SnapshotKey, SnapshotRecord, StoredSnapshot } from "@dirsnap/core-domain";
import type { ArchiveReader } from "./archive-codec";

export interface SnapshotHandle {
  key: SnapshotKey | null;
  archivePath: string;
  createdAtMs: number;
  reader: ArchiveReader;
}

export interface ArchiveStore {
  readonly repositoryRoot: string;

  createSnapshot(directory: string): Promise<SnapshotRecord>;
  /** Accepts a key or an archive path. */
  readSnapshot(keyOrArchive: string): Promise<SnapshotHandle>;
  extract(keyOrArchive: string, targetDirectory: string): Promise<void>;

  archivePathFor(key: SnapshotKey): string;
  exists(keyOrArchive: string): Promise<boolean>;
  listSnapshots(): Promise<StoredSnapshot[]>;
}
