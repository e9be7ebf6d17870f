import type { SnapshotKey } from "../value-objects/ids";

/** A snapshot that was just written to the repository. */
export interface SnapshotRecord {
  key: SnapshotKey;
  archivePath: string;
  /** Absolute path of the directory the archive was taken from. */
  directory: string;
}

/** A snapshot as found in the repository, with filesystem-derived time. */
export interface StoredSnapshot {
  key: SnapshotKey;
  archivePath: string;
  /** Absent when the archive carries no source comment. */
  directory: string | null;
  createdAtMs: number;
}

/** One link of a directory's backup chain, newest first. */
export interface HistoryEntry {
  key: SnapshotKey;
  archivePath: string;
  createdAtMs: number;
}
