import type { SnapshotKey } from "@dirsnap/core-domain";

export interface BackupPointerStore {
  writePointer(directory: string, key: SnapshotKey): Promise<void>;
  readPointer(directory: string): Promise<SnapshotKey>;
  /** null when the directory has never been backed up. */
  tryReadPointer(directory: string): Promise<SnapshotKey | null>;
}
