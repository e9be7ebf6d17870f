/** Marker holding the key of the directory's latest snapshot. */
export const BACKUP_POINTER_FILE = ".dirsnap-backup";

/** Marker listing the source directories a directory pulls from on sync. */
export const SYNC_MANIFEST_FILE = ".dirsnap-sync";

export const RESERVED_NAMES: ReadonlySet<string> = new Set([
  BACKUP_POINTER_FILE,
  SYNC_MANIFEST_FILE,
]);

// management metadata is never user content
export function isReservedName(name: string): boolean {
  return RESERVED_NAMES.has(name);
}
