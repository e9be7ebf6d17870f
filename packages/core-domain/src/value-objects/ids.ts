/**
 * Snapshot keys are time-derived, not content-derived: two snapshots of the
 * same bytes are distinct entities.
 *
 * Format: `snap-2024-05-01T093015123Z-0007-9f86d081`
 *   - ISO timestamp with `:` and `.` stripped
 *   - 4-digit per-process sequence
 *   - 8 hex chars of randomness
 */
export type SnapshotKey = string;

const SNAPSHOT_KEY_RE = /^snap-\d{4}-\d{2}-\d{2}T\d{9}Z-\d{4}-[0-9a-f]{8}$/;

export const SNAPSHOT_KEY_SEQUENCE_MODULO = 10_000;

export function isSnapshotKey(value: string): value is SnapshotKey {
  return SNAPSHOT_KEY_RE.test(value);
}

export function formatSnapshotKey(params: {
  at: Date;
  sequence: number;
  randomHex: string;
}): SnapshotKey {
  const stamp = params.at.toISOString().replaceAll(":", "").replaceAll(".", "");
  const seq = String(params.sequence % SNAPSHOT_KEY_SEQUENCE_MODULO).padStart(4, "0");
  const key = `snap-${stamp}-${seq}-${params.randomHex.toLowerCase()}`;

  if (!isSnapshotKey(key)) {
    throw new RangeError(`Cannot build a snapshot key from ${JSON.stringify(params)}`);
  }
  return key;
}
