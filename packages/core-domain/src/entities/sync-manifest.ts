export interface SyncManifest {
  directory: string;
  /** Absolute source paths, in the order they are applied. */
  sources: string[];
}

export function serializeManifest(sources: readonly string[]): string {
  return sources.map((s) => `${s}\n`).join("");
}

export function parseManifest(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
