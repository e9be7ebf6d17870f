export type TagName = string;

export interface TagRecord {
  tag: TagName;
  directory: string;
  archive: string;
  taggedAtIso: string;
}

export interface TagTarget {
  directory: string;
  archive: string;
}

export interface DirectoryTag {
  tag: TagName;
  archive: string;
  createdAtMs: number;
}

export function normalizeTagName(raw: string): TagName | null {
  const tag = raw.trim();
  return tag.length > 0 ? tag : null;
}
