import type { DirectoryTag, TagRecord, TagTarget } from "@dirsnap/core-domain";

export interface TagIndex {
  setTag(tag: string, directory: string, archive: string): Promise<TagRecord>;
  resolveTag(tag: string): Promise<TagTarget>;
  tagsForDirectory(directory: string): Promise<DirectoryTag[]>;
  listTags(): Promise<TagRecord[]>;
}
