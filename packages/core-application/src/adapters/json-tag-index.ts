import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import {
  normalizeTagName,
  type DirectoryTag,
  type TagRecord,
  type TagTarget,
} from "@dirsnap/core-domain";

import type { ArchiveStore } from "../ports/archive-store";
import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { TagIndex } from "../ports/tag-index";
import {
  DirectoryMissingError,
  InvalidTagError,
  TagNotFoundError,
  errorCode,
} from "../application/errors";
import { isDirectory, writeFileAtomic } from "../infra/fs-utils";

const tagRecordSchema = z.object({
  tag: z.string().min(1),
  directory: z.string().min(1),
  archive: z.string().min(1),
  taggedAtIso: z.string(),
});

const tagIndexFileSchema = z.object({
  version: z.literal(1),
  tags: z.record(z.string(), tagRecordSchema),
});

type TagIndexFile = z.infer<typeof tagIndexFileSchema>;

const EMPTY_INDEX: TagIndexFile = { version: 1, tags: {} };

/**
 * Tag -> (directory, archive) table kept in one JSON file. Lookups by tag hit
 * the record map, lookups by directory scan it. Records are never removed,
 * including when their archive disappears.
 */
export class JsonTagIndex implements TagIndex {
  constructor(
    private readonly indexPath: string,
    private readonly archives: ArchiveStore,
    private readonly clock: Clock = systemClock
  ) {}

  async setTag(tag: string, directory: string, archive: string): Promise<TagRecord> {
    const name = normalizeTagName(tag);
    if (name === null) throw new InvalidTagError(tag);

    const dirAbs = path.resolve(directory);
    if (!(await isDirectory(dirAbs))) throw new DirectoryMissingError(dirAbs);

    // opening it is the validity check; later loss is detected on read
    const handle = await this.archives.readSnapshot(archive);

    const record: TagRecord = {
      tag: name,
      directory: dirAbs,
      archive: handle.archivePath,
      taggedAtIso: this.clock.now().toISOString(),
    };

    const data = await this.load();
    data.tags[name] = record;
    await this.save(data);
    return record;
  }

  async resolveTag(tag: string): Promise<TagTarget> {
    const name = normalizeTagName(tag);
    const data = await this.load();
    const record = name === null ? undefined : data.tags[name];
    if (!record) throw new TagNotFoundError(tag);
    return { directory: record.directory, archive: record.archive };
  }

  async tagsForDirectory(directory: string): Promise<DirectoryTag[]> {
    const dirAbs = path.resolve(directory);
    const data = await this.load();

    const out: DirectoryTag[] = [];
    for (const record of Object.values(data.tags)) {
      if (record.directory !== dirAbs) continue;
      try {
        const stat = await fs.stat(record.archive);
        if (!stat.isFile()) continue;
        out.push({ tag: record.tag, archive: record.archive, createdAtMs: stat.mtimeMs });
      } catch (err) {
        if (errorCode(err) === "ENOENT") continue;
        throw err;
      }
    }

    return out.sort((a, b) => b.createdAtMs - a.createdAtMs || a.tag.localeCompare(b.tag));
  }

  async listTags(): Promise<TagRecord[]> {
    const data = await this.load();
    return Object.values(data.tags).sort((a, b) => a.tag.localeCompare(b.tag));
  }

  private async load(): Promise<TagIndexFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.indexPath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return { ...EMPTY_INDEX, tags: {} };
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Invalid JSON in tag index ${this.indexPath}: ${String(error)}`);
    }

    const result = tagIndexFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Tag index ${this.indexPath} is malformed: ${result.error.message}`);
    }
    return result.data;
  }

  private async save(data: TagIndexFile): Promise<void> {
    await fs.mkdir(path.dirname(this.indexPath), { recursive: true });
    await writeFileAtomic(this.indexPath, JSON.stringify(data, null, 2));
  }
}
