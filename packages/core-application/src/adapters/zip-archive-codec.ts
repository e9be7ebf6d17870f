import fs from "node:fs";
import fsp from "node:fs/promises";
import AdmZip from "adm-zip";
import archiver from "archiver";

import type { ArchiveCodec, ArchiveReader } from "../ports/archive-codec";

/**
 * Zip codec: archiver streams new archives to disk, adm-zip reads and
 * extracts them.
 */
export class ZipArchiveCodec implements ArchiveCodec {
  constructor(private readonly compressionLevel = 9) {}

  async createFromDirectory(directory: string, archivePath: string, comment: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const output = fs.createWriteStream(archivePath);
      const archive = archiver("zip", {
        zlib: { level: this.compressionLevel },
        comment,
      });

      output.on("close", () => resolve());
      output.on("error", reject);
      archive.on("error", reject);
      archive.on("warning", reject);

      archive.pipe(output);
      archive.directory(directory, false);
      archive.finalize().catch(reject);
    });
  }

  /** Loads the whole archive into one buffer. */
  async open(archivePath: string): Promise<ArchiveReader> {
    const buffer = await fsp.readFile(archivePath);
    return new AdmZipReader(new AdmZip(buffer));
  }
}

class AdmZipReader implements ArchiveReader {
  constructor(private readonly zip: AdmZip) {}

  readText(entryName: string): string | null {
    const entry = this.zip.getEntry(entryName);
    if (!entry || entry.isDirectory) return null;
    return entry.getData().toString("utf-8");
  }

  comment(): string {
    return this.zip.getZipComment();
  }

  async extractTo(targetDirectory: string): Promise<void> {
    await fsp.mkdir(targetDirectory, { recursive: true });
    await new Promise<void>((resolve, reject) => {
      this.zip.extractAllToAsync(targetDirectory, true, true, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
