import fs from "node:fs/promises";
import path from "node:path";

import type { FileCopier } from "../ports/file-copier";

export class NodeFileCopier implements FileCopier {
  async copyFile(sourcePath: string, destinationPath: string): Promise<void> {
    await fs.mkdir(path.dirname(destinationPath), { recursive: true });
    await fs.copyFile(sourcePath, destinationPath);
  }

  async copyTree(
    sourcePath: string,
    destinationPath: string,
    skip: (name: string) => boolean
  ): Promise<void> {
    await fs.cp(sourcePath, destinationPath, {
      recursive: true,
      force: true,
      errorOnExist: false,
      preserveTimestamps: true,
      // root is the entry itself, already vetted by the caller
      filter: (src) => src === sourcePath || !skip(path.basename(src)),
    });
  }
}
