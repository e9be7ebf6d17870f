import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import fs from "node:fs/promises";

import type { FileComparer } from "../ports/file-comparer";

export function sha256File(absolutePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    createReadStream(absolutePath)
      .on("data", (chunk) => hash.update(chunk))
      .on("error", reject)
      .on("end", () => resolve(hash.digest("hex")));
  });
}

/** Size first, then sha256 of both sides. */
export class NodeFileComparer implements FileComparer {
  async same(leftPath: string, rightPath: string): Promise<boolean> {
    const [left, right] = await Promise.all([fs.stat(leftPath), fs.stat(rightPath)]);
    if (left.size !== right.size) return false;

    const [leftHash, rightHash] = await Promise.all([sha256File(leftPath), sha256File(rightPath)]);
    return leftHash === rightHash;
  }
}
