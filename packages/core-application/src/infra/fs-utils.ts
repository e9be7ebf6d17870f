import fs from "node:fs/promises";

import { errorCode } from "../application/errors";

export async function exists(p: string) {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string) {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return false;
    throw err;
  }
}

export async function isFile(p: string) {
  try {
    return (await fs.stat(p)).isFile();
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return false;
    throw err;
  }
}

/** Writes through a sibling temp file so readers never see a half-written file. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, content, "utf-8");
  await fs.rename(tmp, filePath);
}
