import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Clock } from "../ports/clock";
import type { DirsnapConfig } from "../application/config";

export async function makeTempRoot(prefix = "dirsnap-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempRoot(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

/** Writes `{ relativePath: content }` under `root`, creating parents. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content, "utf-8");
  }
}

/** Every file under `root` as `{ posixRelativePath: content }`, empty dirs as `dir/`. */
export async function readTree(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};

  async function walk(dirAbs: string) {
    const entries = await fs.readdir(dirAbs, { withFileTypes: true });
    if (entries.length === 0 && dirAbs !== root) {
      out[`${path.relative(root, dirAbs).split(path.sep).join("/")}/`] = "";
    }
    for (const e of entries) {
      const abs = path.join(dirAbs, e.name);
      if (e.isDirectory()) await walk(abs);
      else out[path.relative(root, abs).split(path.sep).join("/")] = await fs.readFile(abs, "utf-8");
    }
  }

  await walk(root);
  return out;
}

export function testConfig(repositoryRoot: string): DirsnapConfig {
  return {
    repositoryRoot,
    tagIndexPath: path.join(repositoryRoot, "tags.json"),
    locksDir: path.join(repositoryRoot, "locks"),
    logLevel: "silent",
    assumeYes: true,
    watchDebounceMs: 10,
  };
}

/** Clock that advances by `stepMs` on every read. */
export function steppingClock(startIso: string, stepMs = 1000): Clock {
  let current = new Date(startIso).getTime();
  return {
    now: () => {
      const at = new Date(current);
      current += stepMs;
      return at;
    },
  };
}
