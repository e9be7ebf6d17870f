import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createDirsnap, resolveConfig, silentLogger } from "@dirsnap/core-application";

import { runCli, type CliContext } from "./commands";

describe("runCli", () => {
  let root: string;
  let src: string;
  let dst: string;
  let out: string[];
  let err: string[];
  let ask: ReturnType<typeof vi.fn>;
  let ctx: CliContext;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "dirsnap-cli-"));
    src = path.join(root, "src");
    dst = path.join(root, "dst");
    await fs.mkdir(src);
    await fs.mkdir(dst);
    await fs.writeFile(path.join(src, "a.txt"), "a");
    await fs.writeFile(path.join(dst, "old.txt"), "old");

    out = [];
    err = [];
    ask = vi.fn().mockResolvedValue("y");
    const config = resolveConfig({ env: { DIRSNAP_HOME: path.join(root, "repo") }, homedir: root });
    ctx = {
      app: createDirsnap(config),
      logger: silentLogger,
      io: { out: (l) => out.push(l), err: (l) => err.push(l), ask },
    };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("prints usage without a command", async () => {
    expect(await runCli([], ctx)).toBe(0);
    expect(out[0]).toMatch(/^Usage: dirsnap <command>/);
  });

  it("asks before copying and copies on yes", async () => {
    const code = await runCli(["cp", src, dst], ctx);

    expect(code).toBe(0);
    expect(ask).toHaveBeenCalledWith("\nCopy all (y/n)? ");
    expect(out[0]).toBe("a.txt");
    expect(out[1]).toBe("Copied 1 entries.");
    expect(out[2]).toMatch(/^Snapshot: snap-/);
    expect(await fs.readFile(path.join(dst, "a.txt"), "utf-8")).toBe("a");
  });

  it("copies nothing on no", async () => {
    ask.mockResolvedValue("n");

    expect(await runCli(["cp", src, dst], ctx)).toBe(0);

    expect(out).toEqual(["a.txt", "Nothing copied."]);
    await expect(fs.stat(path.join(dst, "a.txt"))).rejects.toThrow();
  });

  it("skips the question with --yes and reports no changes afterwards", async () => {
    await runCli(["cp", src, dst, "--yes"], ctx);
    out.length = 0;

    await runCli(["cp", src, dst, "--yes"], ctx);

    expect(ask).not.toHaveBeenCalled();
    expect(out).toEqual(["No changes found."]);
  });

  it("lists history and reverts", async () => {
    await runCli(["cp", src, dst, "-y", "--tag", "first"], ctx);
    out.length = 0;

    await runCli(["history", dst], ctx);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatch(new RegExp(`^${path.join(root, "repo")}.*\\.zip : \\d{4}-`));

    expect(await runCli(["rvtag", "first"], ctx)).toBe(0);
    expect(await fs.readdir(dst)).toEqual(["old.txt"]);
  });

  it("maps domain failures to exit code 1", async () => {
    const code = await runCli(["rv", dst], ctx);

    expect(code).toBe(1);
    expect(err).toEqual([`Error: Backup pointer missing in '${dst}'.`]);
  });

  it("maps bad usage to exit code 2", async () => {
    expect(await runCli(["frobnicate"], ctx)).toBe(2);
    expect(err).toEqual(["Error: Unknown command 'frobnicate'"]);

    err.length = 0;
    expect(await runCli(["cp", src], ctx)).toBe(2);
    expect(err).toEqual(["Error: 'cp' expects 2 argument(s), got 1"]);
  });

  it("creates a manifest and syncs from it", async () => {
    expect(await runCli(["mksync", dst, src], ctx)).toBe(0);
    out.length = 0;

    expect(await runCli(["sync", dst], ctx)).toBe(0);

    expect(out[0]).toBe(`${src}: 1 copied`);
    expect(out[1]).toMatch(/^Snapshot: snap-/);
  });

  it("lists the repository for manual revert", async () => {
    expect(await runCli(["manrv"], ctx)).toBe(0);
    expect(out).toEqual(["Backup repository is empty."]);

    await runCli(["cp", src, dst, "-y"], ctx);
    out.length = 0;
    await runCli(["manrv"], ctx);

    expect(out[0]).toBe("Manual reverts available for:\n");
    expect(out[1]).toMatch(new RegExp(`^snap-\\S+: ${dst}, backed on `));
  });

  it("lists every tag without a directory", async () => {
    expect(await runCli(["tags"], ctx)).toBe(0);
    expect(out).toEqual(["No tags."]);

    await runCli(["cp", src, dst, "-y", "--tag", "first"], ctx);
    out.length = 0;
    expect(await runCli(["tags"], ctx)).toBe(0);

    expect(out).toHaveLength(1);
    const repo = path.join(root, "repo");
    expect(out[0]).toMatch(new RegExp(`^first -> ${dst} @ ${repo}/snap-\\S+\\.zip \\(\\d{4}-`));
  });

  it("refuses a tag on a first copy into a new directory", async () => {
    const fresh = path.join(root, "fresh");

    expect(await runCli(["cp", src, fresh, "-y", "--tag", "v1"], ctx)).toBe(1);

    expect(err).toEqual([
      `Error: Tag "v1" not recorded: no snapshot of '${fresh}' is taken by this copy.`,
    ]);
    await expect(fs.stat(fresh)).rejects.toThrow();
  });
});
