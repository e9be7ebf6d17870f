import { parseArgs } from "node:util";

import {
  ChokidarFileWatcher,
  SyncWatcher,
  isDirsnapError,
  type ConfirmDiff,
  type Dirsnap,
  type Logger,
} from "@dirsnap/core-application";

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Asks a yes/no question; only consulted when confirmation is on. */
  ask: (question: string) => Promise<string>;
};

export type CliContext = {
  app: Dirsnap;
  io: CliIo;
  logger: Logger;
};

export const USAGE = `Usage: dirsnap <command> [options]

Commands:
  cp <src> <dst> [--tag <t>] [--yes]   Copy missing/changed entries, snapshotting <dst> first
  rv <dir> [--archive <key|path>]      Revert <dir> to its latest (or the given) snapshot
  rvtag <tag>                          Revert the directory a tag points at
  manrv [<key>]                        List repository snapshots, or revert one by key
  history <dir>                        Show the snapshot chain of <dir>, newest first
  tags [<dir>]                         Show tags recorded for <dir>, or every tag
  mksync <dir> <src...>                Write the sync manifest of <dir>
  sync <dir> [--tag <t>]               Pull every manifest source into <dir>
  watch <dir> [--tag <t>]              Sync <dir> whenever a manifest source changes`;

function formatTime(ms: number) {
  return new Date(ms).toISOString();
}

function requirePositional(values: string[], count: number, command: string): string[] {
  if (values.length < count) {
    throw new UsageError(`'${command}' expects ${count} argument(s), got ${values.length}`);
  }
  return values;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function confirmWith(io: CliIo): ConfirmDiff {
  return async (diff) => {
    io.out(diff.join("\n"));
    const answer = await io.ask("\nCopy all (y/n)? ");
    return answer.trim().toLowerCase().startsWith("y");
  };
}

function parseCommandArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        tag: { type: "string" },
        archive: { type: "string" },
        yes: { type: "boolean", short: "y" },
      },
      allowPositionals: true,
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/** Runs one command; returns the process exit code. */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const { app, io } = ctx;
  const [command, ...rest] = argv;

  if (!command || command === "--help" || command === "-h") {
    io.out(USAGE);
    return 0;
  }

  try {
    const { values, positionals } = parseCommandArgs(rest);

    switch (command) {
      case "cp": {
        const [src, dst] = requirePositional(positionals, 2, command);
        const assumeYes = values.yes ?? app.config.assumeYes;
        const result = await app.apply.copy(src, dst, {
          tag: values.tag,
          confirm: assumeYes ? undefined : confirmWith(io),
        });
        if (result.diff.length === 0) io.out("No changes found.");
        else if (result.declined) io.out("Nothing copied.");
        else {
          io.out(`Copied ${result.copied.length} entries.`);
          if (result.snapshot) io.out(`Snapshot: ${result.snapshot.key}`);
        }
        return 0;
      }

      case "rv": {
        const [dir] = requirePositional(positionals, 1, command);
        const result = await app.revert.revert(dir, values.archive);
        io.out(`Reverted ${result.directory} from ${result.archive}`);
        return 0;
      }

      case "rvtag": {
        const [tag] = requirePositional(positionals, 1, command);
        const result = await app.revert.revertTag(tag);
        io.out(`Reverted ${result.directory} from ${result.archive}`);
        return 0;
      }

      case "manrv": {
        const [key] = positionals;
        if (key) {
          const result = await app.revert.revertFromRepository(key);
          io.out(`Reverted ${result.directory} from ${result.archive}`);
          return 0;
        }
        const snapshots = await app.revert.listRepository();
        if (snapshots.length === 0) {
          io.out("Backup repository is empty.");
          return 0;
        }
        io.out("Manual reverts available for:\n");
        for (const s of snapshots) {
          io.out(`${s.key}: ${s.directory ?? "<unknown>"}, backed on ${formatTime(s.createdAtMs)}`);
        }
        return 0;
      }

      case "history": {
        const [dir] = requirePositional(positionals, 1, command);
        const entries = await app.history.history(dir);
        if (entries.length === 0) io.out("No history available.");
        for (const e of entries) io.out(`${e.archivePath} : ${formatTime(e.createdAtMs)}`);
        return 0;
      }

      case "tags": {
        const [dir] = positionals;
        if (!dir) {
          const all = await app.tags.listTags();
          if (all.length === 0) io.out("No tags.");
          for (const t of all) io.out(`${t.tag} -> ${t.directory} @ ${t.archive} (${t.taggedAtIso})`);
          return 0;
        }
        const tags = await app.tags.tagsForDirectory(dir);
        if (tags.length === 0) io.out("No tags.");
        for (const t of tags) io.out(`${t.tag} -> ${t.archive} (${formatTime(t.createdAtMs)})`);
        return 0;
      }

      case "mksync": {
        const [dir, ...sources] = requirePositional(positionals, 2, command);
        const manifest = await app.sync.createManifest(dir, sources);
        io.out(`Sync manifest written for ${manifest.directory}`);
        return 0;
      }

      case "sync": {
        const [dir] = requirePositional(positionals, 1, command);
        const summary = await app.sync.sync(dir, { tag: values.tag });
        for (const pass of summary.passes) {
          io.out(`${pass.source}: ${pass.copied.length} copied`);
        }
        io.out(`Snapshot: ${summary.snapshot.key}`);
        return 0;
      }

      case "watch": {
        const [dir] = requirePositional(positionals, 1, command);
        const watcher = new SyncWatcher(
          {
            sync: app.sync,
            watcher: new ChokidarFileWatcher(),
            logger: ctx.logger.child("watch"),
          },
          {
            directory: dir,
            debounceMs: app.config.watchDebounceMs,
            tag: values.tag,
            onSynced: (summary) => io.out(`Synced ${summary.directory} (${summary.snapshot.key})`),
          }
        );
        await watcher.start();
        await new Promise<void>((resolve) => {
          process.once("SIGINT", () => resolve());
          process.once("SIGTERM", () => resolve());
        });
        await watcher.stop();
        return 0;
      }

      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`Error: ${err.message}`);
      io.out(USAGE);
      return 2;
    }
    if (isDirsnapError(err)) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
