import path from "node:path";

import type { FileChangeEvent, FileWatcher } from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { createSourceIgnore } from "../adapters/reserved-ignore";
import type { SyncRunSummary, SyncService } from "./sync-service";

export type SyncWatcherOptions = {
  directory: string;
  debounceMs: number;
  tag?: string;
  onSynced?: (summary: SyncRunSummary) => void;
  onError?: (err: unknown) => void;
};

/**
 * Re-runs a manifest sync whenever one of its sources changes. Bursts of
 * events collapse into one run; events arriving during a run queue exactly
 * one follow-up run.
 */
export class SyncWatcher {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private pending = false;
  private stopped = false;

  constructor(
    private readonly deps: {
      sync: Pick<SyncService, "sync" | "readManifest">;
      watcher: FileWatcher;
      logger: Logger;
    },
    private readonly options: SyncWatcherOptions
  ) {}

  async start(): Promise<string[]> {
    const { sync, watcher, logger } = this.deps;
    const directory = path.resolve(this.options.directory);
    const manifest = await sync.readManifest(directory);

    watcher.onEvent((event) => this.onChange(event));
    await watcher.start({
      rootDirs: manifest.sources,
      ignore: createSourceIgnore(manifest.sources),
    });

    logger.info(`Watching ${manifest.sources.length} source(s) for ${directory}`);
    return manifest.sources;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.deps.watcher.stop();
    await this.running;
  }

  /** Resolves once the in-flight run (if any) settles. */
  idle(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  private onChange(event: FileChangeEvent) {
    if (this.stopped) return;
    this.deps.logger.debug(`${event.type}: ${event.path}`);

    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.trigger();
    }, this.options.debounceMs);
  }

  private trigger() {
    if (this.running) {
      this.pending = true;
      return;
    }
    this.running = this.runOnce().finally(() => {
      this.running = null;
      if (this.pending && !this.stopped) {
        this.pending = false;
        this.trigger();
      }
    });
  }

  private async runOnce(): Promise<void> {
    const { sync, logger } = this.deps;
    try {
      const summary = await sync.sync(this.options.directory, { tag: this.options.tag });
      this.options.onSynced?.(summary);
    } catch (err) {
      logger.error(`Sync of ${this.options.directory} failed`, err);
      this.options.onError?.(err);
    }
  }
}
