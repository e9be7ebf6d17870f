import { watch, type FSWatcher } from "chokidar";
import path from "node:path";
import type {
  FileWatcher,
  FileWatcherOptions,
  FileChangeEvent,
  FileChangeType,
} from "../ports/file-watcher";

export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;

  constructor(private readonly stabilityThresholdMs = 250) {}

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const roots = options.rootDirs.map((d) => path.resolve(d));

    this.watcher = watch(roots, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: this.stabilityThresholdMs,
        pollInterval: 50,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });

    const emit = (type: FileChangeType, filePath: string) => {
      if (!this.handler) return;

      this.handler({
        type,
        path: path.resolve(filePath),
        occurredAt: new Date(),
      });
    };

    this.watcher
      .on("add", (p: string) => emit("created", p))
      .on("addDir", (p: string) => emit("created", p))
      .on("change", (p: string) => emit("modified", p))
      .on("unlink", (p: string) => emit("deleted", p))
      .on("unlinkDir", (p: string) => emit("deleted", p));

    await new Promise<void>((resolve) => {
      this.watcher?.once("ready", () => resolve());
    });
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
