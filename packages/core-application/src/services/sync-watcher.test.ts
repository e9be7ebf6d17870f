import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { silentLogger } from "../ports/logger";
import type { FileChangeEvent, FileWatcher, FileWatcherOptions } from "../ports/file-watcher";
import type { SyncRunSummary } from "./sync-service";
import { SyncWatcher } from "./sync-watcher";

class FakeWatcher implements FileWatcher {
  started: FileWatcherOptions | null = null;
  stopped = false;
  private handler: ((event: FileChangeEvent) => void) | null = null;

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  async start(options: FileWatcherOptions): Promise<void> {
    this.started = options;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  emit(path: string) {
    this.handler?.({ type: "modified", path, occurredAt: new Date() });
  }
}

function summary(n: number): SyncRunSummary {
  return {
    directory: "/mirror",
    snapshot: {
      key: `snap-2024-01-01T000000000Z-000${n}-00000000`,
      archivePath: `/repo/${n}.zip`,
      directory: "/mirror",
      tag: null,
    },
    passes: [],
  };
}

describe("SyncWatcher", () => {
  let watcher: FakeWatcher;
  let runs: number;
  const readManifest = vi.fn();
  const sync = vi.fn();

  beforeEach(() => {
    vi.useFakeTimers();
    watcher = new FakeWatcher();
    runs = 0;
    readManifest.mockResolvedValue({ directory: "/mirror", sources: ["/one", "/two"] });
    sync.mockImplementation(async () => summary(++runs));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  function create(extra: { onError?: (err: unknown) => void; onSynced?: (s: SyncRunSummary) => void } = {}) {
    return new SyncWatcher(
      { sync: { sync, readManifest }, watcher, logger: silentLogger },
      { directory: "/mirror", debounceMs: 100, tag: "auto", ...extra }
    );
  }

  it("watches every manifest source, ignoring marker files", async () => {
    const sw = create();

    expect(await sw.start()).toEqual(["/one", "/two"]);
    expect(watcher.started?.rootDirs).toEqual(["/one", "/two"]);
    expect(watcher.started?.ignore("/one/.dirsnap-backup")).toBe(true);
    expect(watcher.started?.ignore("/one/notes.txt")).toBe(false);
  });

  it("collapses a burst of changes into one sync", async () => {
    const onSynced = vi.fn();
    const sw = create({ onSynced });
    await sw.start();

    watcher.emit("/one/a.txt");
    await vi.advanceTimersByTimeAsync(50);
    watcher.emit("/one/b.txt");
    await vi.advanceTimersByTimeAsync(50);
    watcher.emit("/two/c.txt");
    expect(sync).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(100);
    await sw.idle();

    expect(sync).toHaveBeenCalledTimes(1);
    expect(sync).toHaveBeenCalledWith("/mirror", { tag: "auto" });
    expect(onSynced).toHaveBeenCalledWith(summary(1));
  });

  it("queues one follow-up run for changes during a sync", async () => {
    let release: () => void = () => {};
    sync.mockImplementationOnce(
      () =>
        new Promise<SyncRunSummary>((resolve) => {
          release = () => resolve(summary(++runs));
        })
    );
    const sw = create();
    await sw.start();

    watcher.emit("/one/a.txt");
    await vi.advanceTimersByTimeAsync(100);
    expect(sync).toHaveBeenCalledTimes(1);

    watcher.emit("/one/a.txt");
    await vi.advanceTimersByTimeAsync(100);
    watcher.emit("/one/a.txt");
    await vi.advanceTimersByTimeAsync(100);
    expect(sync).toHaveBeenCalledTimes(1);

    release();
    await vi.advanceTimersByTimeAsync(0);
    await sw.idle();

    expect(sync).toHaveBeenCalledTimes(2);
  });

  it("reports sync failures without throwing", async () => {
    const failure = new Error("boom");
    sync.mockRejectedValueOnce(failure);
    const onError = vi.fn();
    const sw = create({ onError });
    await sw.start();

    watcher.emit("/one/a.txt");
    await vi.advanceTimersByTimeAsync(100);
    await sw.idle();

    expect(onError).toHaveBeenCalledWith(failure);
  });

  it("drops pending work on stop", async () => {
    const sw = create();
    await sw.start();

    watcher.emit("/one/a.txt");
    await sw.stop();
    await vi.advanceTimersByTimeAsync(500);

    expect(watcher.stopped).toBe(true);
    expect(sync).not.toHaveBeenCalled();
  });
});
