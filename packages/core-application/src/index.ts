// Public API of the application package: ports, services, Node adapters and
// the factory that wires them around one repository root.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export * from "./ports/archive-codec";
export * from "./ports/archive-store";
export * from "./ports/backup-pointer-store";
export * from "./ports/tag-index";
export * from "./ports/file-comparer";
export * from "./ports/file-copier";
export * from "./ports/directory-lock";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";

// Application
export * from "./application/errors";
export * from "./application/config";
export * from "./application/create-dirsnap";

// Services
export * from "./services/diff-engine";
export * from "./services/backup-service";
export * from "./services/history-service";
export * from "./services/apply-service";
export * from "./services/sync-service";
export * from "./services/revert-service";
export * from "./services/sync-watcher";

// Node adapters
export * from "./adapters/zip-archive-codec";
export * from "./adapters/node-archive-store";
export * from "./adapters/node-backup-pointer-store";
export * from "./adapters/json-tag-index";
export * from "./adapters/node-file-comparer";
export * from "./adapters/node-file-copier";
export * from "./adapters/apply-lock";
export * from "./adapters/chokidar-file-watcher";
export * from "./adapters/console-logger";
export * from "./adapters/reserved-ignore";
