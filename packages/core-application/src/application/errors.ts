export type DirsnapErrorCode =
  | "DirectoryMissing"
  | "RepositoryUnavailable"
  | "ArchiveMissing"
  | "PointerMissing"
  | "PointerCorrupt"
  | "TagNotFound"
  | "InvalidTag"
  | "ManifestMissing"
  | "ManifestEmpty"
  | "CopyFailed"
  | "DirectoryLocked"
  | "ConfigInvalid";

export abstract class DirsnapError extends Error {
  abstract readonly code: DirsnapErrorCode;

  constructor(message: string, public cause?: unknown) {
    super(message);
  }
}

export function isDirsnapError(err: unknown): err is DirsnapError {
  return err instanceof DirsnapError;
}

export class DirectoryMissingError extends DirsnapError {
  readonly code = "DirectoryMissing";

  constructor(public readonly directory: string, message?: string) {
    super(message ?? `Directory '${directory}' does not exist.`);
    this.name = "DirectoryMissingError";
  }
}

export class RepositoryUnavailableError extends DirsnapError {
  readonly code = "RepositoryUnavailable";

  constructor(public readonly repositoryRoot: string, cause?: unknown) {
    super(`Backup repository '${repositoryRoot}' is unavailable.`, cause);
    this.name = "RepositoryUnavailableError";
  }
}

export class ArchiveMissingError extends DirsnapError {
  readonly code = "ArchiveMissing";

  constructor(public readonly archive: string, cause?: unknown) {
    super(`Archive '${archive}' unavailable.`, cause);
    this.name = "ArchiveMissingError";
  }
}

export class PointerMissingError extends DirsnapError {
  readonly code = "PointerMissing";

  constructor(public readonly directory: string) {
    super(`Backup pointer missing in '${directory}'.`);
    this.name = "PointerMissingError";
  }
}

export class PointerCorruptError extends DirsnapError {
  readonly code = "PointerCorrupt";

  /**
   * @param location directory or archive holding the pointer
   * @param value what was read, as stored
   */
  constructor(public readonly location: string, public readonly value: string, reason?: string) {
    super(
      `Backup pointer in '${location}' is corrupt` +
        (reason ? ` (${reason})` : `: ${JSON.stringify(value.slice(0, 80))}`)
    );
    this.name = "PointerCorruptError";
  }
}

export class TagNotFoundError extends DirsnapError {
  readonly code = "TagNotFound";

  constructor(public readonly tag: string) {
    super(`Tag '${tag}' not found.`);
    this.name = "TagNotFoundError";
  }
}

export class InvalidTagError extends DirsnapError {
  readonly code = "InvalidTag";

  constructor(public readonly tag: string, message?: string) {
    super(message ?? `Invalid tag name ${JSON.stringify(tag)}.`);
    this.name = "InvalidTagError";
  }
}

export class ManifestMissingError extends DirsnapError {
  readonly code = "ManifestMissing";

  constructor(public readonly directory: string) {
    super(`Sync manifest for '${directory}' missing.`);
    this.name = "ManifestMissingError";
  }
}

export class ManifestEmptyError extends DirsnapError {
  readonly code = "ManifestEmpty";

  constructor(public readonly directory: string) {
    super(`Sync manifest for '${directory}' is empty.`);
    this.name = "ManifestEmptyError";
  }
}

export class CopyFailedError extends DirsnapError {
  readonly code = "CopyFailed";

  constructor(
    public readonly source: string,
    public readonly destination: string,
    /** Entries that were already copied when the failure happened. */
    public readonly copied: readonly string[],
    cause?: unknown
  ) {
    super(`Copy of '${source}' to '${destination}' failed: ${describeCause(cause)}`, cause);
    this.name = "CopyFailedError";
  }
}

export class DirectoryLockedError extends DirsnapError {
  readonly code = "DirectoryLocked";

  constructor(
    public readonly directory: string,
    public readonly lockPath: string,
    public readonly pid: number
  ) {
    super(
      `Directory '${directory}' is in use by another process (PID: ${pid}). ` +
        `Delete ${lockPath} if the process is no longer running.`
    );
    this.name = "DirectoryLockedError";
  }
}

export class ConfigInvalidError extends DirsnapError {
  readonly code = "ConfigInvalid";

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigInvalidError";
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
