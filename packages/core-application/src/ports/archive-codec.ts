/**
 * Raw zip services. The store layers keys, repository layout and error
 * taxonomy on top; the codec only knows files.
 */
export interface ArchiveReader {
  /** UTF-8 content of a file entry (posix path), or null when absent. */
  readText(entryName: string): string | null;
  /** Zip comment, empty string when none. */
  comment(): string;
  extractTo(targetDirectory: string): Promise<void>;
}

export interface ArchiveCodec {
  /** Writes the full contents of `directory` (dotfiles included) into a new zip. */
  createFromDirectory(directory: string, archivePath: string, comment: string): Promise<void>;
  open(archivePath: string): Promise<ArchiveReader>;
}
