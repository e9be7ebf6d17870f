export interface FileCopier {
  /** Copies a single file, overwriting `destinationPath`. */
  copyFile(sourcePath: string, destinationPath: string): Promise<void>;
  /** Copies a directory tree, skipping entries `skip` accepts at any depth. */
  copyTree(
    sourcePath: string,
    destinationPath: string,
    skip: (name: string) => boolean
  ): Promise<void>;
}
