export interface DirectoryLock {
  withLock<T>(directory: string, fn: () => Promise<T>): Promise<T>;
}
