export interface FileComparer {
  /** True when two regular files hold the same bytes. */
  same(leftPath: string, rightPath: string): Promise<boolean>;
}
