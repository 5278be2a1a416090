export interface FileMover {
  exists(absolutePath: string): Promise<boolean>;
  ensureDir(absolutePath: string): Promise<void>;
  /** Relocates a file. Must fail instead of replacing an existing destination. */
  move(source: string, destination: string): Promise<void>;
}
