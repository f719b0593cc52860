// Filesystem port - interface for file system operations

/**
 * Abstraction over file system operations.
 * Allows the domain to be tested without real filesystem access.
 */
export interface FileSystem {
  /** Read a file as text. Throws on not found. */
  readFile(path: string): Promise<string>;

  /** Replace a file's content as a whole, or leave it unchanged. */
  writeFile(path: string, content: string): Promise<void>;

  /** Check if a file or directory exists. */
  exists(path: string): Promise<boolean>;

  /**
   * Ensure a directory exists, creating it (and parents) if needed.
   * Resolves to false when it was already there.
   */
  ensureDir(path: string): Promise<boolean>;

  /** Create an empty file. Resolves to false if it already exists. */
  createFile(path: string): Promise<boolean>;
}
