/**
 * Storage configuration, resolved once when the CLI starts and passed
 * to every adapter that touches the disk.
 */

import { join } from "node:path";

const STORAGE_DIR_NAME = ".todo";
const DATA_FILE_NAME = "todo.json";
const PLACEHOLDER_FILE_NAME = "todo.txt";

export type StorageConfig = {
  readonly storageDir: string;
  /** The list itself, read and written by every command but init. */
  readonly dataFile: string;
  /** Empty file created by init and read by nothing. */
  readonly placeholderFile: string;
};

export function storageConfigFor(storageDir: string): StorageConfig {
  return {
    storageDir,
    dataFile: join(storageDir, DATA_FILE_NAME),
    placeholderFile: join(storageDir, PLACEHOLDER_FILE_NAME),
  };
}

/** Storage lives in `.todo` under the user's home directory. */
export function resolveStorageConfig(homeDir: string): StorageConfig {
  return storageConfigFor(join(homeDir, STORAGE_DIR_NAME));
}
