/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * All operations work on a Map<string, string> for files
 * and a Set<string> for directories.
 *
 * Dependencies: domain ports only.
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TodoError } from "../../domain/entities/errors.ts";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private dirs = new Set<string>();
  private readOnly = new Set<string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(
        new TodoError("io_error", `File not found: ${path}`),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    if (this.readOnly.has(path)) {
      return Promise.reject(
        new TodoError("io_error", `Failed to write file: ${path}`),
      );
    }
    this.files.set(path, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path) || this.dirs.has(path));
  }

  ensureDir(path: string): Promise<boolean> {
    const existed = this.dirs.has(path);
    this.dirs.add(path);
    // Also add all parent directories
    const parts = path.split("/");
    for (let i = 1; i < parts.length; i++) {
      this.dirs.add(parts.slice(0, i).join("/"));
    }
    return Promise.resolve(!existed);
  }

  createFile(path: string): Promise<boolean> {
    if (this.files.has(path)) {
      return Promise.resolve(false);
    }
    this.files.set(path, "");
    return Promise.resolve(true);
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup). */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Get a file's content, or undefined if absent. */
  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Make every later write to `path` fail with an io_error. */
  failWrites(path: string): void {
    this.readOnly.add(path);
  }

  /** Check whether a directory was created. */
  hasDir(path: string): boolean {
    return this.dirs.has(path);
  }
}
