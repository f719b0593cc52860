/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Failures surface as TodoError("io_error") naming the path.
 *
 * Dependencies: Node built-ins.
 */

import {
  mkdir,
  open,
  readFile,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TodoError } from "../../domain/entities/errors.ts";

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        throw new TodoError("io_error", `File not found: ${path}`);
      }
      throw new TodoError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    // Write beside the target then rename over it
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
      await writeFile(tmpPath, content, "utf8");
      await rename(tmpPath, path);
    } catch {
      await rm(tmpPath, { force: true });
      throw new TodoError("io_error", `Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        return false;
      }
      throw new TodoError("io_error", `Failed to access path: ${path}`);
    }
  }

  async ensureDir(path: string): Promise<boolean> {
    try {
      const created = await mkdir(path, { recursive: true });
      return created !== undefined;
    } catch {
      throw new TodoError("io_error", `Failed to create directory: ${path}`);
    }
  }

  async createFile(path: string): Promise<boolean> {
    try {
      const handle = await open(path, "wx");
      await handle.close();
      return true;
    } catch (e) {
      if (errorCode(e) === "EEXIST") {
        return false;
      }
      throw new TodoError("io_error", `Failed to create file: ${path}`);
    }
  }
}
