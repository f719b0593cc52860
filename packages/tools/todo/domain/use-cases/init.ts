// InitUseCase - Create the storage directory and its placeholder file

import type { InitOutput } from "../entities/outputs.ts";
import { TodoError } from "../entities/errors.ts";
import type { FileSystem } from "../ports/filesystem.ts";

export interface InitInput {
  readonly storageDir: string;
  readonly storageFile: string;
}

export class InitUseCase {
  constructor(private readonly fs: FileSystem) {}

  async execute(input: InitInput): Promise<InitOutput> {
    // An existing directory is fine, an existing file is not
    await this.fs.ensureDir(input.storageDir);

    if (!(await this.fs.createFile(input.storageFile))) {
      throw new TodoError(
        "already_initialized",
        `Couldn't create storage file ${input.storageFile}: file already exists`,
      );
    }

    return {
      status: "initialized",
      storageDir: input.storageDir,
      storageFile: input.storageFile,
    };
  }
}
