import { homedir } from "node:os";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { TodoError } from "./domain/entities/errors.ts";
import type { FileSystem } from "./domain/ports/filesystem.ts";
import { InitUseCase } from "./domain/use-cases/init.ts";
import { NewTodoUseCase } from "./domain/use-cases/new-todo.ts";
import { CompleteTodoUseCase } from "./domain/use-cases/complete-todo.ts";
import { ListTodosUseCase } from "./domain/use-cases/list-todos.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { JsonTodoRepository } from "./adapters/repositories/json-todo-repo.ts";
import {
  resolveStorageConfig,
  type StorageConfig,
} from "./adapters/config/storage-config.ts";
import {
  formatComplete,
  formatError,
  formatInit,
  formatList,
  formatNew,
  formatStoragePath,
} from "./adapters/cli/formatter.ts";

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.3.0";

// ============================================================================
// Wiring
// ============================================================================

export interface CliDeps {
  readonly fs: FileSystem;
  readonly config: StorageConfig;
  readonly now: () => Date;
}

export function createDefaultDeps(): CliDeps {
  return {
    fs: new NodeFileSystem(),
    config: resolveStorageConfig(homedir()),
    now: () => new Date(),
  };
}

type JsonOption = { json?: boolean };

function handleError(e: unknown, json: boolean): never {
  if (e instanceof TodoError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    throw new CommanderError(1, `todo.${e.code}`, e.message);
  }
  throw e;
}

export function parseItemId(value: string): number {
  const id = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id)) {
    throw new InvalidArgumentError("Item id must be an integer.");
  }
  return id;
}

// ============================================================================
// Commands
// ============================================================================

export function createCli(deps: CliDeps): Command {
  const repo = () => new JsonTodoRepository(deps.fs, deps.config.dataFile);

  const cli = new Command()
    .name("todo")
    .version(VERSION)
    .description(
      "todo - Keep a personal todo list\n\n" +
        "Workflow:\n" +
        "  1. todo init                 # Create storage\n" +
        '  2. todo new "Buy milk"       # Add an item (prints its id)\n' +
        "  3. todo complete <id>        # Mark it done\n" +
        "  4. todo list [--all]         # Show open (or all) items",
    )
    .exitOverride();

  cli
    .command("init")
    .description("Initialise storage for todo to use for persistence")
    .option("--json", "Output as JSON")
    .action(async (options: JsonOption) => {
      // Shown before the attempt, so a failure still names the directory
      if (!options.json) {
        console.log(formatStoragePath(deps.config.storageDir));
      }
      try {
        const output = await new InitUseCase(deps.fs).execute({
          storageDir: deps.config.storageDir,
          storageFile: deps.config.placeholderFile,
        });
        console.log(options.json ? JSON.stringify(output) : formatInit(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  cli
    .command("new")
    .description("Add new item to todo list")
    .argument("<todo>", "Text of the item")
    .option("--json", "Output as JSON")
    .action(async (text: string, options: JsonOption) => {
      try {
        const output = await new NewTodoUseCase(repo(), deps.now).execute({
          text,
        });
        console.log(options.json ? JSON.stringify(output) : formatNew(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  cli
    .command("complete")
    .description("Mark item <id> as done")
    .argument("<id>", "Id of the item", parseItemId)
    .option("--json", "Output as JSON")
    .action(async (id: number, options: JsonOption) => {
      try {
        const output = await new CompleteTodoUseCase(repo(), deps.now).execute({
          id,
        });
        console.log(
          options.json ? JSON.stringify(output) : formatComplete(output),
        );
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  cli
    .command("list")
    .description("Print todo list")
    .option("-a, --all", "Include completed items")
    .option("-v, --verbose", "Show created and completed dates")
    .option("--json", "Output as JSON")
    .action(
      async (options: JsonOption & { all?: boolean; verbose?: boolean }) => {
        try {
          const output = await new ListTodosUseCase(repo()).execute({
            all: options.all ?? false,
            verbose: options.verbose ?? false,
          });
          console.log(
            options.json ? JSON.stringify(output) : formatList(output),
          );
        } catch (e) {
          handleError(e, options.json ?? false);
        }
      },
    );

  return cli;
}

// ============================================================================
// Main CLI
// ============================================================================

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function main(
  args: string[],
  deps: CliDeps = createDefaultDeps(),
): Promise<number> {
  const cli = createCli(deps);

  // Show help when no arguments provided
  if (args.length === 0) {
    cli.outputHelp();
    return 0;
  }

  try {
    await cli.parseAsync(args, { from: "user" });
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    throw e;
  }
}
