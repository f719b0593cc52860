/**
 * todo - public API
 *
 * Re-exports the domain, the adapters and the CLI entry so the list can be
 * driven from code as well as from the command line.
 */

export { TodoError, type TodoErrorCode } from "./domain/entities/errors.ts";
export {
  completeItem,
  formatTimestamp,
  nextItemId,
  renderItem,
  type TodoItem,
  type TodoList,
} from "./domain/entities/todo-item.ts";
export type {
  CompleteOutput,
  InitOutput,
  ListOutput,
  NewOutput,
} from "./domain/entities/outputs.ts";
export type { FileSystem } from "./domain/ports/filesystem.ts";
export type { TodoRepository } from "./domain/ports/todo-repository.ts";
export { InitUseCase } from "./domain/use-cases/init.ts";
export { NewTodoUseCase } from "./domain/use-cases/new-todo.ts";
export { CompleteTodoUseCase } from "./domain/use-cases/complete-todo.ts";
export { ListTodosUseCase } from "./domain/use-cases/list-todos.ts";
export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { JsonTodoRepository } from "./adapters/repositories/json-todo-repo.ts";
export {
  resolveStorageConfig,
  type StorageConfig,
  storageConfigFor,
} from "./adapters/config/storage-config.ts";
export { type CliDeps, createCli, main } from "./cli.ts";
