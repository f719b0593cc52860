// Shared loader for the commands that need an initialized list

import type { TodoList } from "../entities/todo-item.ts";
import { TodoError } from "../entities/errors.ts";
import type { TodoRepository } from "../ports/todo-repository.ts";

export async function loadListOrThrow(repo: TodoRepository): Promise<TodoList> {
  const items = await repo.load();
  if (items === null) {
    throw new TodoError(
      "not_initialized",
      "Couldn't load todo list from storage. Run 'todo init' first.",
    );
  }
  return items;
}
