// Todo repository port - persistence interface for the todo list

import type { TodoList } from "../entities/todo-item.ts";

/**
 * Repository for persisting and retrieving the whole todo list.
 */
export interface TodoRepository {
  /** Load the list. Returns null if storage is not initialized. */
  load(): Promise<TodoList | null>;

  /** Replace the stored list. */
  save(items: TodoList): Promise<void>;

  /** Check if the list exists. */
  exists(): Promise<boolean>;
}
