// Shared mocks for use-case tests

import type { TodoItem, TodoList } from "../entities/todo-item.ts";
import type { TodoRepository } from "../ports/todo-repository.ts";

export function createMockRepo(
  initial: TodoList | null,
): TodoRepository & { saved: TodoList[] } {
  let state = initial;
  const saved: TodoList[] = [];
  return {
    saved,
    load(): Promise<TodoList | null> {
      return Promise.resolve(state);
    },
    save(items: TodoList): Promise<void> {
      saved.push(items);
      state = items;
      return Promise.resolve();
    },
    exists(): Promise<boolean> {
      return Promise.resolve(state !== null);
    },
  };
}

export function openItem(id: number, text: string): TodoItem {
  return {
    id,
    text,
    done: false,
    createdAt: new Date(1_700_000_000_000),
    completedAt: null,
  };
}

export function doneItem(id: number, text: string): TodoItem {
  return {
    ...openItem(id, text),
    done: true,
    completedAt: new Date(1_700_000_600_000),
  };
}
