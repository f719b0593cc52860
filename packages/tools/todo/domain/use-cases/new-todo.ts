// NewTodoUseCase - Append an item to the list

import type { NewOutput } from "../entities/outputs.ts";
import { nextItemId, type TodoItem } from "../entities/todo-item.ts";
import type { TodoRepository } from "../ports/todo-repository.ts";
import { loadListOrThrow } from "./load-list.ts";

export interface NewTodoInput {
  readonly text: string;
}

export class NewTodoUseCase {
  constructor(
    private readonly repo: TodoRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async execute(input: NewTodoInput): Promise<NewOutput> {
    const items = await loadListOrThrow(this.repo);

    const item: TodoItem = {
      id: nextItemId(items),
      text: input.text,
      done: false,
      createdAt: this.now(),
      completedAt: null,
    };

    await this.repo.save([...items, item]);

    return { id: item.id };
  }
}
