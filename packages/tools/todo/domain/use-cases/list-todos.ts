// ListTodosUseCase - List open items, or every item with `all`

import type { ListOutput } from "../entities/outputs.ts";
import type { TodoRepository } from "../ports/todo-repository.ts";
import { loadListOrThrow } from "./load-list.ts";

export interface ListTodosInput {
  readonly all: boolean;
  readonly verbose: boolean;
}

export class ListTodosUseCase {
  constructor(private readonly repo: TodoRepository) {}

  async execute(input: ListTodosInput): Promise<ListOutput> {
    const items = await loadListOrThrow(this.repo);

    return {
      items: input.all ? items : items.filter((item) => !item.done),
      verbose: input.verbose,
    };
  }
}
