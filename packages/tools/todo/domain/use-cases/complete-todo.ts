// CompleteTodoUseCase - Mark an open item as done

import type { CompleteOutput } from "../entities/outputs.ts";
import { TodoError } from "../entities/errors.ts";
import { completeItem } from "../entities/todo-item.ts";
import type { TodoRepository } from "../ports/todo-repository.ts";
import { loadListOrThrow } from "./load-list.ts";

export interface CompleteTodoInput {
  readonly id: number;
}

export class CompleteTodoUseCase {
  constructor(
    private readonly repo: TodoRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async execute(input: CompleteTodoInput): Promise<CompleteOutput> {
    const items = await loadListOrThrow(this.repo);

    // Done items count as missing: completing twice is an error
    const index = items.findIndex((item) => item.id === input.id && !item.done);
    if (index === -1) {
      throw new TodoError("todo_not_found", `Item ${input.id} not found.`);
    }

    const completed = completeItem(items[index], this.now());
    const updated = items.map((item, i) => (i === index ? completed : item));
    await this.repo.save(updated);

    return { id: completed.id, text: completed.text };
  }
}
