/**
 * Adapter: JsonTodoRepository
 *
 * Implements the TodoRepository port using a single JSON file.
 * The file holds an array of records with snake_case fields and
 * Unix epoch seconds:
 *
 *   [{ "id": 1, "text": "...", "done": false,
 *      "created_date": 1700000000, "completed_date": null }]
 *
 * Timestamps are truncated to whole seconds on save.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - zod/mini for validating what is read back
 */

import { z } from "zod/mini";
import { TodoError } from "../../domain/entities/errors.ts";
import type { TodoItem, TodoList } from "../../domain/entities/todo-item.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { TodoRepository } from "../../domain/ports/todo-repository.ts";

// ============================================================================
// Schemas
// ============================================================================

// Largest distance from the epoch a Date can represent, in seconds
const MAX_EPOCH_SECONDS = 8.64e12;

const EpochSecondsSchema = z.int().check(
  z.minimum(-MAX_EPOCH_SECONDS),
  z.maximum(MAX_EPOCH_SECONDS),
);

export const StoredTodoItemSchema = z.object({
  id: z.int(),
  text: z.string(),
  done: z.boolean(),
  created_date: EpochSecondsSchema,
  completed_date: z.optional(z.nullable(EpochSecondsSchema)),
});

export const StoredTodoListSchema = z.array(StoredTodoItemSchema);

export type StoredTodoItem = z.infer<typeof StoredTodoItemSchema>;

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function fromSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function toRecord(item: TodoItem): StoredTodoItem {
  return {
    id: item.id,
    text: item.text,
    done: item.done,
    created_date: toSeconds(item.createdAt),
    completed_date: item.completedAt ? toSeconds(item.completedAt) : null,
  };
}

export function fromRecord(record: StoredTodoItem): TodoItem {
  return {
    id: record.id,
    text: record.text,
    done: record.done,
    createdAt: fromSeconds(record.created_date),
    completedAt: record.completed_date == null
      ? null
      : fromSeconds(record.completed_date),
  };
}

// ============================================================================
// Repository
// ============================================================================

export class JsonTodoRepository implements TodoRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly dataFile: string,
  ) {}

  async load(): Promise<TodoList | null> {
    if (!(await this.exists())) {
      return null;
    }

    const content = await this.fs.readFile(this.dataFile);

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (e) {
      throw this.corrupt(e instanceof Error ? e.message : String(e));
    }

    const result = StoredTodoListSchema.safeParse(raw);
    if (!result.success) {
      const [issue] = result.error.issues;
      if (!issue) {
        throw this.corrupt("unexpected content");
      }
      const path = issue.path.map(String).join(".");
      throw this.corrupt(path ? `at ${path}: ${issue.message}` : issue.message);
    }

    return result.data.map(fromRecord);
  }

  async save(items: TodoList): Promise<void> {
    const content = JSON.stringify(items.map(toRecord), null, 2);
    try {
      await this.fs.writeFile(this.dataFile, content);
    } catch (e) {
      if (e instanceof TodoError) {
        throw new TodoError(
          "io_error",
          `Failed to write todo list to storage: ${this.dataFile}`,
        );
      }
      throw e;
    }
  }

  async exists(): Promise<boolean> {
    return await this.fs.exists(this.dataFile);
  }

  private corrupt(detail: string): TodoError {
    return new TodoError(
      "corrupt_storage",
      `Todo list storage is corrupt (${this.dataFile}): ${detail}`,
    );
  }
}
