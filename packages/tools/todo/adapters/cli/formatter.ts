/**
 * CLI output formatters for todo commands.
 *
 * All formatX() functions transform command output objects into
 * human-readable strings.
 * These are pure functions with no side effects.
 */

import type { TodoError } from "../../domain/entities/errors.ts";
import type {
  CompleteOutput,
  InitOutput,
  ListOutput,
  NewOutput,
} from "../../domain/entities/outputs.ts";
import { renderItem } from "../../domain/entities/todo-item.ts";

export function formatStoragePath(storageDir: string): string {
  return `path: ${storageDir}`;
}

export function formatInit(_output: InitOutput): string {
  return "Successfully initialised storage for todo";
}

export function formatNew(output: NewOutput): string {
  return `New item (${output.id}) added to todo list.`;
}

export function formatComplete(output: CompleteOutput): string {
  return `Item ${output.id} (${output.text}) completed.`;
}

export function formatList(output: ListOutput): string {
  const lines = ["TODO List", ""];
  for (const item of output.items) {
    lines.push(`   ${renderItem(item, output.verbose)}`);
  }
  return lines.join("\n");
}

export function formatError(error: TodoError): string {
  return `error: ${error.code}\n${error.message}`;
}
