// Command output types - immutable result types for all todo commands

import type { TodoItem } from "./todo-item.ts";

export type InitOutput = {
  readonly status: "initialized";
  readonly storageDir: string;
  readonly storageFile: string;
};

export type NewOutput = {
  readonly id: number;
};

export type CompleteOutput = {
  readonly id: number;
  readonly text: string;
};

export type ListOutput = {
  readonly items: readonly TodoItem[];
  readonly verbose: boolean;
};
