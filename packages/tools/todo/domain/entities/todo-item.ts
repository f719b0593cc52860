// Todo item entity - one entry of the todo list

/**
 * Immutable todo item.
 * `completedAt` is set exactly when `done` becomes true.
 */
export type TodoItem = {
  readonly id: number;
  readonly text: string;
  readonly done: boolean;
  readonly createdAt: Date;
  readonly completedAt: Date | null;
};

/** The whole todo list, in insertion order. */
export type TodoList = readonly TodoItem[];

/**
 * Next id to assign: one past the highest existing id.
 * Gaps are kept, ids are never reused.
 */
export function nextItemId(items: TodoList): number {
  let max = 0;
  for (const item of items) {
    if (item.id > max) {
      max = item.id;
    }
  }
  return max + 1;
}

/**
 * Mark an item as done (immutable update).
 * Does NOT check the current state - caller finds an open item first.
 */
export function completeItem(item: TodoItem, completedAt: Date): TodoItem {
  return { ...item, done: true, completedAt };
}

/**
 * Format a date as local time `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hour = String(date.getHours()).padStart(2, "0");
  const minute = String(date.getMinutes()).padStart(2, "0");
  const second = String(date.getSeconds()).padStart(2, "0");
  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

function formatDetails(item: TodoItem): string {
  const completed = item.completedAt
    ? ` completed: ${formatTimestamp(item.completedAt)}`
    : "";
  return `(created: ${formatTimestamp(item.createdAt)}${completed})`;
}

/**
 * Render one item as a list line.
 *
 * The id is right-aligned in a 4-char field, e.g. `"  1. [ ] Walk the dog "`.
 * The trailing space is where the verbose details go.
 */
export function renderItem(item: TodoItem, verbose: boolean): string {
  const paddedId = `${item.id}.`.padStart(4, " ");
  const marker = item.done ? "X" : " ";
  const details = verbose ? formatDetails(item) : "";
  return `${paddedId} [${marker}] ${item.text} ${details}`;
}
