// Error types for the todo domain

export type TodoErrorCode =
  | "not_initialized"
  | "already_initialized"
  | "corrupt_storage"
  | "todo_not_found"
  | "io_error";

export class TodoError extends Error {
  constructor(
    public readonly code: TodoErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TodoError";
  }

  toJSON(): { error: string; code: TodoErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
