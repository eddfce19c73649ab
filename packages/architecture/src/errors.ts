import type { ID } from "./domain.js";

/** The therapydrift block is present but is not valid configuration. */
export class SpecParseError extends Error {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `line ${line}: ${message}` : message);
    this.name = "SpecParseError";
    this.line = line;
  }
}

export class TaskNotFoundError extends Error {
  readonly taskId: ID;

  constructor(taskId: ID) {
    super(`Task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
    this.taskId = taskId;
  }
}

export class WorkgraphNotFoundError extends Error {
  constructor(start: string) {
    super(`No .workgraph directory found from ${start}`);
    this.name = "WorkgraphNotFoundError";
  }
}
