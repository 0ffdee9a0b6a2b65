import type { TaskKind } from "./types.js";

/** Thrown synchronously when task parameters are rejected. No task is started. */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length > 0 ? issues.join("; ") : "Invalid task parameters");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** Thrown by `TaskRunner.start` while another run is active. */
export class AlreadyRunningError extends Error {
  readonly activeKind: TaskKind;

  constructor(activeKind: TaskKind) {
    super(`A "${activeKind}" task is already running`);
    this.name = "AlreadyRunningError";
    this.activeKind = activeKind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
