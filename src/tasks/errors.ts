import type { TaskStatus } from "./types.js";

export type ErrorKind = "transient" | "permanent";

export type ErrorCode =
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "ALREADY_CLAIMED"
  | "VERSION_CONFLICT"
  | "VALIDATION_ERROR"
  | "STORE_UNAVAILABLE";

/**
 * Base class for every failure the orchestration core reports.
 * `kind` tells the caller whether repeating the same call can succeed.
 */
export class OrchestratorError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;

  constructor(code: ErrorCode, kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind === "transient";
  }
}

export class NotFoundError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string) {
    super("NOT_FOUND", "permanent", `Task not found: ${taskId}`);
    this.name = "NotFoundError";
    this.taskId = taskId;
  }
}

export class InvalidTransitionError extends OrchestratorError {
  readonly status: TaskStatus;
  readonly event: string;

  constructor(status: TaskStatus, event: string) {
    super("INVALID_TRANSITION", "permanent", `Cannot ${event} a task in status ${status}`);
    this.name = "InvalidTransitionError";
    this.status = status;
    this.event = event;
  }
}

export class AlreadyClaimedError extends OrchestratorError {
  readonly claimedBy: string | null;

  constructor(taskId: string, claimedBy: string | null) {
    super(
      "ALREADY_CLAIMED",
      "permanent",
      claimedBy ? `Task ${taskId} is already claimed by ${claimedBy}` : `Task ${taskId} is already claimed`
    );
    this.name = "AlreadyClaimedError";
    this.claimedBy = claimedBy;
  }
}

export class VersionConflictError extends OrchestratorError {
  readonly expected: number;
  readonly actual: number | null;

  constructor(taskId: string, expected: number, actual: number | null, message?: string) {
    super(
      "VERSION_CONFLICT",
      "transient",
      message ?? `Version conflict on task ${taskId}: expected ${expected}, actual ${actual ?? "unknown"}`
    );
    this.name = "VersionConflictError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class ValidationError extends OrchestratorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("VALIDATION_ERROR", "permanent", `Invalid input: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class StoreUnavailableError extends OrchestratorError {
  constructor(message: string, options?: ErrorOptions) {
    super("STORE_UNAVAILABLE", "transient", message, options);
    this.name = "StoreUnavailableError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
