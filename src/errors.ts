import type { TaskStatus } from "./planner/types.js";

export type ErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "DUPLICATE_TASK_ID"
  | "UNKNOWN_TASK"
  | "UNKNOWN_TEMPLATE"
  | "INVALID_TRANSITION"
  | "DELEGATE_FAILED"
  | "DELEGATE_TIMEOUT"
  | "PARSE_FAILED"
  | "CONFIG_INVALID";

/** Base class for every error the engine raises on purpose. */
export class EngineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.code = code;
  }
}

/** Malformed input: bad task lists, unknown ids, duplicate registrations. */
export class ValidationError extends EngineError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ValidationError";
  }
}

/**
 * A status change the task state machine does not allow. This is a defect in
 * the calling code, so it is thrown and never converted into a task failure.
 */
export class InvalidTransitionError extends EngineError {
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus, detail?: string) {
    super(
      "INVALID_TRANSITION",
      `Task "${taskId}" cannot move from ${from} to ${to}${detail ? `: ${detail}` : ""}`,
    );
    this.name = "InvalidTransitionError";
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

export class DelegateError extends EngineError {
  readonly taskId: string;
  readonly timedOut: boolean;

  constructor(taskId: string, message: string, opts?: { timedOut?: boolean; cause?: unknown }) {
    super(opts?.timedOut ? "DELEGATE_TIMEOUT" : "DELEGATE_FAILED", message, { cause: opts?.cause });
    this.name = "DelegateError";
    this.taskId = taskId;
    this.timedOut = opts?.timedOut ?? false;
  }
}

export class ParseError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
    this.name = "ParseError";
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}
