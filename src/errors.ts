import type { RunnerRef } from "./orchestrator/types.js";

export type ErrorCode =
  | "INVALID_STATE"
  | "VALIDATION_FAILED"
  | "CONFIG_INVALID"
  | "CANCELLED"
  | "DEADLINE_EXCEEDED"
  | "RUNNER_FAILED"
  | "SHUTDOWN_DEADLINE_EXCEEDED"
  | "CLEANUP_FAILED"
  | "CLEANUP_TIMEOUT"
  | "STARTUP_FAILED";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

export class ValidationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ValidationError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

/** Raised by runners (or handed to them as the signal reason) once cancellation was requested. */
export class CancelledError extends OrchestratorError {
  constructor(message = "Operation cancelled", options?: { cause?: unknown; code?: ErrorCode }) {
    super(options?.code ?? "CANCELLED", message, { cause: options?.cause });
    this.name = "CancelledError";
  }
}

export class DeadlineExceededError extends CancelledError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`, { code: "DEADLINE_EXCEEDED" });
    this.name = "DeadlineExceededError";
    this.timeoutMs = timeoutMs;
  }
}

export class RunnerFailureError extends OrchestratorError {
  readonly runner: RunnerRef;

  constructor(runner: RunnerRef, cause: unknown) {
    super("RUNNER_FAILED", `Runner "${runner.name}" (#${runner.index}) failed: ${messageOf(cause)}`, { cause });
    this.name = "RunnerFailureError";
    this.runner = runner;
  }
}

export class ShutdownDeadlineError extends OrchestratorError {
  readonly timeoutMs: number;
  readonly pending: RunnerRef[];
  /** Set when a repeated OS signal cut the wait short. */
  readonly forcedBy?: NodeJS.Signals;

  constructor(timeoutMs: number, pending: RunnerRef[], forcedBy?: NodeJS.Signals) {
    const head = forcedBy
      ? `Shutdown forced by repeated ${forcedBy}`
      : `Shutdown deadline of ${timeoutMs}ms exceeded`;
    const names = pending.map((r) => `"${r.name}"`).join(", ");
    super("SHUTDOWN_DEADLINE_EXCEEDED", pending.length > 0 ? `${head}; still running: ${names}` : head);
    this.name = "ShutdownDeadlineError";
    this.timeoutMs = timeoutMs;
    this.pending = pending;
    this.forcedBy = forcedBy;
  }
}

export class CleanupTimeoutError extends OrchestratorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("CLEANUP_TIMEOUT", `Cleanup did not finish within ${timeoutMs}ms`);
    this.name = "CleanupTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CleanupFailureError extends OrchestratorError {
  constructor(cause: unknown) {
    super("CLEANUP_FAILED", `Cleanup failed: ${messageOf(cause)}`, { cause });
    this.name = "CleanupFailureError";
  }
}

export class StartupError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STARTUP_FAILED", message, options);
    this.name = "StartupError";
  }
}

export function messageOf(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Whether `error` reports a stop on request: a `CancelledError`, an
 * `AbortError`, or `reason` itself rethrown. Callers check that their own
 * signal was cancelled first.
 */
export function isCancellation(error: unknown, reason?: unknown): boolean {
  if (error instanceof CancelledError) return true;
  if (reason !== undefined && error === reason) return true;
  return error instanceof Error && error.name === "AbortError";
}
