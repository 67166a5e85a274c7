import { getConfig, type LifelineConfig } from "../config.js";
import type {
  CleanupFailureError,
  OrchestratorError,
  RunnerFailureError,
  ShutdownDeadlineError,
} from "../errors.js";
import type { RunResult, RunStatus, RunnerReport, ShutdownReason, TerminationCause } from "./types.js";

export type RunRecord = {
  reason: ShutdownReason;
  deadlineError?: ShutdownDeadlineError;
  failure?: RunnerFailureError;
  cleanupError?: CleanupFailureError;
  suppressedErrors: RunnerFailureError[];
  runners: RunnerReport[];
  startedAt: number;
  finishedAt: number;
};

/**
 * Pick the one surfaced error. Priority: forced shutdown, then the first
 * runner failure, then a cleanup failure. An external signal on its own is
 * a successful stop.
 */
export function aggregate(record: RunRecord): RunResult {
  let status: RunStatus = "success";
  let cause: TerminationCause = record.reason.kind === "external-signal" ? "external-signal" : "completed";
  let error: OrchestratorError | undefined;

  if (record.deadlineError) {
    status = "forced";
    cause = "shutdown-deadline-exceeded";
    error = record.deadlineError;
  } else if (record.failure) {
    status = "failure";
    cause = "runner-failure";
    error = record.failure;
  } else if (record.cleanupError) {
    status = "failure";
    cause = "cleanup-failure";
    error = record.cleanupError;
  }

  return {
    status,
    cause,
    reason: record.reason,
    error,
    forced: record.deadlineError !== undefined,
    deadlineError: record.deadlineError,
    failure: record.failure,
    cleanupError: record.cleanupError,
    suppressedErrors: record.suppressedErrors,
    runners: record.runners,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
    durationMs: record.finishedAt - record.startedAt,
  };
}

export function exitCodeFor(
  result: Pick<RunResult, "status">,
  codes: LifelineConfig["exitCodes"] = getConfig().exitCodes,
): number {
  switch (result.status) {
    case "success":
      return codes.success;
    case "failure":
      return codes.failure;
    case "forced":
      return codes.forced;
  }
}

export function describeReason(reason: ShutdownReason): string {
  switch (reason.kind) {
    case "external-signal":
      return `received ${reason.signal}`;
    case "runner-failure":
      return reason.error.message;
    case "all-completed":
      return "all runners completed";
  }
}

/** One line for the final log entry. */
export function describeResult(result: RunResult): string {
  const trigger = describeReason(result.reason);
  switch (result.cause) {
    case "completed":
    case "external-signal":
      return `stopped cleanly (${trigger})`;
    case "runner-failure":
      return result.reason.kind === "runner-failure"
        ? `runner failure: ${trigger}`
        : `runner failure during shutdown (${trigger}): ${result.error?.message ?? "unknown error"}`;
    case "shutdown-deadline-exceeded":
      return `forced shutdown (${trigger}): ${result.error?.message ?? "deadline exceeded"}`;
    case "cleanup-failure":
      return `cleanup failure (${trigger}): ${result.error?.message ?? "unknown error"}`;
  }
}
