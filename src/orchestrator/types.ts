import type { CancellationSignal } from "../cancellation/cancellation.js";
import type { RepeatSignalPolicy } from "../config.js";
import type {
  CleanupFailureError,
  OrchestratorError,
  RunnerFailureError,
  ShutdownDeadlineError,
} from "../errors.js";
import type { SignalTarget } from "../signals/signal-source.js";
import type { Logger } from "../utils/logger.js";

/** A unit of concurrent work. Resolving is success, rejecting is failure. */
export type Runner = (signal: CancellationSignal) => Promise<void> | void;

/**
 * Object form of a runner. `handleError` may recover from the runner's own
 * error by returning `undefined`; returning an error keeps it fatal.
 */
export interface Runnable {
  name?: string;
  run(signal: CancellationSignal): Promise<void> | void;
  handleError?(error: Error): Error | undefined;
}

export type RunnerLike = Runner | Runnable;

export type RunnerRef = {
  index: number;
  name: string;
};

export type CleanupHook = (signal: CancellationSignal) => Promise<void> | void;

/** App-level chance to recover a runner error; `undefined` means handled. */
export type ErrorHandler = (error: Error, runner: RunnerRef) => Error | undefined;

export type Outcome =
  | { kind: "success" }
  | { kind: "cancelled" }
  | { kind: "handled"; error: Error }
  | { kind: "failure"; error: RunnerFailureError };

export type ShutdownReason =
  | { kind: "external-signal"; signal: string }
  | { kind: "runner-failure"; error: RunnerFailureError }
  | { kind: "all-completed" };

export type LifecycleState = "idle" | "running" | "shutting-down" | "terminated";

export type RunStatus = "success" | "failure" | "forced";

/** What ended the run, as an operator would want to read it. */
export type TerminationCause =
  | "completed"
  | "external-signal"
  | "runner-failure"
  | "shutdown-deadline-exceeded"
  | "cleanup-failure";

export type RunnerReport = RunnerRef & {
  /** `"pending"` when the runner had not returned by the time waiting stopped. */
  outcome: Outcome["kind"] | "pending";
  durationMs?: number;
};

export type RunResult = {
  status: RunStatus;
  cause: TerminationCause;
  reason: ShutdownReason;
  /** The single surfaced error; absent on success. */
  error?: OrchestratorError;
  forced: boolean;
  deadlineError?: ShutdownDeadlineError;
  failure?: RunnerFailureError;
  cleanupError?: CleanupFailureError;
  /** Runner failures after the first. Logged and kept here, never surfaced as `error`. */
  suppressedErrors: RunnerFailureError[];
  runners: RunnerReport[];
  startedAt: number;
  finishedAt: number;
  durationMs: number;
};

export type OrchestratorOptions = {
  runners: RunnerLike[];
  cleanup?: CleanupHook;
  /** Bound on waiting for runners after cancellation. Default: config `shutdown.timeoutMs`. */
  shutdownTimeoutMs?: number;
  /** Deadline handed to the cleanup hook. Default: config `cleanup.timeoutMs`. */
  cleanupTimeoutMs?: number;
  logger?: Logger;
  errorHandler?: ErrorHandler;
  /** OS signals to listen for. An empty list disables signal handling. */
  signals?: NodeJS.Signals[];
  repeatSignal?: RepeatSignalPolicy;
  signalTarget?: SignalTarget;
  /** Programmatic shutdown trigger; aborting it counts as an external signal. */
  shutdownSignal?: AbortSignal;
};
