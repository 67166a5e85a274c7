import { CancellationSource, type CancellationSignal } from "../cancellation/cancellation.js";
import { getConfig, type RepeatSignalPolicy } from "../config.js";
import {
  CancelledError,
  CleanupFailureError,
  CleanupTimeoutError,
  OrchestratorError,
  RunnerFailureError,
  ShutdownDeadlineError,
  isCancellation,
  messageOf,
  toError,
} from "../errors.js";
import { toRunner, type NormalizedRunner } from "../runners/runnable.js";
import { TimeoutMsSchema, parseOrThrow } from "../schemas.js";
import { listenForShutdownSignals, type SignalSubscription, type SignalTarget } from "../signals/signal-source.js";
import { log, type Logger } from "../utils/logger.js";
import { aggregate, describeReason, describeResult } from "./result.js";
import type {
  CleanupHook,
  ErrorHandler,
  LifecycleState,
  OrchestratorOptions,
  Outcome,
  RunResult,
  RunnerReport,
  ShutdownReason,
} from "./types.js";

type Deferred<T> = {
  promise: Promise<T>;
  resolve(value: T): void;
};

function deferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value) => settle(value) };
}

type CleanupOutcome = { ok: true } | { ok: false; error: unknown };

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Runs a fixed set of runners concurrently until the first of: an OS
 * signal (or `requestShutdown()`), a runner failure, or every runner
 * returning. Then cancels the shared signal, waits at most
 * `shutdownTimeoutMs` for the runners to stop, runs the cleanup hook under
 * its own deadline, and reports one categorised result.
 *
 * Single use: `run()` moves through idle → running → shutting-down →
 * terminated exactly once.
 */
export class Orchestrator {
  private state: LifecycleState = "idle";
  private readonly runners: NormalizedRunner[];
  private readonly cleanup?: CleanupHook;
  private readonly shutdownTimeoutMs: number;
  private readonly cleanupTimeoutMs: number;
  private readonly logger: Logger;
  private readonly errorHandler?: ErrorHandler;
  private readonly signals: NodeJS.Signals[];
  private readonly repeatSignal: RepeatSignalPolicy;
  private readonly signalTarget?: SignalTarget;
  private readonly shutdownSignal?: AbortSignal;

  private readonly cancellation = new CancellationSource();
  private readonly trigger = deferred<ShutdownReason>();
  private readonly escalation = deferred<NodeJS.Signals>();
  private reason: ShutdownReason | null = null;
  private failure?: RunnerFailureError;
  private readonly suppressed: RunnerFailureError[] = [];

  constructor(opts: OrchestratorOptions) {
    const config = getConfig();
    this.runners = opts.runners.map((runner, index) => toRunner(runner, index));
    this.cleanup = opts.cleanup;
    this.shutdownTimeoutMs = parseOrThrow(
      TimeoutMsSchema,
      opts.shutdownTimeoutMs ?? config.shutdown.timeoutMs,
      "shutdownTimeoutMs",
    );
    this.cleanupTimeoutMs = parseOrThrow(
      TimeoutMsSchema,
      opts.cleanupTimeoutMs ?? config.cleanup.timeoutMs,
      "cleanupTimeoutMs",
    );
    this.logger = opts.logger ?? log;
    this.errorHandler = opts.errorHandler;
    this.signals = opts.signals ?? config.shutdown.signals;
    this.repeatSignal = opts.repeatSignal ?? config.shutdown.repeatSignal;
    this.signalTarget = opts.signalTarget;
    this.shutdownSignal = opts.shutdownSignal;
  }

  getState(): LifecycleState {
    return this.state;
  }

  /** The signal runners observe. Read-only; only the orchestrator cancels it. */
  get signal(): CancellationSignal {
    return this.cancellation.signal;
  }

  /**
   * Ask for a shutdown as if an external signal arrived. Returns `false`
   * when a shutdown reason was already decided.
   */
  requestShutdown(source = "manual"): boolean {
    if (this.state === "terminated") return false;
    return this.settle({ kind: "external-signal", signal: source });
  }

  async run(): Promise<RunResult> {
    if (this.state !== "idle") {
      throw new OrchestratorError("INVALID_STATE", `Cannot run from state "${this.state}"`);
    }
    this.state = "running";
    const startedAt = Date.now();
    const subscription = this.subscribe();

    try {
      this.logger.debug("Starting runners", { count: this.runners.length });
      const reports: RunnerReport[] = this.runners.map((r): RunnerReport => ({ ...r.ref, outcome: "pending" }));
      const all = Promise.all(this.runners.map((runner, i) => this.launch(runner, reports[i])));
      void all.then(() => this.settle({ kind: "all-completed" }));

      // Phase 1: wait for the first trigger
      const reason = await this.trigger.promise;
      this.state = "shutting-down";
      this.logger.info("Shutting down", { reason: describeReason(reason) });

      // Phase 2: cancel and drain
      this.cancellation.cancel(new CancelledError(`Shutting down: ${describeReason(reason)}`));
      const deadlineError = await this.drain(all, reports);

      // Phase 3: cleanup
      const cleanupError = await this.runCleanup();

      this.state = "terminated";
      const result = aggregate({
        reason,
        deadlineError,
        failure: this.failure,
        cleanupError,
        suppressedErrors: [...this.suppressed],
        runners: reports.map((r) => ({ ...r })),
        startedAt,
        finishedAt: Date.now(),
      });

      const summary = { status: result.status, cause: result.cause, durationMs: result.durationMs };
      if (result.status === "success") {
        this.logger.info(`Orchestrator stopped: ${describeResult(result)}`, summary);
      } else {
        this.logger.error(`Orchestrator stopped: ${describeResult(result)}`, summary);
      }
      return result;
    } finally {
      subscription.close();
      this.cancellation.cancel(new CancelledError("Orchestrator terminated"));
      this.state = "terminated";
    }
  }

  // ---------------------------------------------------------------------------
  // Triggers
  // ---------------------------------------------------------------------------

  /** First writer wins; later reasons are dropped. */
  private settle(reason: ShutdownReason): boolean {
    if (this.reason !== null) return false;
    this.reason = reason;
    this.trigger.resolve(reason);
    return true;
  }

  private subscribe(): SignalSubscription {
    const releases: Array<() => void> = [];

    if (this.signals.length > 0) {
      const sub = listenForShutdownSignals({
        signals: this.signals,
        repeat: this.repeatSignal,
        target: this.signalTarget,
        logger: this.logger,
        onSignal: (signal) => {
          this.settle({ kind: "external-signal", signal });
        },
        onRepeat: (signal) => this.escalation.resolve(signal),
      });
      releases.push(() => sub.close());
    }

    const abort = this.shutdownSignal;
    if (abort) {
      const onAbort = () => {
        this.logger.info("Shutdown requested");
        this.settle({ kind: "external-signal", signal: "abort" });
      };
      if (abort.aborted) {
        onAbort();
      } else {
        abort.addEventListener("abort", onAbort, { once: true });
        releases.push(() => abort.removeEventListener("abort", onAbort));
      }
    }

    return {
      close() {
        for (const release of releases.splice(0)) release();
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Runners
  // ---------------------------------------------------------------------------

  /** Never rejects: every outcome is recorded on `report`. */
  private async launch(runner: NormalizedRunner, report: RunnerReport): Promise<void> {
    const { name, index } = runner.ref;
    const started = Date.now();
    this.logger.debug("Starting runner", { runner: name, index });

    const outcome = await this.execute(runner);
    report.outcome = outcome.kind;
    report.durationMs = Date.now() - started;

    switch (outcome.kind) {
      case "success":
        this.logger.debug("Runner completed", { runner: name, index });
        break;
      case "cancelled":
        this.logger.debug("Runner stopped after cancellation", { runner: name, index });
        break;
      case "handled":
        this.logger.warn("Runner error handled", { runner: name, index, error: outcome.error.message });
        break;
      case "failure":
        this.recordFailure(outcome.error);
        break;
    }
  }

  private async execute(runner: NormalizedRunner): Promise<Outcome> {
    const signal = this.cancellation.signal;
    try {
      await runner.run(signal);
      return { kind: "success" };
    } catch (err) {
      if (signal.cancelled && isCancellation(err, signal.reason)) return { kind: "cancelled" };
      const error = toError(err);
      const remaining = this.recover(runner, error);
      if (remaining === undefined) return { kind: "handled", error };
      return { kind: "failure", error: new RunnerFailureError(runner.ref, remaining) };
    }
  }

  /** Runner's own handler first, then the app-level one. */
  private recover(runner: NormalizedRunner, error: Error): Error | undefined {
    let remaining: Error | undefined = error;
    try {
      if (runner.handleError) remaining = runner.handleError(remaining);
      if (remaining !== undefined && this.errorHandler) remaining = this.errorHandler(remaining, runner.ref);
    } catch (handlerErr) {
      this.logger.warn("Error handler threw", { runner: runner.ref.name, error: messageOf(handlerErr) });
      return toError(handlerErr);
    }
    return remaining;
  }

  private recordFailure(error: RunnerFailureError): void {
    const data = { runner: error.runner.name, index: error.runner.index, error: messageOf(error.cause) };
    if (this.failure === undefined) {
      this.failure = error;
      this.logger.error("Runner failed", data);
      this.settle({ kind: "runner-failure", error });
      return;
    }
    this.suppressed.push(error);
    this.logger.error("Runner failed; an earlier failure is already being reported", data);
  }

  // ---------------------------------------------------------------------------
  // Shutdown
  // ---------------------------------------------------------------------------

  private async drain(all: Promise<unknown>, reports: RunnerReport[]): Promise<ShutdownDeadlineError | undefined> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<{ kind: "timeout" }>((resolve) => {
      timer = setTimeout(() => resolve({ kind: "timeout" }), this.shutdownTimeoutMs);
    });

    try {
      const outcome = await Promise.race([
        all.then(() => ({ kind: "drained" as const })),
        timeout,
        this.escalation.promise.then((signal) => ({ kind: "escalated" as const, signal })),
      ]);
      if (outcome.kind === "drained") return undefined;

      const pending = reports.filter((r) => r.outcome === "pending").map(({ index, name }) => ({ index, name }));
      const forcedBy = outcome.kind === "escalated" ? outcome.signal : undefined;
      const error = new ShutdownDeadlineError(this.shutdownTimeoutMs, pending, forcedBy);
      this.logger.warn(error.message, { pending: pending.map((r) => r.name) });
      return error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async runCleanup(): Promise<CleanupFailureError | undefined> {
    const hook = this.cleanup;
    if (!hook) return undefined;

    const timeoutMs = this.cleanupTimeoutMs;
    const source = new CancellationSource({ timeoutMs });
    this.logger.debug("Running cleanup", { timeoutMs });

    try {
      const outcome = await Promise.race<CleanupOutcome>([
        new Promise<void>((resolve) => resolve(hook(source.signal))).then(
          (): CleanupOutcome => ({ ok: true }),
          (error: unknown): CleanupOutcome => ({ ok: false, error }),
        ),
        source.signal
          .whenCancelled()
          .then((): CleanupOutcome => ({ ok: false, error: new CleanupTimeoutError(timeoutMs) })),
      ]);
      if (outcome.ok) {
        this.logger.debug("Cleanup finished");
        return undefined;
      }
      const error = new CleanupFailureError(outcome.error);
      this.logger.error("Cleanup failed", { error: messageOf(outcome.error) });
      return error;
    } finally {
      source.dispose();
    }
  }
}
