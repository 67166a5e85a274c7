// Config
export { getConfig, configure, resetConfig, mergeConfig, loadEnvConfig, defaults, DEFAULT_ENV_PREFIX } from "./config.js";
export type { LifelineConfig, DeepPartial, RepeatSignalPolicy } from "./config.js";

// Errors
export {
  OrchestratorError,
  ValidationError,
  ConfigError,
  CancelledError,
  DeadlineExceededError,
  RunnerFailureError,
  ShutdownDeadlineError,
  CleanupFailureError,
  CleanupTimeoutError,
  StartupError,
  isCancellation,
  toError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, parseDuration, DurationSchema, TimeoutMsSchema, EnvConfigSchema } from "./schemas.js";

// Cancellation
export { CancellationSource, sleep } from "./cancellation/cancellation.js";
export type { CancellationSignal, CancellationSourceOptions, CancelListener } from "./cancellation/cancellation.js";

// Signals
export { listenForShutdownSignals } from "./signals/signal-source.js";
export type { SignalTarget, SignalSubscription, ShutdownSignalOptions } from "./signals/signal-source.js";

// Core
export { Orchestrator } from "./orchestrator/orchestrator.js";
export { aggregate, exitCodeFor, describeReason, describeResult } from "./orchestrator/result.js";
export type {
  Runner,
  Runnable,
  RunnerLike,
  RunnerRef,
  CleanupHook,
  ErrorHandler,
  Outcome,
  ShutdownReason,
  LifecycleState,
  RunStatus,
  TerminationCause,
  RunnerReport,
  RunResult,
  OrchestratorOptions,
} from "./orchestrator/types.js";

// App
export { runApp } from "./app.js";
export type { AppBuilder, AppBundle, BuildContext, RunAppOptions } from "./app.js";

// Runners
export { named, describeRunner } from "./runners/runnable.js";
export { intervalRunner } from "./runners/interval.js";
export type { IntervalRunnerOptions } from "./runners/interval.js";
export { httpServerRunner } from "./runners/http-server.js";
export type { HttpServerRunnerOptions, ListeningServer } from "./runners/http-server.js";
export { processRunner } from "./runners/process.js";
export type { ProcessRunnerOptions, SpawnFn, ChildLike } from "./runners/process.js";

// Utils
export { log, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel, LogData } from "./utils/logger.js";
