import type { z } from "zod";
import { CancellationSource, type CancellationSignal } from "./cancellation/cancellation.js";
import {
  configure,
  getConfig,
  loadEnvConfig,
  mergeConfig,
  DEFAULT_ENV_PREFIX,
  type DeepPartial,
  type LifelineConfig,
} from "./config.js";
import { ConfigError, StartupError, messageOf } from "./errors.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";
import { describeResult, exitCodeFor } from "./orchestrator/result.js";
import type { CleanupHook, ErrorHandler, RunResult, RunnerLike } from "./orchestrator/types.js";
import type { SignalTarget } from "./signals/signal-source.js";
import { log, setLogLevel, type LogData, type Logger } from "./utils/logger.js";

export type AppBundle = {
  runners: RunnerLike[];
  cleanup?: CleanupHook;
};

export type BuildContext<C> = {
  config: C;
  /** Expires after the startup timeout. */
  signal: CancellationSignal;
  logger: Logger;
};

export type AppBuilder<C> = (ctx: BuildContext<C>) => Promise<AppBundle> | AppBundle;

export type RunAppOptions<C> = {
  /** Zod schema the application's own config is parsed from `env` with. */
  schema: z.ZodType<C, z.ZodTypeDef, unknown>;
  env?: Record<string, string | undefined>;
  envPrefix?: string;
  /** Applied on top of the environment variables. */
  config?: DeepPartial<LifelineConfig>;
  logger?: Logger;
  /** Attributes added to every log line. */
  logAttrs?: LogData;
  errorHandler?: ErrorHandler;
  shutdownSignal?: AbortSignal;
  signalTarget?: SignalTarget;
  /** Called with the final exit code. Default: `process.exit`. */
  exit?: (code: number) => void;
  /** Receives the result before `exit` is called. */
  onResult?: (result: RunResult) => void;
};

/** Build the application under the startup deadline. */
async function build<C>(builder: AppBuilder<C>, config: C, logger: Logger): Promise<AppBundle> {
  const timeoutMs = getConfig().startup.timeoutMs;
  const source = new CancellationSource({ timeoutMs });
  try {
    const bundle = await Promise.race([
      new Promise<AppBundle>((resolve) => resolve(builder({ config, signal: source.signal, logger }))),
      source.signal.whenCancelled().then((): never => {
        throw new StartupError(`Startup did not finish within ${timeoutMs}ms`);
      }),
    ]);
    if (!Array.isArray(bundle.runners)) {
      throw new StartupError("App builder must return a runners array");
    }
    if (bundle.cleanup !== undefined && typeof bundle.cleanup !== "function") {
      throw new StartupError("App builder returned a cleanup that is not a function");
    }
    return bundle;
  } catch (err) {
    if (err instanceof StartupError) throw err;
    throw new StartupError(`Startup failed: ${messageOf(err)}`, { cause: err });
  } finally {
    source.dispose();
  }
}

/**
 * Load configuration, build the application, run it to completion and exit
 * with a status derived from the result. Returns the exit code.
 */
export async function runApp<C>(builder: AppBuilder<C>, opts: RunAppOptions<C>): Promise<number> {
  const env = opts.env ?? process.env;
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  const base = opts.logger ?? log;
  const logger = opts.logAttrs ? base.child(opts.logAttrs) : base;

  let orchestrator: Orchestrator;
  try {
    const fromEnv = mergeConfig(getConfig(), loadEnvConfig(env, opts.envPrefix ?? DEFAULT_ENV_PREFIX));
    configure(mergeConfig(fromEnv, opts.config ?? {}));
    setLogLevel(getConfig().log.level);

    const parsed = opts.schema.safeParse(env);
    if (!parsed.success) {
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ConfigError(`Failed to parse application config: ${msg}`);
    }

    const bundle = await build(builder, parsed.data, logger);
    orchestrator = new Orchestrator({
      runners: bundle.runners,
      cleanup: bundle.cleanup,
      logger,
      errorHandler: opts.errorHandler,
      shutdownSignal: opts.shutdownSignal,
      signalTarget: opts.signalTarget,
    });
  } catch (err) {
    logger.error(`App shutting down: Initialization error: ${messageOf(err)}`);
    const code = getConfig().exitCodes.failure;
    exit(code);
    return code;
  }

  const result = await orchestrator.run();
  logger.info(`App shutting down: ${describeResult(result)}`);
  if (result.cleanupError && result.cause !== "cleanup-failure") {
    logger.error(`Cleanup error: ${result.cleanupError.message}`);
  }
  opts.onResult?.(result);

  const code = exitCodeFor(result);
  logger.info("App shutdown complete", { exitCode: code });
  exit(code);
  return code;
}
