import { spawn, type SpawnOptions } from "node:child_process";
import { CancelledError } from "../errors.js";
import type { Runnable } from "../orchestrator/types.js";
import { log, type Logger } from "../utils/logger.js";

/** The parts of `ChildProcess` the runner uses. */
export type ChildLike = {
  readonly pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
};

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildLike;

export type ProcessRunnerOptions = {
  args?: string[];
  name?: string;
  /** Run through the shell. Default: true when no `args` are given. */
  shell?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Sent on cancellation. Default: SIGTERM. */
  killSignal?: NodeJS.Signals;
  logger?: Logger;
  spawn?: SpawnFn;
};

/**
 * Run a child process as a runner. Exit code 0 is success and any other
 * exit is a failure, unless the process was stopped by cancellation.
 */
export function processRunner(command: string, opts: ProcessRunnerOptions = {}): Runnable {
  const args = opts.args ?? [];
  const name = opts.name ?? command;
  const killSignal = opts.killSignal ?? "SIGTERM";
  const logger = opts.logger ?? log;
  const spawnFn: SpawnFn = opts.spawn ?? spawn;

  return {
    name,
    run(signal) {
      if (signal.cancelled) return Promise.resolve();
      return new Promise<void>((resolve, reject) => {
        const child = spawnFn(command, args, {
          shell: opts.shell ?? args.length === 0,
          stdio: "inherit",
          cwd: opts.cwd,
          env: opts.env,
        });
        logger.debug(`[${name}] Process started`, { pid: child.pid });

        let stopping = false;
        const off = signal.onCancel(() => {
          stopping = true;
          logger.info(`[${name}] Stopping process`, { pid: child.pid, signal: killSignal });
          child.kill(killSignal);
        });

        child.once("error", (err) => {
          off();
          reject(err);
        });

        child.once("exit", (code, exitSignal) => {
          off();
          if (code === 0) {
            resolve();
          } else if (stopping) {
            reject(new CancelledError(`Process "${name}" stopped`));
          } else if (exitSignal) {
            reject(new Error(`Process "${name}" was killed by ${exitSignal}`));
          } else {
            reject(new Error(`Process "${name}" exited with code ${code}`));
          }
        });
      });
    },
  };
}
