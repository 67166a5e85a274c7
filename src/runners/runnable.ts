import type { CancellationSignal } from "../cancellation/cancellation.js";
import type { Runnable, RunnerLike, RunnerRef } from "../orchestrator/types.js";

export type NormalizedRunner = {
  ref: RunnerRef;
  run(signal: CancellationSignal): Promise<void>;
  handleError?(error: Error): Error | undefined;
};

function isRunnable(runner: RunnerLike): runner is Runnable {
  return typeof runner === "object" && runner !== null && typeof runner.run === "function";
}

export function describeRunner(runner: RunnerLike, index: number): RunnerRef {
  const name = runner.name;
  return { index, name: name && name.length > 0 ? name : `runner-${index}` };
}

/** Normalise either runner shape. Synchronous throws become rejections. */
export function toRunner(runner: RunnerLike, index: number): NormalizedRunner {
  const ref = describeRunner(runner, index);
  if (isRunnable(runner)) {
    return {
      ref,
      run: (signal) => new Promise<void>((resolve) => resolve(runner.run(signal))),
      handleError: runner.handleError?.bind(runner),
    };
  }
  return {
    ref,
    run: (signal) => new Promise<void>((resolve) => resolve(runner(signal))),
  };
}

/** Give a plain runner function a name for logs and error messages. */
export function named(name: string, run: (signal: CancellationSignal) => Promise<void> | void): Runnable {
  return { name, run };
}
