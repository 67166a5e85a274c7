import { sleep, type CancellationSignal } from "../cancellation/cancellation.js";
import type { Runnable } from "../orchestrator/types.js";

export type IntervalRunnerOptions = {
  name?: string;
  /** Run `fn` once before the first wait. Default: false. */
  immediate?: boolean;
};

/**
 * Call `fn` every `intervalMs` until cancelled. Each call finishes before
 * the next wait starts. A thrown error fails the runner; nothing is retried.
 */
export function intervalRunner(
  fn: (signal: CancellationSignal) => Promise<void> | void,
  intervalMs: number,
  opts: IntervalRunnerOptions = {},
): Runnable {
  return {
    name: opts.name ?? "interval",
    async run(signal) {
      if (opts.immediate && !signal.cancelled) await fn(signal);
      while (!signal.cancelled) {
        const elapsed = await sleep(intervalMs, signal);
        if (!elapsed) break;
        await fn(signal);
      }
    },
  };
}
