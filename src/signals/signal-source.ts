import type { RepeatSignalPolicy } from "../config.js";
import type { Logger } from "../utils/logger.js";

export type SignalHandler = (signal: NodeJS.Signals) => void;

/** The slice of `process` the listener needs. An `EventEmitter` works in tests. */
export type SignalTarget = {
  on(event: NodeJS.Signals, listener: SignalHandler): unknown;
  removeListener(event: NodeJS.Signals, listener: SignalHandler): unknown;
};

export type ShutdownSignalOptions = {
  signals: NodeJS.Signals[];
  /** Called for the first signal only. */
  onSignal: SignalHandler;
  /** Called for every later signal when `repeat` is `"force"`. */
  onRepeat?: SignalHandler;
  repeat?: RepeatSignalPolicy;
  target?: SignalTarget;
  logger?: Logger;
};

export type SignalSubscription = {
  /** Remove every listener. Safe to call more than once. */
  close(): void;
};

/**
 * Translate OS termination signals into a single shutdown trigger.
 * Handlers stay installed until `close()`; later signals are ignored or
 * passed to `onRepeat`.
 */
export function listenForShutdownSignals(opts: ShutdownSignalOptions): SignalSubscription {
  const target = opts.target ?? process;
  const repeat = opts.repeat ?? "ignore";
  let received: NodeJS.Signals | null = null;
  let closed = false;

  const handler: SignalHandler = (signal) => {
    if (closed) return;
    if (received === null) {
      received = signal;
      opts.logger?.info("Received termination signal", { signal });
      opts.onSignal(signal);
      return;
    }
    if (repeat === "force") {
      opts.logger?.warn("Repeated termination signal: forcing shutdown", { signal, first: received });
      opts.onRepeat?.(signal);
    } else {
      opts.logger?.warn("Repeated termination signal ignored; shutdown already in progress", { signal });
    }
  };

  const signals = [...new Set(opts.signals)];
  for (const signal of signals) {
    target.on(signal, handler);
  }

  return {
    close() {
      if (closed) return;
      closed = true;
      for (const signal of signals) {
        target.removeListener(signal, handler);
      }
    },
  };
}
