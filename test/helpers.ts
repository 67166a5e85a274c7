import type { CancellationSignal } from "../src/cancellation/cancellation.js";
import type { LogData, LogLevel, Logger } from "../src/utils/logger.js";

export type LogEntry = {
  level: LogLevel;
  msg: string;
  data?: LogData;
};

/** A logger that records entries instead of printing them. */
export function memoryLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const make = (bindings: LogData): Logger => {
    const write = (level: LogLevel) => (msg: string, data?: LogData) => {
      const merged = { ...bindings, ...data };
      entries.push(Object.keys(merged).length > 0 ? { level, msg, data: merged } : { level, msg });
    };
    return {
      debug: write("debug"),
      info: write("info"),
      warn: write("warn"),
      error: write("error"),
      child: (extra) => make({ ...bindings, ...extra }),
    };
  };
  return { logger: make({}), entries };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** A promise that never settles and holds no timer. */
export function forever(): Promise<void> {
  return new Promise<void>(() => {});
}

/** Resolve once `signal` is cancelled. */
export async function untilCancelled(signal: CancellationSignal): Promise<void> {
  await signal.whenCancelled();
}
