import { CancelledError, DeadlineExceededError } from "../errors.js";

export type CancelListener = (reason: unknown) => void;

/**
 * Read-only view of a cancellation. Handed to runners and cleanup hooks;
 * only the owning `CancellationSource` can cancel it.
 */
export interface CancellationSignal {
  readonly cancelled: boolean;
  /** Why it was cancelled; `undefined` until then. */
  readonly reason: unknown;
  /** Epoch milliseconds at which it cancels itself, if it has a timeout. */
  readonly deadline?: number;
  /** Standard signal for `fetch`, `node:timers/promises`, `child_process` and friends. */
  readonly abortSignal: AbortSignal;

  /**
   * Call `listener` once when cancelled (immediately if already cancelled).
   * Returns a function that removes the listener.
   */
  onCancel(listener: CancelListener): () => void;
  /** Resolves with the reason once cancelled. Never rejects. */
  whenCancelled(): Promise<unknown>;
  throwIfCancelled(): void;
}

export type CancellationSourceOptions = {
  /** Cancel together with this signal. */
  parent?: CancellationSignal;
  /** Cancel with a `DeadlineExceededError` after this many milliseconds. */
  timeoutMs?: number;
};

class Signal implements CancellationSignal {
  readonly deadline?: number;

  constructor(
    private readonly controller: AbortController,
    deadline: number | undefined,
  ) {
    this.deadline = deadline;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): unknown {
    return this.cancelled ? this.controller.signal.reason : undefined;
  }

  get abortSignal(): AbortSignal {
    return this.controller.signal;
  }

  onCancel(listener: CancelListener): () => void {
    const signal = this.controller.signal;
    if (signal.aborted) {
      listener(signal.reason);
      return () => {};
    }
    const handler = () => listener(signal.reason);
    signal.addEventListener("abort", handler, { once: true });
    return () => signal.removeEventListener("abort", handler);
  }

  whenCancelled(): Promise<unknown> {
    return new Promise((resolve) => {
      this.onCancel(resolve);
    });
  }

  throwIfCancelled(): void {
    if (!this.cancelled) return;
    const reason = this.reason;
    throw reason instanceof Error ? reason : new CancelledError(String(reason));
  }
}

/**
 * Owner side of a one-shot, monotonic broadcast. `cancel()` flips the
 * signal exactly once; every later call is a no-op.
 */
export class CancellationSource {
  readonly signal: CancellationSignal;
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | null = null;
  private unlinkParent: (() => void) | null = null;

  constructor(opts?: CancellationSourceOptions) {
    const timeoutMs = opts?.timeoutMs;
    const deadline = timeoutMs !== undefined ? Date.now() + timeoutMs : undefined;
    this.signal = new Signal(this.controller, deadline);

    if (opts?.parent) {
      this.unlinkParent = opts.parent.onCancel((reason) => this.cancel(reason));
    }

    if (timeoutMs !== undefined && !this.controller.signal.aborted) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.cancel(new DeadlineExceededError(timeoutMs));
      }, timeoutMs);
    }
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Returns `true` if this call did the cancelling. */
  cancel(reason: unknown = new CancelledError()): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort(reason);
    this.release();
    return true;
  }

  /** Drop the timer and the parent link without cancelling. */
  dispose(): void {
    this.release();
  }

  private release(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.unlinkParent) {
      this.unlinkParent();
      this.unlinkParent = null;
    }
  }
}

/** Sleep for `ms`, resolving early (with `false`) if `signal` is cancelled first. */
export function sleep(ms: number, signal?: CancellationSignal): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      off?.();
      resolve(true);
    }, ms);
    const off = signal?.onCancel(() => {
      clearTimeout(timer);
      resolve(false);
    });
  });
}
