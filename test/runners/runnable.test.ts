import { describe, expect, it } from "vitest";
import { CancellationSource } from "../../src/cancellation/cancellation.js";
import type { Runnable } from "../../src/orchestrator/types.js";
import { describeRunner, named, toRunner } from "../../src/runners/runnable.js";

describe("describeRunner", () => {
  it("uses a function's own name", () => {
    const migrate = () => {};
    expect(describeRunner(migrate, 0)).toEqual({ index: 0, name: "migrate" });
  });

  it("falls back to the position for anonymous runners", () => {
    expect(describeRunner([() => {}][0], 3)).toEqual({ index: 3, name: "runner-3" });
    expect(describeRunner({ run: () => {} }, 1)).toEqual({ index: 1, name: "runner-1" });
  });

  it("uses a runnable's name", () => {
    expect(describeRunner(named("scheduler", () => {}), 2)).toEqual({ index: 2, name: "scheduler" });
  });
});

describe("toRunner", () => {
  it("turns a synchronous throw into a rejection", async () => {
    const runner = toRunner(() => {
      throw new Error("sync");
    }, 0);
    const signal = new CancellationSource().signal;

    await expect(runner.run(signal)).rejects.toThrow("sync");
  });

  it("keeps a runnable's error handler bound to it", () => {
    class Tolerant implements Runnable {
      name = "tolerant";
      readonly ignored: string[] = [];

      run(): void {}

      handleError(error: Error): Error | undefined {
        this.ignored.push(error.message);
        return undefined;
      }
    }
    const tolerant = new Tolerant();
    const runner = toRunner(tolerant, 0);

    expect(runner.handleError?.(new Error("transient"))).toBeUndefined();
    expect(tolerant.ignored).toEqual(["transient"]);
  });

  it("passes the signal through", async () => {
    const source = new CancellationSource();
    let seen: unknown;
    await toRunner(
      named("probe", (signal) => {
        seen = signal;
      }),
      0,
    ).run(source.signal);

    expect(seen).toBe(source.signal);
  });
});
