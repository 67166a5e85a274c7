import { EventEmitter } from "node:events";
import type { SpawnOptions } from "node:child_process";
import { describe, expect, it } from "vitest";
import { CancellationSource } from "../../src/cancellation/cancellation.js";
import { CancelledError } from "../../src/errors.js";
import { processRunner, type SpawnFn } from "../../src/runners/process.js";
import { memoryLogger } from "../helpers.js";

class FakeChild extends EventEmitter {
  readonly pid = 4242;
  readonly killedWith: Array<NodeJS.Signals | undefined> = [];

  kill(signal?: NodeJS.Signals): boolean {
    this.killedWith.push(signal);
    setImmediate(() => this.emit("exit", null, signal ?? "SIGTERM"));
    return true;
  }
}

type SpawnCall = { command: string; args: string[]; options: SpawnOptions };

function fakeSpawn(child: FakeChild): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    return child;
  };
  return { spawn, calls };
}

function start(command: string, child: FakeChild, opts: Parameters<typeof processRunner>[1] = {}) {
  const source = new CancellationSource();
  const { spawn, calls } = fakeSpawn(child);
  const runner = processRunner(command, { logger: memoryLogger().logger, spawn, ...opts });
  const done = Promise.resolve(runner.run(source.signal));
  return { source, calls, done, runner };
}

describe("processRunner", () => {
  it("runs a bare command through the shell", async () => {
    const child = new FakeChild();
    const { calls, done, runner } = start("npm run dev", child);

    child.emit("exit", 0, null);

    await expect(done).resolves.toBeUndefined();
    expect(runner.name).toBe("npm run dev");
    expect(calls).toEqual([
      { command: "npm run dev", args: [], options: { shell: true, stdio: "inherit", cwd: undefined, env: undefined } },
    ]);
  });

  it("runs a command with arguments directly", async () => {
    const child = new FakeChild();
    const { calls, done } = start("node", child, { args: ["server.js"], cwd: "/srv/app", name: "api" });

    child.emit("exit", 0, null);
    await done;

    expect(calls[0].args).toEqual(["server.js"]);
    expect(calls[0].options).toMatchObject({ shell: false, cwd: "/srv/app" });
  });

  it("fails on a non-zero exit code", async () => {
    const child = new FakeChild();
    const { done } = start("make build", child);

    child.emit("exit", 3, null);

    await expect(done).rejects.toThrow('Process "make build" exited with code 3');
  });

  it("fails when something else kills the process", async () => {
    const child = new FakeChild();
    const { done } = start("worker", child);

    child.emit("exit", null, "SIGKILL");

    await expect(done).rejects.toThrow('Process "worker" was killed by SIGKILL');
  });

  it("fails when the process cannot be spawned", async () => {
    const child = new FakeChild();
    const { done } = start("missing-binary", child);

    child.emit("error", new Error("spawn missing-binary ENOENT"));

    await expect(done).rejects.toThrow("spawn missing-binary ENOENT");
  });

  it("sends SIGTERM on cancellation and reports a cancelled stop", async () => {
    const child = new FakeChild();
    const { source, done } = start("worker", child);

    source.cancel();

    await expect(done).rejects.toBeInstanceOf(CancelledError);
    await expect(done).rejects.toThrow('Process "worker" stopped');
    expect(child.killedWith).toEqual(["SIGTERM"]);
  });

  it("uses the configured kill signal", async () => {
    const child = new FakeChild();
    const { source, done } = start("worker", child, { killSignal: "SIGINT" });

    source.cancel();

    await expect(done).rejects.toBeInstanceOf(CancelledError);
    expect(child.killedWith).toEqual(["SIGINT"]);
  });

  it("succeeds when the process exits cleanly after being asked to stop", async () => {
    const child = new FakeChild();
    child.kill = (signal) => {
      child.killedWith.push(signal);
      setImmediate(() => child.emit("exit", 0, null));
      return true;
    };
    const { source, done } = start("graceful", child);

    source.cancel();

    await expect(done).resolves.toBeUndefined();
  });

  it("does not spawn when already cancelled", async () => {
    const child = new FakeChild();
    const source = new CancellationSource();
    source.cancel();
    const { spawn, calls } = fakeSpawn(child);

    await processRunner("worker", { spawn }).run(source.signal);

    expect(calls).toEqual([]);
  });
});
