import { EventEmitter } from "node:events";
import type { AddressInfo } from "node:net";
import { describe, expect, it } from "vitest";
import { CancellationSource } from "../../src/cancellation/cancellation.js";
import { Orchestrator } from "../../src/orchestrator/orchestrator.js";
import { httpServerRunner } from "../../src/runners/http-server.js";
import { memoryLogger } from "../helpers.js";

class FakeServer extends EventEmitter {
  listening = false;
  closeCalls = 0;
  closeError?: Error;
  boundHost?: string;

  listen(_port: number, host: string, callback: () => void): this {
    this.boundHost = host;
    setImmediate(() => {
      this.listening = true;
      callback();
    });
    return this;
  }

  close(callback: (err?: Error) => void): this {
    this.closeCalls++;
    if (!this.listening) {
      setImmediate(() => callback(new Error("Server is not running.")));
      return this;
    }
    this.listening = false;
    setImmediate(() => callback(this.closeError));
    return this;
  }

  address(): AddressInfo {
    return { port: 4321, address: this.boundHost ?? "127.0.0.1", family: "IPv4" };
  }
}

function listeningSignal(): { onListening: (addr: { port: number; host: string }) => void; listening: Promise<{ port: number; host: string }> } {
  let onListening: (addr: { port: number; host: string }) => void = () => {};
  const listening = new Promise<{ port: number; host: string }>((resolve) => {
    onListening = resolve;
  });
  return { onListening, listening };
}

describe("httpServerRunner", () => {
  it("listens until cancelled and then closes the server", async () => {
    const server = new FakeServer();
    const source = new CancellationSource();
    const { logger, entries } = memoryLogger();
    const { onListening, listening } = listeningSignal();

    const done = Promise.resolve(httpServerRunner(server, { logger, onListening }).run(source.signal));

    await expect(listening).resolves.toEqual({ port: 4321, host: "127.0.0.1" });
    expect(server.listening).toBe(true);

    source.cancel();
    await expect(done).resolves.toBeUndefined();
    expect(server.closeCalls).toBe(1);
    expect(server.listenerCount("error")).toBe(0);
    expect(entries.map((e) => e.msg)).toEqual(["Server listening at http://127.0.0.1:4321", "Closing server"]);
  });

  it("binds to the configured host", async () => {
    const server = new FakeServer();
    const source = new CancellationSource();
    const { onListening, listening } = listeningSignal();

    const done = Promise.resolve(
      httpServerRunner(server, { host: "0.0.0.0", port: 8080, logger: memoryLogger().logger, onListening }).run(
        source.signal,
      ),
    );

    await expect(listening).resolves.toEqual({ port: 4321, host: "0.0.0.0" });
    source.cancel();
    await done;
  });

  it("fails when the server emits an error", async () => {
    const server = new FakeServer();
    const source = new CancellationSource();
    const done = Promise.resolve(httpServerRunner(server, { logger: memoryLogger().logger }).run(source.signal));

    server.emit("error", new Error("listen EADDRINUSE"));

    await expect(done).rejects.toThrow("listen EADDRINUSE");
    source.cancel();
    expect(server.closeCalls).toBe(0);
  });

  it("fails when closing fails", async () => {
    const server = new FakeServer();
    server.closeError = new Error("close failed");
    const source = new CancellationSource();
    const { onListening, listening } = listeningSignal();
    const done = Promise.resolve(
      httpServerRunner(server, { logger: memoryLogger().logger, onListening }).run(source.signal),
    );

    await listening;
    source.cancel();
    await expect(done).rejects.toThrow("close failed");
  });

  it("waits for the server to bind before closing it", async () => {
    const server = new FakeServer();
    const source = new CancellationSource();
    const { logger, entries } = memoryLogger();

    const done = Promise.resolve(httpServerRunner(server, { logger }).run(source.signal));
    source.cancel();

    await expect(done).resolves.toBeUndefined();
    expect(server.closeCalls).toBe(1);
    expect(server.listening).toBe(false);
    expect(entries.map((e) => e.msg)).toEqual(["Server listening at http://127.0.0.1:4321", "Closing server"]);
  });

  it("does not listen when already cancelled", async () => {
    const server = new FakeServer();
    const source = new CancellationSource();
    source.cancel();

    await httpServerRunner(server).run(source.signal);

    expect(server.listening).toBe(false);
    expect(server.closeCalls).toBe(0);
  });

  it("stops cleanly under the orchestrator", async () => {
    const server = new FakeServer();
    const { logger } = memoryLogger();
    const { onListening, listening } = listeningSignal();
    const orch = new Orchestrator({
      runners: [httpServerRunner(server, { logger, onListening })],
      signals: [],
      logger,
    });

    const run = orch.run();
    await listening;
    orch.requestShutdown();
    const result = await run;

    expect(result.status).toBe("success");
    expect(result.runners).toEqual([{ index: 0, name: "http-server", outcome: "success", durationMs: expect.any(Number) }]);
  });

  it("stops cleanly when the shutdown is requested before the server binds", async () => {
    const server = new FakeServer();
    const { logger } = memoryLogger();
    const controller = new AbortController();
    controller.abort();

    const result = await new Orchestrator({
      runners: [httpServerRunner(server, { logger })],
      signals: [],
      shutdownSignal: controller.signal,
      logger,
    }).run();

    expect(result.status).toBe("success");
    expect(result.cause).toBe("external-signal");
    expect(result.runners[0].outcome).toBe("success");
  });

  it("stops cleanly when a sibling fails before the server binds", async () => {
    const server = new FakeServer();
    const { logger } = memoryLogger();

    const result = await new Orchestrator({
      runners: [httpServerRunner(server, { logger }), () => Promise.reject(new Error("boom"))],
      signals: [],
      logger,
    }).run();

    expect(result.error?.message).toBe('Runner "runner-1" (#1) failed: boom');
    expect(result.suppressedErrors).toEqual([]);
    expect(result.runners[0].outcome).toBe("success");
  });
});
