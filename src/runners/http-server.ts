import type { AddressInfo } from "node:net";
import type { Runnable } from "../orchestrator/types.js";
import { log, type Logger } from "../utils/logger.js";

/** The parts of `http.Server` (or `net.Server`) the runner drives. */
export type ListeningServer = {
  listen(port: number, host: string, callback: () => void): unknown;
  close(callback: (err?: Error) => void): unknown;
  address(): AddressInfo | string | null;
  once(event: "error", listener: (err: Error) => void): unknown;
  removeListener(event: "error", listener: (err: Error) => void): unknown;
};

export type HttpServerRunnerOptions = {
  port?: number;
  host?: string;
  name?: string;
  logger?: Logger;
  /** Called once the server accepts connections. */
  onListening?: (address: { port: number; host: string }) => void;
};

/**
 * Listen until cancelled, then stop accepting connections and resolve once
 * the server has closed. A server `error` fails the runner.
 */
export function httpServerRunner(server: ListeningServer, opts: HttpServerRunnerOptions = {}): Runnable {
  const logger = opts.logger ?? log;
  const port = opts.port ?? 0;
  const host = opts.host ?? "127.0.0.1";

  return {
    name: opts.name ?? "http-server",
    run(signal) {
      if (signal.cancelled) return Promise.resolve();
      return new Promise<void>((resolve, reject) => {
        let bound = false;
        let closeRequested = false;
        let closing = false;

        const onError = (err: Error) => {
          stopListening();
          reject(err);
        };

        const close = () => {
          if (closing) return;
          closing = true;
          server.close((err) => {
            server.removeListener("error", onError);
            if (err) reject(err);
            else resolve();
          });
        };

        server.once("error", onError);
        const stopListening = signal.onCancel(() => {
          closeRequested = true;
          // close() fails on a server that has not bound yet; the listen callback closes it instead
          if (!bound) return;
          logger.info("Closing server");
          close();
        });

        server.listen(port, host, () => {
          bound = true;
          const addr = server.address();
          const info = addr && typeof addr === "object" ? { port: addr.port, host: addr.address } : { port, host };
          logger.info(`Server listening at http://${info.host}:${info.port}`);
          opts.onListening?.(info);
          if (closeRequested) {
            logger.info("Closing server");
            close();
          }
        });
      });
    },
  };
}
