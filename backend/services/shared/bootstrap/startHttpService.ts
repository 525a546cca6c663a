// backend/services/shared/bootstrap/startHttpService.ts

/**
 * Bind, log where the server landed (port 0 in tests), shut down cleanly.
 * Higher-level bootstraps (env load, logger init, app assembly) call this;
 * this file never loads envs.
 *
 * Notes:
 * - `process.once` for SIGINT/SIGTERM so repeated calls don't stack handlers.
 * - `onShutdown` runs after the HTTP server has stopped accepting requests
 *   (close store connections there).
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  serviceName: string;
  logger: Logger;
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName, logger, onShutdown } = opts;

  return new Promise<StartedService>((resolve, reject) => {
    const server = app.listen(port);

    server.once("error", reject);

    server.once("listening", () => {
      server.off("error", reject);
      server.on("error", (err) => {
        logger.error({ err, service: serviceName }, "http server error");
      });

      // headersTimeout must stay above keepAliveTimeout
      server.keepAliveTimeout = 7_000;
      server.headersTimeout = 9_000;

      const addr: AddressInfo | string | null = server.address();
      const boundPort = addr && typeof addr === "object" ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");

      const stop = async () => {
        await new Promise<void>((done, fail) =>
          server.close((err) => (err ? fail(err) : done()))
        );
        if (onShutdown) await onShutdown();
      };

      const shutdown = (signal: string) => {
        logger.info({ signal, service: serviceName }, "shutting down service");
        stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err, service: serviceName }, "shutdown failed");
            process.exit(1);
          }
        );
        // Fail-safe in case close hangs
        setTimeout(() => process.exit(1), 10_000).unref();
      };

      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      resolve({ server, boundPort, stop });
    });
  });
}
