// backend/services/shared/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { logger } from "../utils/logger";

const QUIET_PATHS = new Set(["/health", "/healthz", "/readyz", "/favicon.ico"]);

function firstHeader(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export function makeHttpLogger(serviceName: string) {
  return pinoHttp({
    logger,
    genReqId: (req, res) => {
      const id =
        firstHeader(req.headers["x-request-id"]) ||
        firstHeader(req.headers["x-correlation-id"]) ||
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },
    serializers: {
      req(req: { id: unknown; method: string; url: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
