// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger
 *
 * Each service calls `initLogger(SERVICE_NAME, level)` at bootstrap, BEFORE
 * creating request loggers (pino-http). Modules that imported `logger` earlier
 * keep working: `logger` is a live binding that initLogger reassigns.
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger("phone-address", config.logLevel);
 */

const VALID_LEVELS: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(v: string): v is LevelWithSilent {
  return VALID_LEVELS.has(v);
}

function envLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "").trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

let SERVICE_NAME = (process.env.SERVICE_NAME || "").trim();

function buildOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
    timestamp: stdTimeFunctions.isoTime,
    messageKey: "msg",
    redact: {
      paths: [
        "req.headers.authorization",
        "req.headers.cookie",
        "res.headers['set-cookie']",
      ],
      remove: true,
    },
  };
}

export let logger: Logger = pino(buildOptions(envLevel()));

export function initLogger(serviceName: string, level?: LevelWithSilent) {
  SERVICE_NAME = serviceName;
  logger = pino(buildOptions(level ?? envLevel()));
  return logger;
}

// ───────────────────────────── Request context helper ─────────────────────────
function headerValue(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export function extractLogContext(req: Request): Record<string, unknown> {
  const hdrId =
    headerValue(req.headers["x-request-id"]) ||
    headerValue(req.headers["x-correlation-id"]);
  const id: unknown = req.id;
  return {
    requestId: (typeof id === "string" && id) || hdrId || null,
    path: req.originalUrl,
    method: req.method,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
