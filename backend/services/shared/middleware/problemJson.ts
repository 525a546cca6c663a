// backend/services/shared/middleware/problemJson.ts

/**
 * Error responses are RFC 7807 Problem+JSON so clients/tests can rely on a
 * stable shape. 404s are only formatted for known prefixes; anything else
 * gets a bare 404.
 *
 * Notes:
 * - Transport-level formatting only, no business logic.
 * - Unknown errors never leak their message; they are logged instead.
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { STATUS_CODES } from "node:http";
import { BadJsonError, HttpError, isHttpError } from "../http/errors";
import { extractLogContext, logger } from "../utils/logger";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

function instanceOf(req: Request): string | undefined {
  const id: unknown = req.id;
  return typeof id === "string" ? id : undefined;
}

type ClientErrorShape = {
  status: number;
  title: string;
  code: string;
  detail: string;
};

/** body-parser `type` values that are the client's fault. */
const BODY_PARSER_ERRORS = new Map<string, ClientErrorShape>([
  [
    "entity.too.large",
    {
      status: 413,
      title: "Payload Too Large",
      code: "PAYLOAD_TOO_LARGE",
      detail: "Request body is too large",
    },
  ],
  [
    "charset.unsupported",
    {
      status: 415,
      title: "Unsupported Media Type",
      code: "UNSUPPORTED_CHARSET",
      detail: "Unsupported request body charset",
    },
  ],
  [
    "encoding.unsupported",
    {
      status: 415,
      title: "Unsupported Media Type",
      code: "UNSUPPORTED_ENCODING",
      detail: "Unsupported request body encoding",
    },
  ],
  [
    "request.aborted",
    {
      status: 400,
      title: "Bad Request",
      code: "REQUEST_ABORTED",
      detail: "Request body was aborted",
    },
  ],
]);

function readProp(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null
    ? Reflect.get(err, key)
    : undefined;
}

/** `status` / `statusCode` as set by express and body-parser. */
function clientStatusOf(err: unknown): number | undefined {
  for (const key of ["status", "statusCode"]) {
    const v = readProp(err, key);
    if (typeof v === "number" && v >= 400 && v < 500) return v;
  }
  return undefined;
}

/**
 * Map what express and body-parser raise to HttpError:
 * - malformed JSON (`entity.parse.failed`) → 400 BAD_JSON
 * - known body-parser types → their 4xx
 * - undecodable path params (URIError) → 400
 * - any other error carrying a 4xx status → that status
 * Everything else is left for the 500 branch.
 */
function normalize(err: unknown): HttpError | null {
  if (isHttpError(err)) return err;

  const type = readProp(err, "type");
  if (type === "entity.parse.failed") return new BadJsonError(err);
  const known = typeof type === "string" ? BODY_PARSER_ERRORS.get(type) : undefined;
  if (known) {
    return new HttpError(known.status, known.title, known.code, known.detail, {
      cause: err,
    });
  }

  if (err instanceof URIError) {
    return new HttpError(400, "Bad Request", "BAD_PATH", "Malformed URL path", {
      cause: err,
    });
  }

  const status = clientStatusOf(err);
  if (status !== undefined) {
    const title = STATUS_CODES[status] ?? "Bad Request";
    return new HttpError(status, title, "CLIENT_ERROR", title, { cause: err });
  }
  return null;
}

export function sendProblem(req: Request, res: Response, err: HttpError) {
  return res
    .status(err.status)
    .type(PROBLEM_CONTENT_TYPE)
    .json({
      type: "about:blank",
      title: err.title,
      status: err.status,
      code: err.code,
      detail: err.message,
      instance: instanceOf(req),
      ...(err.errors ? { errors: err.errors } : {}),
    });
}

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      res
        .status(404)
        .type(PROBLEM_CONTENT_TYPE)
        .json({
          type: "about:blank",
          title: "Not Found",
          status: 404,
          code: "ROUTE_NOT_FOUND",
          detail: "Route not found",
          instance: instanceOf(req),
        });
      return;
    }
    res.status(404).end();
  };
}

export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const log = req.log ?? logger;
    const known = normalize(err);

    if (known) {
      if (known.status >= 500) {
        log.error(
          { ...extractLogContext(req), err: known, cause: known.cause },
          "request failed"
        );
      }
      sendProblem(req, res, known);
      return;
    }

    log.error({ ...extractLogContext(req), err }, "unhandled request error");
    res
      .status(500)
      .type(PROBLEM_CONTENT_TYPE)
      .json({
        type: "about:blank",
        title: "Internal Server Error",
        status: 500,
        code: "INTERNAL_ERROR",
        detail: "Unexpected error",
        instance: instanceOf(req),
      });
  };
}
