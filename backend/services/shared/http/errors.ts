// backend/services/shared/http/errors.ts

/**
 * Typed errors that carry their own RFC 7807 fields.
 * Services throw these; `errorProblemJson()` is the only place that turns
 * them into responses.
 */

export type ProblemIssue = {
  path: string;
  code: string;
  message: string;
};

export class HttpError extends Error {
  readonly status: number;
  readonly title: string;
  readonly code: string;
  readonly errors?: ProblemIssue[];

  constructor(
    status: number,
    title: string,
    code: string,
    detail: string,
    opts: { cause?: unknown; errors?: ProblemIssue[] } = {}
  ) {
    super(detail, { cause: opts.cause });
    this.name = new.target.name;
    this.status = status;
    this.title = title;
    this.code = code;
    this.errors = opts.errors;
  }
}

export class NotFoundError extends HttpError {
  constructor(detail = "Resource not found") {
    super(404, "Not Found", "NOT_FOUND", detail);
  }
}

export class ConflictError extends HttpError {
  constructor(detail = "Resource already exists") {
    super(409, "Conflict", "CONFLICT", detail);
  }
}

export class ValidationError extends HttpError {
  constructor(errors: ProblemIssue[], detail = "Validation failed") {
    super(422, "Unprocessable Entity", "VALIDATION_ERROR", detail, { errors });
  }
}

export class BadJsonError extends HttpError {
  constructor(cause?: unknown) {
    super(400, "Bad Request", "BAD_JSON", "Malformed JSON body", { cause });
  }
}

/** Backing store unreachable or an I/O failure; never retried here. */
export class StoreUnavailableError extends HttpError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(
      503,
      "Service Unavailable",
      "STORE_UNAVAILABLE",
      "Storage backend is unavailable",
      { cause }
    );
    this.operation = operation;
  }
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}
