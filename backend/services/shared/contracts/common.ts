// backend/services/shared/contracts/common.ts
import { z, type ZodError } from "zod";
import type { Response } from "express";
import { ValidationError, type ProblemIssue } from "../http/errors";

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z
    .array(z.object({ path: z.string(), code: z.string(), message: z.string() }))
    .optional(),
});
export type Problem = z.infer<typeof zProblem>;

export function toIssues(error: ZodError): ProblemIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}

/**
 * Input guard: parse or throw a 422 ValidationError.
 * Handlers call this before touching the service layer.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ValidationError(toIssues(parsed.error));
  return parsed.data;
}

/** Output guard: validate payload before sending */
export function respond<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  payload: z.input<T>,
  status = 200
) {
  const out = schema.parse(payload);
  return res.status(status).json(out);
}
