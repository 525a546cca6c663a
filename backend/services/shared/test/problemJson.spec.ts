// backend/services/shared/test/problemJson.spec.ts
import { describe, it, expect } from "vitest";
import express from "express";
import request from "supertest";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { coreMiddleware } from "../middleware/core";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "../middleware/problemJson";
import { parseOrThrow } from "../contracts/common";
import { ConflictError, StoreUnavailableError } from "../http/errors";

function buildApp() {
  const app = express();
  app.use(coreMiddleware());

  app.get("/api/conflict", () => {
    throw new ConflictError("taken");
  });
  app.get(
    "/api/store",
    asyncHandler(async () => {
      throw new StoreUnavailableError("get", new Error("secret-host:6379"));
    })
  );
  app.get("/api/forbidden", () => {
    throw Object.assign(new Error("nope"), { statusCode: 403 });
  });
  app.get("/api/upstream", () => {
    throw Object.assign(new Error("bad gateway"), { status: 502 });
  });
  app.get("/api/boom", () => {
    throw new Error("internal detail");
  });
  app.post(
    "/api/echo",
    asyncHandler(async (req, res) => {
      const body = parseOrThrow(z.object({ n: z.number().int() }), req.body);
      res.json(body);
    })
  );

  app.use(notFoundProblemJson(["/api"]));
  app.use(errorProblemJson());
  return app;
}

describe("problem+json middleware", () => {
  const agent = request(buildApp());

  it("renders HttpError fields", async () => {
    const res = await agent.get("/api/conflict").expect(409);
    expect(res.headers["content-type"]).toMatch(/application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Conflict",
      status: 409,
      code: "CONFLICT",
      detail: "taken",
    });
  });

  it("hides the cause of a store failure", async () => {
    const res = await agent.get("/api/store").expect(503);
    expect(res.body.detail).toBe("Storage backend is unavailable");
    expect(JSON.stringify(res.body)).not.toContain("secret-host");
  });

  it("unknown errors become a generic 500", async () => {
    const res = await agent.get("/api/boom").expect(500);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: "Unexpected error",
    });
  });

  it("keeps a 4xx status carried by a plain error", async () => {
    const res = await agent.get("/api/forbidden").expect(403);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Forbidden",
      status: 403,
      code: "CLIENT_ERROR",
      detail: "Forbidden",
    });
  });

  it("a 5xx status on a plain error is still a generic 500", async () => {
    const res = await agent.get("/api/upstream").expect(500);
    expect(res.body.code).toBe("INTERNAL_ERROR");
  });

  it("validation issues are listed with dotted paths", async () => {
    const res = await agent.post("/api/echo").send({ n: 1.5 }).expect(422);
    expect(res.body.errors).toHaveLength(1);
    expect(res.body.errors[0].path).toBe("n");
  });

  it("formats 404 only under known prefixes", async () => {
    const inside = await agent.get("/api/missing").expect(404);
    expect(inside.body.code).toBe("ROUTE_NOT_FOUND");

    const outside = await agent.get("/elsewhere").expect(404);
    expect(outside.text).toBe("");
  });
});
