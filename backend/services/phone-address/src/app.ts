// backend/services/phone-address/src/app.ts
/**
 * Assembly order:
 *   core (cors, json) → httpLogger → health (open) → openapi → routes → 404 → error.
 *
 * The store and service are built by the caller (index.ts or a test) and
 * passed in; nothing here looks up a global client.
 */
import express, { type Express } from "express";
import { coreMiddleware } from "@shared/middleware/core";
import { makeHttpLogger } from "@shared/middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "@shared/middleware/problemJson";
import { createHealthRouter } from "@shared/health";

import { SERVICE_NAME, type PhoneAddressConfig } from "./config";
import type { KeyValueStore } from "./repo/kvStore";
import { PhoneAddressService } from "./services/phoneAddressService";
import { createPhoneAddressRouter } from "./routes/phoneAddressRoutes";
import { API_VERSION, buildOpenApiDocument } from "./openapi";

export type AppDeps = {
  config: PhoneAddressConfig;
  store: KeyValueStore;
};

export function createApp({ config, store }: AppDeps): Express {
  const service = new PhoneAddressService(store, {
    normalizeKeys: config.normalizePhoneKeys,
  });
  const routesBase = `${config.apiV1Prefix}/phone-addresses`;
  const openApiDoc = buildOpenApiDocument({
    title: config.projectName,
    apiPrefix: config.apiV1Prefix,
  });

  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", true);

  // Shared middleware
  app.use(coreMiddleware());
  app.use(makeHttpLogger(SERVICE_NAME));

  // Health
  app.use(
    createHealthRouter({
      service: config.projectName,
      env: config.env,
      version: API_VERSION,
      probes: { redis: () => store.ping() },
    })
  );

  // API docs
  app.get("/openapi.json", (_req, res) => {
    res.json(openApiDoc);
  });

  // Routes
  app.use(routesBase, createPhoneAddressRouter(service));

  // 404 + error handlers
  app.use(notFoundProblemJson([routesBase, config.apiV1Prefix || "/"]));
  app.use(errorProblemJson());

  return app;
}

export default createApp;
